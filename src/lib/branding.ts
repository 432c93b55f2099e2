export const PRODUCT_NAME = 'pybundle';
export const CLI_NAME = 'pybundle';

export const CONFIG_FILE_NAME = 'pybundle.config.json';

export const DEFAULT_PACKAGER_COMMAND = 'pyinstaller';
export const DEFAULT_ICON_FILE_NAME = 'pybundle_icon.ico';
