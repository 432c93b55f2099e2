/**
 * Option selection and command types.
 */

/**
 * Boolean flags understood by the packaging tool, in the order they are
 * emitted on the command line.
 */
export const RECOGNIZED_FLAGS = [
  { name: 'onefile', token: '--onefile', description: 'Bundle everything into a single executable file' },
  { name: 'onedir', token: '--onedir', description: 'Bundle into one folder containing the executable' },
  { name: 'noconfirm', token: '--noconfirm', description: 'Replace the output directory without asking' },
  { name: 'clean', token: '--clean', description: 'Clear the build cache and temporary files first' },
  { name: 'strip', token: '--strip', description: 'Strip symbols to reduce the binary size' },
  { name: 'noconsole', token: '--noconsole', description: 'Do not open a console window when the executable runs' },
] as const;

export type FlagName = (typeof RECOGNIZED_FLAGS)[number]['name'];

export type FlagSelection = Partial<Record<FlagName, boolean>>;

/**
 * Value-bearing options. A value only counts when it is non-blank.
 */
export interface ValueOptions {
  /** Name of the produced executable */
  name?: string;
  /** Icon image path (any raster format, or .ico) */
  icon?: string;
  /** Data specification passed through verbatim, e.g. "data.txt;data" */
  add_data?: string;
  /** Output directory; defaults to the script's directory */
  distpath?: string;
}

export type ValueOptionName = keyof ValueOptions;

/**
 * Everything the user picked for one build.
 */
export interface OptionSelection {
  /** Target script path */
  script: string;
  flags: FlagSelection;
  values: ValueOptions;
  /** Modules marked as hidden imports, in presentation order */
  hidden_imports: string[];
}

/**
 * Argument vector for the packaging tool: program first, then arguments.
 * Frozen on construction.
 */
export type BuildCommand = readonly string[];
