/**
 * TypeScript interfaces for pybundle.config.json.
 *
 * Every section is optional on disk; missing values fall back to
 * DEFAULT_CONFIG in lib/config.ts.
 */

/**
 * External packaging tool settings.
 */
export interface PackagerConfig {
  /** Executable name or path of the packaging tool */
  command: string;
  /** Arguments used by `doctor` to probe the tool */
  version_args: string[];
}

/**
 * Import scanner settings.
 */
export interface ScannerConfig {
  /** micromatch globs of module names hidden from the detected list */
  exclude_globs: string[];
}

/**
 * Icon normalization settings.
 */
export interface IconConfig {
  /** Edge length in pixels of the generated icon */
  size: number;
  /** Fixed file name of the generated icon inside temp_dir */
  file_name: string;
  /** Directory for the generated icon; null means the OS temp dir */
  temp_dir: string | null;
}

/**
 * Build runner settings.
 */
export interface RunnerConfig {
  /** Maximum number of output characters retained for failure diagnostics */
  max_output_chars: number;
}

/**
 * Complete configuration after defaults are applied.
 */
export interface PybundleConfig {
  version: string;
  packager: PackagerConfig;
  scanner: ScannerConfig;
  icon: IconConfig;
  runner: RunnerConfig;
}

/**
 * Shape of the configuration file as written by users.
 */
export interface PybundleConfigFile {
  version: string;
  packager?: Partial<PackagerConfig>;
  scanner?: Partial<ScannerConfig>;
  icon?: Partial<IconConfig>;
  runner?: Partial<RunnerConfig>;
}
