/**
 * Configuration loading and validation utilities.
 *
 * The configuration file is optional: without one, DEFAULT_CONFIG applies.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';
import { CONFIG_FILE_NAME, DEFAULT_ICON_FILE_NAME, DEFAULT_PACKAGER_COMMAND } from './branding.js';
import type { PybundleConfig, PybundleConfigFile } from '../types/config.js';

export { CONFIG_FILE_NAME };

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: PybundleConfig = {
  version: '1',
  packager: {
    command: DEFAULT_PACKAGER_COMMAND,
    version_args: ['--version'],
  },
  scanner: {
    exclude_globs: ['__future__'],
  },
  icon: {
    size: 256,
    file_name: DEFAULT_ICON_FILE_NAME,
    temp_dir: null,
  },
  runner: {
    max_output_chars: 64 * 1024,
  },
};

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here, keep walking up
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Overlays a validated config file on DEFAULT_CONFIG.
 */
export function applyDefaults(file: PybundleConfigFile): PybundleConfig {
  return {
    version: file.version,
    packager: { ...DEFAULT_CONFIG.packager, ...file.packager },
    scanner: { ...DEFAULT_CONFIG.scanner, ...file.scanner },
    icon: { ...DEFAULT_CONFIG.icon, ...file.icon },
    runner: { ...DEFAULT_CONFIG.runner, ...file.runner },
  };
}

/**
 * Validates raw JSON against the configuration schema.
 *
 * @throws {ConfigError} If the structure does not match
 */
export async function parseConfig(raw: unknown, configPath?: string): Promise<PybundleConfig> {
  const schema = await loadSchema('config.schema.json');
  const result = validateWithSchema<PybundleConfigFile>(raw, schema);
  if (!result.valid || result.data === null) {
    throw new ConfigError(
      `Invalid configuration file: ${result.errors.join('; ')}`,
      configPath
    );
  }
  return applyDefaults(result.data);
}

/**
 * Loads the configuration.
 *
 * @param configPath - Explicit path (from --config). When given, the file must exist.
 * @returns The configuration with defaults applied
 * @throws {ConfigError} If the file cannot be read or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const explicit = await loadConfig('/path/to/pybundle.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<PybundleConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile();
  if (!resolvedPath) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(
        `Failed to read configuration file: ${error.message}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  return parseConfig(raw, resolvedPath);
}
