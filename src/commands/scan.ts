import { filterModules, tryScanImports } from '../lib/scanner.js';
import type { PybundleConfig } from '../types/config.js';

export interface ScanCommandOptions {
  json?: boolean;
}

/**
 * Prints the modules a script imports. An unreadable script is reported as a
 * warning and treated as having no imports.
 */
export async function scanCommand(
  script: string,
  options: ScanCommandOptions,
  config: PybundleConfig
): Promise<string[]> {
  const outcome = await tryScanImports(script);
  const modules = filterModules(outcome.modules, config.scanner.exclude_globs);

  if (outcome.error) {
    console.warn(`Warning: ${outcome.error.message}`);
  }

  if (options.json) {
    console.log(
      JSON.stringify({ script, modules, error: outcome.error ? outcome.error.message : null }, null, 2)
    );
    return modules;
  }

  if (modules.length === 0) {
    console.log('No imports detected.');
    return modules;
  }

  console.log(`Imports detected in ${script}:`);
  for (const name of modules) {
    console.log(`  ${name}`);
  }
  return modules;
}
