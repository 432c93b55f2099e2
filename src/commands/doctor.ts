import { ConfigError, findConfigFile, loadConfig } from '../lib/config.js';
import { checkPackager } from '../lib/doctor.js';
import { PRODUCT_NAME } from '../lib/branding.js';
import type { PybundleConfig } from '../types/config.js';

/**
 * Reports configuration and packaging tool health.
 *
 * @returns true when no problem was found
 */
export async function doctorCommand(configPath?: string): Promise<boolean> {
  console.log(`${PRODUCT_NAME} doctor - checking configuration and environment\n`);
  const issues: string[] = [];

  const foundPath = configPath ?? (await findConfigFile());
  if (foundPath) {
    console.log(`[OK] Config file found: ${foundPath}`);
  } else {
    console.log('[OK] No config file, using defaults');
  }

  let config: PybundleConfig | undefined;
  try {
    config = await loadConfig(configPath);
    console.log('[OK] Config is valid');
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.log(`[FAIL] ${error.message}`);
    issues.push('Fix or remove the configuration file');
  }

  if (config) {
    const packager = await checkPackager(config.packager);
    if (packager.available) {
      console.log(`[OK] ${packager.command} available${packager.version ? ` (${packager.version})` : ''}`);
    } else {
      console.log(`[FAIL] ${packager.command} not usable: ${packager.details ?? 'unknown error'}`);
      issues.push(`Install ${packager.command} or set packager.command in the config`);
    }
  }

  if (issues.length === 0) {
    console.log('\nAll checks passed.');
    return true;
  }

  console.log('\nIssues:');
  for (const issue of issues) {
    console.log(`  - ${issue}`);
  }
  return false;
}
