/**
 * Write a default pybundle.config.json into a directory.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { atomicWriteJson } from '../lib/fs.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../lib/config.js';

export interface InitCommandOptions {
  force?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function initCommand(options: InitCommandOptions, dir: string = process.cwd()): Promise<string> {
  const configPath = join(dir, CONFIG_FILE_NAME);

  if (!options.force && (await exists(configPath))) {
    throw new Error(`${CONFIG_FILE_NAME} already exists in ${dir}. Use --force to overwrite.`);
  }

  await atomicWriteJson(configPath, DEFAULT_CONFIG);
  console.log(`Wrote ${configPath}`);
  return configPath;
}
