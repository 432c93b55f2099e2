/**
 * Reading and writing option selections as JSON files.
 */

import { atomicReadJson, atomicWriteJson } from './fs.js';
import { loadSchema, validateWithSchema } from './schema.js';
import type { OptionSelection } from '../types/selection.js';

/**
 * Error thrown when a selection file is unreadable or malformed.
 */
export class SelectionFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SelectionFileError';
  }
}

/**
 * Loads and validates a selection file.
 *
 * @throws {SelectionFileError} If the file cannot be read or fails validation
 */
export async function loadSelection(filePath: string): Promise<OptionSelection> {
  let raw: unknown;
  try {
    raw = await atomicReadJson(filePath);
  } catch (error) {
    throw new SelectionFileError(
      error instanceof Error ? error.message : String(error),
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const schema = await loadSchema('selection.schema.json');
  const result = validateWithSchema<OptionSelection>(raw, schema);
  if (!result.valid || result.data === null) {
    throw new SelectionFileError(`Invalid selection file ${filePath}: ${result.errors.join('; ')}`, filePath);
  }
  return result.data;
}

/**
 * Writes a selection so it can be reloaded with loadSelection.
 */
export async function saveSelection(filePath: string, selection: OptionSelection): Promise<void> {
  await atomicWriteJson(filePath, selection);
}
