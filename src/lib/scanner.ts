/**
 * Static import scanner for Python scripts.
 *
 * Best-effort text matching: conditional imports, `__import__` calls and
 * re-exports are not followed, and only the first module of
 * `import a, b` is seen.
 */

import { readFile } from 'node:fs/promises';
import micromatch from 'micromatch';

/**
 * Error thrown when a script cannot be read or is not valid UTF-8.
 */
export class ReadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ReadError';
  }
}

/**
 * Outcome of a scan that never rejects.
 */
export interface ScanOutcome {
  modules: string[];
  error: ReadError | null;
}

// `import x.y` or `from x.y import ...`, optionally indented
const IMPORT_PATTERN = /^\s*(?:import|from)\s+([\p{L}\p{N}_.]+)/u;

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Extracts top-level module names from source text.
 *
 * @param source - Script contents
 * @returns Unique module names, sorted
 *
 * @example
 * ```typescript
 * extractImports('from foo.bar import baz\nimport os');
 * // Returns: ['foo', 'os']
 * ```
 */
export function extractImports(source: string): string[] {
  const modules = new Set<string>();

  for (const line of source.split(LINE_BREAK)) {
    const match = IMPORT_PATTERN.exec(line);
    if (!match) continue;

    // Relative imports (`from . import x`) have an empty leading segment
    const topLevel = match[1].split('.')[0];
    if (topLevel !== '') {
      modules.add(topLevel);
    }
  }

  return [...modules].sort();
}

/**
 * Reads a script as strict UTF-8 and extracts its imported modules.
 *
 * @param filePath - Path to the script
 * @returns Unique module names, sorted
 * @throws {ReadError} If the file cannot be opened or decoded
 */
export async function scanImports(filePath: string): Promise<string[]> {
  let source: string;
  try {
    const bytes = await readFile(filePath);
    source = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ReadError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  return extractImports(source);
}

/**
 * Like scanImports, but reports a ReadError alongside an empty module list
 * instead of rejecting.
 */
export async function tryScanImports(filePath: string): Promise<ScanOutcome> {
  try {
    return { modules: await scanImports(filePath), error: null };
  } catch (error) {
    if (error instanceof ReadError) {
      return { modules: [], error };
    }
    throw error;
  }
}

/**
 * Removes modules matching any of the exclusion globs.
 */
export function filterModules(modules: readonly string[], excludeGlobs: readonly string[]): string[] {
  if (excludeGlobs.length === 0) {
    return [...modules];
  }
  return modules.filter((name) => !micromatch.isMatch(name, [...excludeGlobs]));
}
