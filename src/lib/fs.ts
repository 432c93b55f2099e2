/**
 * Atomic file system utilities.
 *
 * These utilities implement the write-tmp-fsync-rename pattern so readers
 * never observe a partially written file (config, selection, temp icon).
 */

import { open, rename, unlink, readFile } from 'node:fs/promises';

/**
 * Error thrown when atomic file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AtomicFsError';
  }
}

/**
 * Returns the errno code wrapped by an AtomicFsError, if any.
 */
export function atomicErrorCode(error: AtomicFsError): string | undefined {
  const cause = error.cause;
  if (cause && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Atomically writes text or binary content to a file.
 *
 * @param filePath - Destination path
 * @param content - Data to write; strings are written as UTF-8
 * @throws {AtomicFsError} If the write operation fails
 */
export async function atomicWriteFile(filePath: string, content: string | Uint8Array): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content);
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      try {
        await fileHandle.close();
      } catch {
        // Ignore close errors during cleanup
      }
    }

    try {
      await unlink(tmpPath);
    } catch {
      // Ignore unlink errors - file may not exist
    }

    throw new AtomicFsError(
      `Failed to atomically write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Atomically writes JSON data (2-space indent, trailing newline).
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/pybundle.config.json', { version: '1' });
 * ```
 */
export async function atomicWriteJson<T>(filePath: string, data: T): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Reads and parses a JSON file.
 *
 * The result is untyped on purpose: callers validate it before use.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed
 */
export async function atomicReadJson(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
