/**
 * Environment checks for pybundle.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { PackagerConfig } from '../types/config.js';

/**
 * Result of probing the packaging tool.
 */
export interface PackagerDoctorResult {
  /** The command that was checked (e.g. "pyinstaller") */
  command: string;
  /** Whether the tool could be started and answered successfully */
  available: boolean;
  /** First line of the version output, if available */
  version?: string;
  /** Spawn error or stderr, for debugging */
  details?: string;
}

type SpawnResult = { ok: boolean; code: number | null; stdout: string; stderr: string; error?: string };

const PROBE_TIMEOUT_MS = 15_000;

async function spawnAndCapture(command: string, args: string[], timeoutMs: number): Promise<SpawnResult> {
  return await new Promise<SpawnResult>((resolve) => {
    let child: ChildProcess;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    try {
      child = spawn(command, args, { shell: false, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (error) {
      resolve({
        ok: false,
        code: null,
        stdout: '',
        stderr: '',
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const timeout = setTimeout(() => {
      child.kill('SIGTERM');
    }, timeoutMs);

    let settled = false;
    const finish = (result: SpawnResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    child.on('error', (error: Error) => {
      finish({
        ok: false,
        code: null,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        error: error.message,
      });
    });

    child.on('exit', (code: number | null) => {
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8').trim();
      const stderr = Buffer.concat(stderrChunks).toString('utf-8').trim();
      finish({ ok: code === 0, code, stdout, stderr });
    });
  });
}

/**
 * Checks that the packaging tool starts and reports a version.
 *
 * @example
 * ```typescript
 * const result = await checkPackager(config.packager);
 * if (!result.available) console.error(result.details);
 * ```
 */
export async function checkPackager(
  packager: PackagerConfig,
  timeoutMs: number = PROBE_TIMEOUT_MS
): Promise<PackagerDoctorResult> {
  const result = await spawnAndCapture(packager.command, packager.version_args, timeoutMs);

  if (!result.ok) {
    return {
      command: packager.command,
      available: false,
      details: result.error ?? (result.stderr || `exited with code ${result.code ?? 'null'}`),
    };
  }

  const version = result.stdout.split('\n')[0]?.trim();
  return {
    command: packager.command,
    available: true,
    version: version || undefined,
  };
}
