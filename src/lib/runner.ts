/**
 * Packaging process execution.
 *
 * Spawns the packaging tool (argv, no shell), streams its merged
 * stdout/stderr to an observer and reports a BuildResult. At most one
 * process runs per runner; there is no cancellation once launched.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import {
  BuildInProgressError,
  ExecutionFailure,
  LaunchError,
} from '../types/build.js';
import type { BuildResult, OutputObserver, RunnerPhase } from '../types/build.js';
import type { BuildCommand } from '../types/selection.js';

export const DEFAULT_MAX_OUTPUT_CHARS = 64 * 1024;

export interface BuildRunnerOptions {
  /** Characters of output retained for diagnostics */
  maxOutputChars?: number;
  /** Working directory of the packaging process */
  cwd?: string;
}

/**
 * Keeps the most recent output, dropping the oldest text past the limit.
 */
export class OutputTail {
  private chunks: string[] = [];
  private length = 0;

  constructor(private readonly limit: number) {}

  append(chunk: string): void {
    this.chunks.push(chunk);
    this.length += chunk.length;

    while (this.length > this.limit) {
      const excess = this.length - this.limit;
      const first = this.chunks[0];
      if (first.length <= excess) {
        this.chunks.shift();
        this.length -= first.length;
      } else {
        this.chunks[0] = first.slice(excess);
        this.length -= excess;
      }
    }
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Runs packaging commands one at a time.
 *
 * @example
 * ```typescript
 * const runner = new BuildRunner();
 * const result = await runner.run(['pyinstaller', 'app.py', '--distpath', '.'], (chunk) => {
 *   process.stdout.write(chunk);
 * });
 * ```
 */
export class BuildRunner {
  private currentPhase: RunnerPhase = 'idle';
  private readonly maxOutputChars: number;

  constructor(private readonly options: BuildRunnerOptions = {}) {
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  }

  get phase(): RunnerPhase {
    return this.currentPhase;
  }

  get busy(): boolean {
    return this.currentPhase !== 'idle';
  }

  /**
   * Executes a command and resolves with its outcome.
   *
   * Launch problems and non-zero exits resolve as failures; only a request
   * made while another build is active rejects.
   *
   * @throws {BuildInProgressError} If a build is already launching or streaming
   */
  async run(command: BuildCommand, observer?: OutputObserver): Promise<BuildResult> {
    if (this.busy) {
      throw new BuildInProgressError();
    }
    const [program, ...args] = command;
    if (program === undefined || program === '') {
      return {
        status: 'failure',
        error: new LaunchError('Build command has no program', ''),
        durationMs: 0,
      };
    }

    this.currentPhase = 'launching';
    try {
      return await this.execute(program, args, observer);
    } finally {
      this.currentPhase = 'idle';
    }
  }

  private execute(program: string, args: string[], observer?: OutputObserver): Promise<BuildResult> {
    const startTime = Date.now();
    const tail = new OutputTail(this.maxOutputChars);

    return new Promise<BuildResult>((resolve) => {
      let child: ChildProcess;
      let settled = false;

      const finish = (result: BuildResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const launchFailure = (error: Error) => {
        finish({
          status: 'failure',
          error: new LaunchError(`Failed to launch ${program}: ${error.message}`, program, error),
          durationMs: Date.now() - startTime,
        });
      };

      try {
        child = spawn(program, args, {
          cwd: this.options.cwd,
          shell: false,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        launchFailure(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      const onChunk = (chunk: string | Buffer) => {
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
        tail.append(text);
        if (observer) {
          try {
            observer(text);
          } catch (error) {
            console.error(`Output observer failed: ${error instanceof Error ? error.message : String(error)}`);
          }
        }
      };

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', onChunk);
      child.stderr?.on('data', onChunk);

      child.on('spawn', () => {
        this.currentPhase = 'streaming';
      });

      child.on('error', (error: Error) => {
        if (this.currentPhase === 'launching') {
          launchFailure(error);
          return;
        }
        // Errors after spawn (e.g. a failed kill) do not end the run; close follows
        tail.append(`\n[${program}] ${error.message}\n`);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const durationMs = Date.now() - startTime;
        const output = tail.toString();

        if (code === 0) {
          finish({ status: 'success', exitCode: 0, output, durationMs });
          return;
        }

        const reason = code !== null ? `exited with code ${code}` : `was terminated by ${signal ?? 'an unknown signal'}`;
        finish({
          status: 'failure',
          error: new ExecutionFailure(`${program} ${reason}`, code, signal, output),
          durationMs,
        });
      });
    });
  }
}
