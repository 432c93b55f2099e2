/**
 * `pybundle build`: assemble the packaging command from CLI options and an
 * optional selection file, then run it.
 */

import { buildCommand, formatCommand, presentValue } from '../lib/command.js';
import { BuildSession } from '../lib/session.js';
import type { BuildSessionOptions } from '../lib/session.js';
import type { Notification, NotificationSink } from '../lib/notify.js';
import { loadSelection, saveSelection } from '../lib/selection.js';
import { RECOGNIZED_FLAGS } from '../types/selection.js';
import type { FlagName } from '../types/selection.js';
import type { PybundleConfig } from '../types/config.js';
import { ExecutionFailure } from '../types/build.js';
import type { BuildResult } from '../types/build.js';

export interface BuildCommandOptions extends Partial<Record<FlagName, boolean>> {
  name?: string;
  icon?: string;
  addData?: string;
  distpath?: string;
  hiddenImport?: string[];
  allDetected?: boolean;
  selection?: string;
  saveSelection?: string;
  dryRun?: boolean;
  json?: boolean;
}

interface JsonSummary {
  command: string[] | null;
  modules: string[];
  warnings: string[];
  rejected: string | null;
  result: {
    status: BuildResult['status'];
    exit_code: number | null;
    duration_ms: number;
    error: string | null;
  } | null;
}

/**
 * Maps a build result to the process exit code.
 */
export function exitCodeFor(result: BuildResult): number {
  if (result.status === 'success') return 0;
  if (result.error instanceof ExecutionFailure && result.error.exitCode !== null) {
    return result.error.exitCode;
  }
  return 1;
}

function createConsoleSink(): NotificationSink {
  return (notification: Notification) => {
    switch (notification.kind) {
      case 'modules':
        if (notification.modules.length > 0) {
          console.log(`Detected imports: ${notification.modules.join(', ')}`);
        }
        break;
      case 'warning':
        console.warn(`Warning: ${notification.error.message}`);
        break;
      case 'rejected':
        console.error(notification.error.message);
        break;
      case 'started':
        console.log(`$ ${formatCommand(notification.command)}`);
        break;
      case 'output':
        process.stdout.write(notification.chunk);
        break;
      case 'finished':
        if (notification.result.status === 'success') {
          console.log(`\nBuild succeeded in ${notification.result.durationMs}ms`);
        } else {
          console.error(`\nBuild failed: ${notification.result.error.message}`);
        }
        break;
    }
  };
}

function createJsonSink(summary: JsonSummary): NotificationSink {
  return (notification: Notification) => {
    switch (notification.kind) {
      case 'modules':
        summary.modules = notification.modules;
        break;
      case 'warning':
        summary.warnings.push(notification.error.message);
        break;
      case 'rejected':
        summary.rejected = notification.error.message;
        break;
      case 'started':
        summary.command = [...notification.command];
        break;
      case 'output':
        // Keep stdout for the JSON document
        process.stderr.write(notification.chunk);
        break;
      case 'finished': {
        const result = notification.result;
        summary.result = {
          status: result.status,
          exit_code: result.status === 'success' ? 0 : exitCodeFor(result),
          duration_ms: result.durationMs,
          error: result.status === 'success' ? null : result.error.message,
        };
        break;
      }
    }
  };
}

/**
 * Runs the build command.
 *
 * @returns Process exit code: the packager's own code on execution failure,
 *          1 for rejected requests and launch errors
 */
export async function buildCommandAction(
  script: string | undefined,
  options: BuildCommandOptions,
  config: PybundleConfig,
  sessionOptions: Partial<Omit<BuildSessionOptions, 'config' | 'sink'>> = {}
): Promise<number> {
  const summary: JsonSummary = { command: null, modules: [], warnings: [], rejected: null, result: null };
  const session = new BuildSession({
    ...sessionOptions,
    config,
    sink: options.json ? createJsonSink(summary) : createConsoleSink(),
  });

  const stored = options.selection ? await loadSelection(options.selection) : null;
  const target = script ?? stored?.script ?? '';

  if (presentValue(target) !== null) {
    await session.selectScript(target);
  }
  if (stored) {
    session.applySelection({ ...stored, script: target });
  }

  for (const flag of RECOGNIZED_FLAGS) {
    if (options[flag.name] === true) {
      session.setFlag(flag.name, true);
    }
  }
  if (options.name !== undefined) session.setValue('name', options.name);
  if (options.icon !== undefined) session.setValue('icon', options.icon);
  if (options.addData !== undefined) session.setValue('add_data', options.addData);
  if (options.distpath !== undefined) session.setValue('distpath', options.distpath);
  if (options.allDetected) session.markAllDetected();
  for (const name of options.hiddenImport ?? []) {
    session.markModule(name);
  }

  if (options.saveSelection) {
    await saveSelection(options.saveSelection, session.currentSelection());
  }

  if (options.dryRun) {
    await session.channel.drain();
    const selection = session.currentSelection();
    if (presentValue(selection.script) === null) {
      console.error('Select a script to package first');
      return 1;
    }
    const command = buildCommand(selection, { program: config.packager.command });
    if (options.json) {
      summary.command = [...command];
      console.log(JSON.stringify(summary, null, 2));
    } else {
      console.log(formatCommand(command));
    }
    return 0;
  }

  const request = session.requestBuild();
  const exitCode = request.accepted ? exitCodeFor(await request.done) : 1;
  await session.channel.drain();

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  }
  return exitCode;
}
