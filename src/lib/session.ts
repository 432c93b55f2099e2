/**
 * Build session: the adapter between a front end and the packaging logic.
 *
 * Holds the current selections, runs the scanner when a script is chosen and
 * turns a build request into icon resolution, command construction and a
 * single-flight run. Results reach the front end only through the
 * notification channel.
 */

import type { PybundleConfig } from '../types/config.js';
import type { FlagName, OptionSelection, ValueOptionName } from '../types/selection.js';
import {
  BuildInProgressError,
  LaunchError,
  PreconditionError,
} from '../types/build.js';
import type { BuildResult } from '../types/build.js';
import { buildCommand, createEmptySelection, prepareSelection, presentValue } from './command.js';
import { createIconNormalizer } from './icon.js';
import type { IconNormalizer } from './icon.js';
import { NotificationChannel } from './notify.js';
import type { NotificationSink } from './notify.js';
import { BuildRunner } from './runner.js';
import { filterModules, tryScanImports } from './scanner.js';

export interface BuildSessionOptions {
  config: PybundleConfig;
  sink: NotificationSink;
  /** Defaults to a runner configured from `config.runner` */
  runner?: BuildRunner;
  /** Defaults to normalizeIcon configured from `config.icon` */
  normalizeIcon?: IconNormalizer;
}

export type BuildRequest =
  | { accepted: true; done: Promise<BuildResult> }
  | { accepted: false; error: PreconditionError | BuildInProgressError };

export class BuildSession {
  readonly channel: NotificationChannel;
  private readonly config: PybundleConfig;
  private readonly runner: BuildRunner;
  private readonly normalize: IconNormalizer;

  private script = '';
  private flags: OptionSelection['flags'] = {};
  private values: OptionSelection['values'] = {};
  private detected: string[] = [];
  /** Marked modules in the order they were marked */
  private marked = new Set<string>();
  private inFlight = false;
  /** Bumped on every selectScript call; older scans are discarded */
  private scanGeneration = 0;

  constructor(options: BuildSessionOptions) {
    this.config = options.config;
    this.channel = new NotificationChannel(options.sink);
    this.runner = options.runner ?? new BuildRunner({ maxOutputChars: options.config.runner.max_output_chars });
    this.normalize =
      options.normalizeIcon ??
      createIconNormalizer({
        tempDir: options.config.icon.temp_dir,
        fileName: options.config.icon.file_name,
        size: options.config.icon.size,
      });
  }

  get busy(): boolean {
    return this.inFlight || this.runner.busy;
  }

  get detectedModules(): readonly string[] {
    return this.detected;
  }

  /**
   * Chooses the target script and rescans its imports.
   *
   * Marks from a previous script are cleared. An unreadable script yields an
   * empty module list and a warning. When another script is selected before
   * the scan finishes, its outcome is dropped and the current modules are
   * returned.
   */
  async selectScript(script: string): Promise<string[]> {
    const generation = ++this.scanGeneration;
    this.script = script;
    this.marked.clear();
    this.detected = [];

    const outcome = await tryScanImports(script);
    if (generation !== this.scanGeneration) {
      return [...this.detected];
    }
    if (outcome.error) {
      this.channel.post({ kind: 'warning', error: outcome.error });
    }
    this.detected = filterModules(outcome.modules, this.config.scanner.exclude_globs);
    this.channel.post({ kind: 'modules', script, modules: [...this.detected] });
    return [...this.detected];
  }

  setFlag(name: FlagName, enabled: boolean): void {
    const flags = { ...this.flags };
    flags[name] = enabled;
    this.flags = flags;
  }

  setValue(name: ValueOptionName, value: string | undefined): void {
    const values = { ...this.values };
    if (value === undefined) {
      delete values[name];
    } else {
      values[name] = value;
    }
    this.values = values;
  }

  /**
   * Marks or unmarks a hidden import. Names need not come from the scanner.
   */
  markModule(name: string, marked: boolean = true): void {
    if (marked) {
      this.marked.add(name);
    } else {
      this.marked.delete(name);
    }
  }

  markAllDetected(): void {
    for (const name of this.detected) {
      this.marked.add(name);
    }
  }

  /**
   * Replaces flags, values and marks with a stored selection. The script is
   * taken as-is without rescanning.
   */
  applySelection(selection: OptionSelection): void {
    this.script = selection.script;
    this.flags = { ...selection.flags };
    this.values = { ...selection.values };
    this.marked = new Set(selection.hidden_imports);
  }

  /**
   * Snapshot of the selections. Hidden imports follow presentation order:
   * detected modules first (sorted), then names marked by hand.
   */
  currentSelection(): OptionSelection {
    const detectedMarks = this.detected.filter((name) => this.marked.has(name));
    const manualMarks = [...this.marked].filter((name) => !this.detected.includes(name));

    return {
      script: this.script,
      flags: { ...this.flags },
      values: { ...this.values },
      hidden_imports: [...detectedMarks, ...manualMarks],
    };
  }

  /**
   * Starts a build unless the request is invalid or another build is in
   * flight. Rejections are decided synchronously and spawn nothing.
   */
  requestBuild(): BuildRequest {
    if (presentValue(this.script) === null) {
      return this.reject(new PreconditionError('Select a script to package first'));
    }
    if (this.busy) {
      return this.reject(new BuildInProgressError());
    }

    this.inFlight = true;
    const done = this.execute(this.currentSelection()).finally(() => {
      this.inFlight = false;
    });
    return { accepted: true, done };
  }

  private reject(error: PreconditionError | BuildInProgressError): BuildRequest {
    this.channel.post({ kind: 'rejected', error });
    return { accepted: false, error };
  }

  private async execute(selection: OptionSelection): Promise<BuildResult> {
    let result: BuildResult;
    try {
      const prepared = await prepareSelection(selection, this.normalize);
      for (const warning of prepared.warnings) {
        this.channel.post({ kind: 'warning', error: warning });
      }

      const command = buildCommand(prepared.selection, { program: this.config.packager.command });
      this.channel.post({ kind: 'started', command });
      result = await this.runner.run(command, (chunk) => {
        this.channel.post({ kind: 'output', chunk });
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      result = {
        status: 'failure',
        error: new LaunchError(`Build could not start: ${cause.message}`, this.config.packager.command, cause),
        durationMs: 0,
      };
    }

    this.channel.post({ kind: 'finished', result });
    return result;
  }
}
