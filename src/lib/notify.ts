/**
 * Notification delivery.
 *
 * Everything the user should see is posted here and handed to the sink on a
 * later event-loop turn, in posting order. Stream handlers and build logic
 * never call the sink directly.
 */

import type { BuildInProgressError, BuildResult, PreconditionError } from '../types/build.js';
import type { BuildCommand } from '../types/selection.js';
import type { ConversionError } from './icon.js';
import type { ReadError } from './scanner.js';

export type Notification =
  | { kind: 'modules'; script: string; modules: string[] }
  | { kind: 'warning'; error: ReadError | ConversionError }
  | { kind: 'rejected'; error: PreconditionError | BuildInProgressError }
  | { kind: 'started'; command: BuildCommand }
  | { kind: 'output'; chunk: string }
  | { kind: 'finished'; result: BuildResult };

export type NotificationSink = (notification: Notification) => void;

export class NotificationChannel {
  private queue: Notification[] = [];
  private scheduled = false;
  private waiters: Array<() => void> = [];

  constructor(private readonly sink: NotificationSink) {}

  /** Notifications posted but not yet delivered */
  get pending(): number {
    return this.queue.length;
  }

  post(notification: Notification): void {
    this.queue.push(notification);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.flush());
    }
  }

  /**
   * Resolves once every notification posted so far has been delivered.
   */
  drain(): Promise<void> {
    if (!this.scheduled && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private flush(): void {
    this.scheduled = false;
    const batch = this.queue.splice(0);

    for (const notification of batch) {
      try {
        this.sink(notification);
      } catch (error) {
        console.error(
          `Notification sink failed on '${notification.kind}': ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    // A sink may post again; waiters then wait for that flush too
    if (!this.scheduled && this.queue.length === 0) {
      const waiters = this.waiters.splice(0);
      for (const resolve of waiters) resolve();
    }
  }
}
