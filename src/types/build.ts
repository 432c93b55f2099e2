/**
 * Build execution types and error classes.
 */

/**
 * Lifecycle of the build runner. A finished build returns to idle; the
 * terminal outcome is carried by BuildResult.
 */
export type RunnerPhase = 'idle' | 'launching' | 'streaming';

/**
 * Receives merged stdout/stderr text as it arrives.
 */
export type OutputObserver = (chunk: string) => void;

/**
 * Error raised when the packaging tool cannot be started at all.
 */
export class LaunchError extends Error {
  constructor(
    message: string,
    public readonly program: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LaunchError';
  }
}

/**
 * Error describing a packaging run that ended with a non-zero exit code or
 * was terminated by a signal.
 */
export class ExecutionFailure extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly output: string
  ) {
    super(message);
    this.name = 'ExecutionFailure';
  }
}

/**
 * Error thrown when a build is requested without a target script.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Error thrown when a build is requested while another one is in flight.
 */
export class BuildInProgressError extends Error {
  constructor(message: string = 'A build is already running; wait for it to finish') {
    super(message);
    this.name = 'BuildInProgressError';
  }
}

export interface BuildSuccess {
  status: 'success';
  exitCode: 0;
  /** Tail of the merged output */
  output: string;
  durationMs: number;
}

export interface BuildFailure {
  status: 'failure';
  error: LaunchError | ExecutionFailure;
  durationMs: number;
}

/**
 * Terminal outcome of one packaging invocation.
 */
export type BuildResult = BuildSuccess | BuildFailure;
