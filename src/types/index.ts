/**
 * pybundle type definitions.
 *
 * This module exports all public types for the pybundle project.
 */

export type {
  PybundleConfig,
  PybundleConfigFile,
  PackagerConfig,
  ScannerConfig,
  IconConfig,
  RunnerConfig,
} from './config.js';

export { RECOGNIZED_FLAGS } from './selection.js';
export type {
  FlagName,
  FlagSelection,
  ValueOptions,
  ValueOptionName,
  OptionSelection,
  BuildCommand,
} from './selection.js';

export {
  LaunchError,
  ExecutionFailure,
  PreconditionError,
  BuildInProgressError,
} from './build.js';
export type {
  RunnerPhase,
  OutputObserver,
  BuildSuccess,
  BuildFailure,
  BuildResult,
} from './build.js';
