/**
 * pybundle library utilities.
 *
 * This module exports all public utilities for embedding pybundle in another
 * front end.
 */

export {
  atomicWriteFile,
  atomicWriteJson,
  atomicReadJson,
  atomicErrorCode,
  AtomicFsError,
} from './fs.js';

export {
  loadConfig,
  parseConfig,
  findConfigFile,
  applyDefaults,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config.js';

export { loadSchema, validateWithSchema, SCHEMA_DIR } from './schema.js';
export type { ValidationResult } from './schema.js';

export { extractImports, scanImports, tryScanImports, filterModules, ReadError } from './scanner.js';
export type { ScanOutcome } from './scanner.js';

export {
  normalizeIcon,
  createIconNormalizer,
  decodeBmp,
  iconOutputPath,
  isIcoPath,
  ConversionError,
  CANONICAL_ICON_SIZE,
} from './icon.js';
export type { IconNormalizer, IconNormalizerOptions, RgbaImage } from './icon.js';

export {
  buildCommand,
  formatCommand,
  prepareSelection,
  createEmptySelection,
  presentValue,
  HIDDEN_IMPORT_PREFIX,
} from './command.js';
export type { PreparedSelection } from './command.js';

export { BuildRunner, OutputTail, DEFAULT_MAX_OUTPUT_CHARS } from './runner.js';
export type { BuildRunnerOptions } from './runner.js';

export { NotificationChannel } from './notify.js';
export type { Notification, NotificationSink } from './notify.js';

export { BuildSession } from './session.js';
export type { BuildSessionOptions, BuildRequest } from './session.js';

export { loadSelection, saveSelection, SelectionFileError } from './selection.js';

export { checkPackager } from './doctor.js';
export type { PackagerDoctorResult } from './doctor.js';

export * from '../types/index.js';
