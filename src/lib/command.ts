/**
 * Packaging command construction.
 *
 * buildCommand is a pure function of the selection: identical input always
 * yields an identical argument vector. Icon resolution, the only step with
 * side effects, happens beforehand in prepareSelection.
 */

import { dirname } from 'node:path';
import { RECOGNIZED_FLAGS } from '../types/selection.js';
import type { BuildCommand, OptionSelection } from '../types/selection.js';
import { ConversionError } from './icon.js';
import type { IconNormalizer } from './icon.js';

export const HIDDEN_IMPORT_PREFIX = '--hidden-import=';

export interface BuildCommandOptions {
  /** Packaging tool executable */
  program: string;
}

/**
 * Selection with the icon resolved, plus any recovered conversion problem.
 */
export interface PreparedSelection {
  selection: OptionSelection;
  warnings: ConversionError[];
}

/**
 * Returns the trimmed value, or null when it is missing or blank.
 */
export function presentValue(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function createEmptySelection(script: string = ''): OptionSelection {
  return {
    script,
    flags: {},
    values: {},
    hidden_imports: [],
  };
}

/**
 * Resolves the icon option through the normalizer.
 *
 * On ConversionError the icon is dropped from the returned selection and the
 * error is returned as a warning; other errors propagate.
 */
export async function prepareSelection(
  selection: OptionSelection,
  normalize: IconNormalizer
): Promise<PreparedSelection> {
  const icon = presentValue(selection.values.icon);
  if (icon === null) {
    return { selection, warnings: [] };
  }

  try {
    const resolved = await normalize(icon);
    return {
      selection: { ...selection, values: { ...selection.values, icon: resolved } },
      warnings: [],
    };
  } catch (error) {
    if (!(error instanceof ConversionError)) {
      throw error;
    }
    const values = { ...selection.values };
    delete values.icon;
    return {
      selection: { ...selection, values },
      warnings: [error],
    };
  }
}

/**
 * Builds the packaging tool's argument vector.
 *
 * Assumes a non-empty script; callers reject an empty one first.
 *
 * @example
 * ```typescript
 * buildCommand(createEmptySelection('/tmp/app.py'), { program: 'pyinstaller' });
 * // Returns: ['pyinstaller', '/tmp/app.py', '--distpath', '/tmp']
 * ```
 */
export function buildCommand(selection: OptionSelection, options: BuildCommandOptions): BuildCommand {
  const args: string[] = [options.program, selection.script];

  for (const flag of RECOGNIZED_FLAGS) {
    if (selection.flags[flag.name] === true) {
      args.push(flag.token);
    }
  }

  const name = presentValue(selection.values.name);
  if (name !== null) {
    args.push('--name', name);
  }

  const icon = presentValue(selection.values.icon);
  if (icon !== null) {
    args.push('--icon', icon);
  }

  // add-data is passed through untouched; its separator is the user's business
  const addData = selection.values.add_data;
  if (presentValue(addData) !== null && addData !== undefined) {
    args.push('--add-data', addData);
  }

  args.push('--distpath', presentValue(selection.values.distpath) ?? dirname(selection.script));

  const seen = new Set<string>();
  for (const module of selection.hidden_imports) {
    const moduleName = module.trim();
    if (moduleName === '' || seen.has(moduleName)) continue;
    seen.add(moduleName);
    args.push(`${HIDDEN_IMPORT_PREFIX}${moduleName}`);
  }

  return Object.freeze(args);
}

/**
 * Renders a command as one shell-quoted line, for dry runs and logs.
 */
export function formatCommand(command: BuildCommand): string {
  return command
    .map((token) => (/^[\w@%+=:,./-]+$/.test(token) ? token : `'${token.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
