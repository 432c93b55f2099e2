import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadSelection, saveSelection, SelectionFileError } from '@/lib/selection.js';
import type { OptionSelection } from '@/types/selection.js';
import { makeTempDir, removeDir } from '../helpers/mocks.js';

describe('selection files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('selection');
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it('saves a selection that loads back unchanged', async () => {
    const filePath = join(testDir, 'selection.json');
    const selection: OptionSelection = {
      script: '/work/app.py',
      flags: { onefile: true, noconsole: false },
      values: { name: 'App', add_data: 'data.txt;data' },
      hidden_imports: ['requests', 'yaml'],
    };

    await saveSelection(filePath, selection);

    await expect(loadSelection(filePath)).resolves.toEqual(selection);
    expect(await readFile(filePath, 'utf-8')).toMatch(/^\{\n {2}"script": "\/work\/app\.py",\n/);
  });

  it('rejects selections missing required fields', async () => {
    const filePath = join(testDir, 'selection.json');
    await writeFile(filePath, JSON.stringify({ script: 'app.py', flags: {}, values: {} }), 'utf-8');

    await expect(loadSelection(filePath)).rejects.toThrow(
      `Invalid selection file ${filePath}: #/required: must have required property 'hidden_imports'`
    );
  });

  it('wraps read failures', async () => {
    const filePath = join(testDir, 'absent.json');

    const error = await loadSelection(filePath).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SelectionFileError);
    expect(error instanceof SelectionFileError && error.filePath).toBe(filePath);
  });
});
