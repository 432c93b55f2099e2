import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { EventEmitter } from 'node:events';
import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { join } from 'node:path';
import { doctorCommand } from '@/commands/doctor.js';
import { atomicWriteJson } from '@/lib/fs.js';
import { makeTempDir, removeDir } from '../helpers/mocks.js';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

function exitWith(code: number, stdout = ''): ChildProcess {
  const child = new EventEmitter();
  const out = new EventEmitter();
  Object.assign(child, { stdout: out, stderr: new EventEmitter(), kill: vi.fn() });
  process.nextTick(() => {
    if (stdout) out.emit('data', Buffer.from(stdout));
    child.emit('exit', code);
  });
  return child as unknown as ChildProcess;
}

describe('doctorCommand', () => {
  let testDir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    vi.clearAllMocks();
    testDir = await makeTempDir('doctor');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await removeDir(testDir);
  });

  it('passes with a valid config and a working packager', async () => {
    const configPath = join(testDir, 'pybundle.config.json');
    await atomicWriteJson(configPath, { version: '1', packager: { command: 'pyinstaller' } });
    vi.mocked(spawn).mockImplementation(() => exitWith(0, '6.3.0\n'));

    await expect(doctorCommand(configPath)).resolves.toBe(true);
    expect(logSpy).toHaveBeenNthCalledWith(1, 'pybundle doctor - checking configuration and environment\n');
    expect(logSpy).toHaveBeenCalledWith(`[OK] Config file found: ${configPath}`);
    expect(logSpy).toHaveBeenCalledWith('[OK] pyinstaller available (6.3.0)');
  });

  it('fails when the packager exits non-zero', async () => {
    const configPath = join(testDir, 'pybundle.config.json');
    await atomicWriteJson(configPath, { version: '1' });
    vi.mocked(spawn).mockImplementation(() => exitWith(1));

    await expect(doctorCommand(configPath)).resolves.toBe(false);
    expect(logSpy).toHaveBeenCalledWith('[FAIL] pyinstaller not usable: exited with code 1');
  });

  it('skips the packager check when the config is invalid', async () => {
    const configPath = join(testDir, 'pybundle.config.json');
    await atomicWriteJson(configPath, { version: '1', unknown: true });

    await expect(doctorCommand(configPath)).resolves.toBe(false);
    expect(spawn).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledWith(
      '[FAIL] Invalid configuration file: #/additionalProperties: must NOT have additional properties'
    );
  });
});
