import { describe, it, expect, vi, beforeEach } from 'vitest';
import { spawn } from 'node:child_process';
import { BuildRunner, OutputTail } from '@/lib/runner.js';
import { BuildInProgressError, ExecutionFailure, LaunchError } from '@/types/build.js';
import { makeChild } from '../helpers/mocks.js';
import type { FakeChild } from '../helpers/mocks.js';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const command = ['pyinstaller', '/tmp/app.py', '--distpath', '/tmp'] as const;

describe('OutputTail', () => {
  it('keeps the most recent characters', () => {
    const tail = new OutputTail(10);
    tail.append('abcdef');
    tail.append('ghijkl');
    expect(tail.toString()).toBe('cdefghijkl');
  });

  it('trims a single oversized chunk', () => {
    const tail = new OutputTail(4);
    tail.append('0123456789');
    expect(tail.toString()).toBe('6789');
  });

  it('keeps everything under the limit', () => {
    const tail = new OutputTail(100);
    tail.append('a');
    tail.append('b');
    expect(tail.toString()).toBe('ab');
  });
});

describe('BuildRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('spawns the program without a shell and reports success', async () => {
    vi.mocked(spawn).mockImplementation(
      () => makeChild({ output: [{ out: 'Building EXE\n' }, { err: 'WARNING: lib not found\n' }], code: 0 }).child
    );
    const chunks: string[] = [];
    const runner = new BuildRunner();

    const result = await runner.run(command, (chunk) => chunks.push(chunk));

    expect(spawn).toHaveBeenCalledWith(
      'pyinstaller',
      ['/tmp/app.py', '--distpath', '/tmp'],
      expect.objectContaining({ shell: false, stdio: ['ignore', 'pipe', 'pipe'] })
    );
    expect(chunks).toEqual(['Building EXE\n', 'WARNING: lib not found\n']);
    expect(result).toMatchObject({ status: 'success', exitCode: 0, output: 'Building EXE\nWARNING: lib not found\n' });
    expect(runner.phase).toBe('idle');
  });

  it('reports a non-zero exit as ExecutionFailure with the output', async () => {
    vi.mocked(spawn).mockImplementation(() => makeChild({ output: [{ err: 'SyntaxError\n' }], code: 2 }).child);

    const result = await new BuildRunner().run(command);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.error).toBeInstanceOf(ExecutionFailure);
    expect(result.error).toMatchObject({
      message: 'pyinstaller exited with code 2',
      exitCode: 2,
      signal: null,
      output: 'SyntaxError\n',
    });
  });

  it('reports termination by signal', async () => {
    vi.mocked(spawn).mockImplementation(() => makeChild({ code: null, signal: 'SIGKILL' }).child);

    const result = await new BuildRunner().run(command);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.error).toMatchObject({
      message: 'pyinstaller was terminated by SIGKILL',
      exitCode: null,
      signal: 'SIGKILL',
    });
  });

  it('reports a missing executable as LaunchError', async () => {
    vi.mocked(spawn).mockImplementation(
      () => makeChild({ launchError: new Error('spawn pyinstaller ENOENT') }).child
    );

    const result = await new BuildRunner().run(command);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.error).toBeInstanceOf(LaunchError);
    expect(result.error.message).toBe('Failed to launch pyinstaller: spawn pyinstaller ENOENT');
  });

  it('reports a synchronous spawn failure as LaunchError', async () => {
    vi.mocked(spawn).mockImplementation(() => {
      throw new Error('EACCES');
    });
    const runner = new BuildRunner();

    const result = await runner.run(command);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.error).toBeInstanceOf(LaunchError);
    expect(runner.phase).toBe('idle');
  });

  it('reports an empty command as LaunchError without spawning', async () => {
    const result = await new BuildRunner().run([]);

    expect(result.status).toBe('failure');
    expect(spawn).not.toHaveBeenCalled();
  });

  it('rejects a second run while one is streaming', async () => {
    const children: FakeChild[] = [];
    vi.mocked(spawn).mockImplementation(() => {
      const fake = makeChild({ manual: true, code: 0 });
      children.push(fake);
      return fake.child;
    });
    const runner = new BuildRunner();

    const first = runner.run(command);
    await vi.waitFor(() => expect(runner.phase).toBe('streaming'));

    await expect(runner.run(command)).rejects.toBeInstanceOf(BuildInProgressError);
    expect(spawn).toHaveBeenCalledTimes(1);

    children[0].finish();
    await expect(first).resolves.toMatchObject({ status: 'success' });
    expect(runner.busy).toBe(false);

    vi.mocked(spawn).mockImplementation(() => makeChild({ code: 0 }).child);
    await expect(runner.run(command)).resolves.toMatchObject({ status: 'success' });
    expect(spawn).toHaveBeenCalledTimes(2);
  });

  it('keeps only the configured amount of output', async () => {
    vi.mocked(spawn).mockImplementation(
      () => makeChild({ output: [{ out: 'x'.repeat(50) }, { out: 'tail-end' }], code: 1 }).child
    );

    const result = await new BuildRunner({ maxOutputChars: 12 }).run(command);

    expect(result.status).toBe('failure');
    if (result.status !== 'failure') return;
    expect(result.error).toMatchObject({ output: 'xxxxtail-end' });
  });

  it('keeps delivering output when the observer throws', async () => {
    vi.mocked(spawn).mockImplementation(() => makeChild({ output: [{ out: 'a' }, { out: 'b' }], code: 0 }).child);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const seen: string[] = [];

    const result = await new BuildRunner().run(command, (chunk) => {
      seen.push(chunk);
      throw new Error('sink closed');
    });

    expect(seen).toEqual(['a', 'b']);
    expect(result.status).toBe('success');
    expect(errorSpy).toHaveBeenCalledWith('Output observer failed: sink closed');
    errorSpy.mockRestore();
  });
});
