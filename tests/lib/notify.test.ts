import { describe, it, expect, vi } from 'vitest';
import { NotificationChannel } from '@/lib/notify.js';
import type { Notification } from '@/lib/notify.js';

const output = (chunk: string): Notification => ({ kind: 'output', chunk });

describe('NotificationChannel', () => {
  it('delivers on a later turn, never synchronously', async () => {
    const sink = vi.fn();
    const channel = new NotificationChannel(sink);

    channel.post(output('a'));
    expect(sink).not.toHaveBeenCalled();
    expect(channel.pending).toBe(1);

    await channel.drain();
    expect(sink).toHaveBeenCalledWith({ kind: 'output', chunk: 'a' });
    expect(channel.pending).toBe(0);
  });

  it('preserves posting order', async () => {
    const received: string[] = [];
    const channel = new NotificationChannel((n) => {
      if (n.kind === 'output') received.push(n.chunk);
    });

    channel.post(output('1'));
    channel.post(output('2'));
    await new Promise((resolve) => setImmediate(resolve));
    channel.post(output('3'));
    await channel.drain();

    expect(received).toEqual(['1', '2', '3']);
  });

  it('resolves drain immediately when nothing is pending', async () => {
    const channel = new NotificationChannel(vi.fn());
    await expect(channel.drain()).resolves.toBeUndefined();
  });

  it('keeps delivering after a sink failure', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const received: string[] = [];
    const channel = new NotificationChannel((n) => {
      if (n.kind !== 'output') return;
      if (n.chunk === 'bad') throw new Error('render failed');
      received.push(n.chunk);
    });

    channel.post(output('bad'));
    channel.post(output('good'));
    await channel.drain();

    expect(received).toEqual(['good']);
    expect(errorSpy).toHaveBeenCalledWith("Notification sink failed on 'output': render failed");
    errorSpy.mockRestore();
  });

  it('waits for notifications posted by the sink itself', async () => {
    const received: string[] = [];
    const channel: NotificationChannel = new NotificationChannel((n) => {
      if (n.kind !== 'output') return;
      received.push(n.chunk);
      if (n.chunk === 'first') channel.post(output('follow-up'));
    });

    channel.post(output('first'));
    await channel.drain();

    expect(received).toEqual(['first', 'follow-up']);
  });
});
