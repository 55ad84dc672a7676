import { describe, expect, it } from 'vitest';
import { SerialQueue } from './serial-queue.js';

describe('SerialQueue', () => {
  it('should run tasks one at a time in order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = queue.run(() => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(queue.size).toBe(2);
    expect(events).toEqual(['first:start']);

    release();
    await expect(second).resolves.toBe(2);
    await first;
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('should keep going after a failed task', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
