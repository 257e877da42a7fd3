/**
 * Tests for the serial task queue
 */

import { SerialQueue } from '../../utils/serialQueue';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const slow = queue.run(async () => {
      events.push('slow:start');
      await delay(20);
      events.push('slow:end');
      return 'slow';
    });
    const fast = queue.run(async () => {
      events.push('fast:start');
      return 'fast';
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast:start']);
  });

  it('keeps going after a task fails', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('tracks pending tasks until idle', async () => {
    const queue = new SerialQueue();

    void queue.run(() => delay(5));
    void queue.run(() => delay(5));
    expect(queue.size).toBe(2);

    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
