import { describe, it, expect } from 'vitest';

import { Mutex } from '../../src/lib/mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('Mutex', () => {
  it('should run tasks one at a time in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive(async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      mutex.runExclusive(async () => {
        events.push('second:start');
        await delay(1);
        events.push('second:end');
      }),
      mutex.runExclusive(() => {
        events.push('third');
      })
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end', 'third']);
  });

  it('should return the task result', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('should release after a failing task', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
    expect(mutex.isLocked()).toBe(false);
  });

  it('should report whether it is held', async () => {
    const mutex = new Mutex();
    const running = mutex.runExclusive(() => delay(5));

    expect(mutex.isLocked()).toBe(true);
    await running;
    expect(mutex.isLocked()).toBe(false);
  });
});
