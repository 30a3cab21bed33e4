/**
 * Tests for per-key task serialization.
 */
import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../../../src/core/cache/lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('should run tasks for the same key one at a time', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      lock.run('a', async () => {
        events.push('second:start');
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should run tasks for different keys concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events.indexOf('b:end')).toBeLessThan(events.indexOf('a:end'));
  });

  it('should keep going after a failed task', async () => {
    const lock = new KeyedLock();

    const failed = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
