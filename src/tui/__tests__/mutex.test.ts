/**
 * Mutex Tests
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '../mutex.js';

describe('Mutex', () => {
  it('grants the lock immediately when free', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();

    expect(mutex.isLocked).toBe(true);
    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('hands the lock to waiters in FIFO order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const release = await mutex.acquire();

    const first = mutex.runExclusive(() => {
      order.push('first');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    expect(order).toEqual([]);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('ignores a second call of the same release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    release();

    const next = await mutex.acquire();
    release();

    expect(mutex.isLocked).toBe(true);
    next();
    expect(mutex.isLocked).toBe(false);
  });

  it('releases when the exclusive function throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });

  it('returns the exclusive function result', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(async () => 42)).resolves.toBe(42);
  });
});
