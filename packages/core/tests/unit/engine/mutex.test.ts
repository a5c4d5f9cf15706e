import { describe, expect, it } from 'vitest';
import { Mutex } from '../../../src/engine/mutex.js';

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
    const order: number[] = [];
    const first = await mutex.acquire();

    const waiters = [1, 2, 3].map((n) =>
      mutex.acquire().then((release) => {
        order.push(n);
        release();
      }),
    );

    expect(order).toEqual([]);
    first();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it('ignores a second call to the same release function', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiter = mutex.acquire();
    release();
    release();
    const second = await waiter;
    expect(mutex.isLocked).toBe(true);
    second();
    expect(mutex.isLocked).toBe(false);
  });

  it('runExclusive returns the value and releases on throw', async () => {
    const mutex = new Mutex();
    expect(await mutex.runExclusive(() => 42)).toBe(42);
    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });

  it('never lets two critical sections overlap', async () => {
    const mutex = new Mutex();
    let inside = 0;
    let maxInside = 0;

    await Promise.all(
      Array.from({ length: 20 }, async () => {
        const release = await mutex.acquire();
        inside++;
        maxInside = Math.max(maxInside, inside);
        await Promise.resolve();
        inside--;
        release();
      }),
    );

    expect(maxInside).toBe(1);
  });
});
