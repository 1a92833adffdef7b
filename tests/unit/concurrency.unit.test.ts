import { describe, expect, it } from 'vitest';

import { runBounded, TimeoutError, withTimeout } from '../../src/concurrency/bounded.js';
import { KeyedMutex } from '../../src/concurrency/keyed-mutex.js';
import { InMemoryRateLimitRepository } from '../../src/repositories/in-memory-rate-limit-repository.js';

describe('concurrency primitives', () => {
  it('never runs more workers than the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;

    const run = await runBounded([1, 2, 3, 4, 5, 6], 2, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return item * 10;
    });

    expect(peak).toBe(2);
    expect(run.completed.map(({ result }) => result)).toEqual([10, 20, 30, 40, 50, 60]);
    expect(run.skipped).toEqual([]);
  });

  it('reports items that had not started when the signal aborted as skipped', async () => {
    const controller = new AbortController();

    const run = await runBounded(['a', 'b', 'c', 'd'], 1, async (item) => {
      if (item === 'b') {
        controller.abort();
      }
      return item;
    }, controller.signal);

    expect(run.completed.map(({ item }) => item)).toEqual(['a', 'b']);
    expect(run.skipped).toEqual(['c', 'd']);
  });

  it('rejects with TimeoutError when an operation never settles', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10)).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(Promise.resolve('done'), 10)).resolves.toBe('done');
  });

  it('serializes work per key while other keys proceed', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const slow = mutex.runExclusive('sub-1', async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('sub-1:first');
    });
    const queued = mutex.runExclusive('sub-1', async () => {
      order.push('sub-1:second');
    });
    const other = mutex.runExclusive('sub-2', async () => {
      order.push('sub-2');
    });

    await Promise.all([slow, queued, other]);

    expect(order).toEqual(['sub-2', 'sub-1:first', 'sub-1:second']);
    expect(mutex.isLocked('sub-1')).toBe(false);
  });

  it('counts only allowed hits in the sliding window', async () => {
    const limiter = new InMemoryRateLimitRepository();

    expect((await limiter.hit('tenant-a:GET /v1', 0, 1_000, 2)).allowed).toBe(true);
    expect((await limiter.hit('tenant-a:GET /v1', 100, 1_000, 2)).allowed).toBe(true);
    expect(await limiter.hit('tenant-a:GET /v1', 200, 1_000, 2)).toEqual({ allowed: false, count: 2, oldestAtMs: 0 });
    expect((await limiter.hit('tenant-b:GET /v1', 200, 1_000, 2)).allowed).toBe(true);
    expect(await limiter.hit('tenant-a:GET /v1', 1_000, 1_000, 2)).toEqual({ allowed: true, count: 2, oldestAtMs: 100 });
  });
});
