import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter, resolveConcurrency } from '../../../src/rollout/concurrency-limiter.js';
import { sleep } from '../../helpers/fleet-fakes.js';

describe('ConcurrencyLimiter', () => {
  it('rejects a limit below one', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('maxConcurrent must be an integer >= 1 (got 0)');
    expect(() => new ConcurrencyLimiter(1.5)).toThrow('maxConcurrent must be an integer >= 1 (got 1.5)');
  });

  it('never runs more than the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        limiter.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await sleep(5);
          running--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(limiter.getActiveCount()).toBe(0);
    expect(limiter.getQueuedCount()).toBe(0);
  });

  it('grants slots in request order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        limiter.run(async () => {
          order.push(n);
          await sleep(1);
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
  });

  it('queues waiters and releases the slot when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await limiter.acquire();

    const waiting = limiter.run(async () => 'second');
    expect(limiter.getQueuedCount()).toBe(1);

    limiter.release();
    await expect(waiting).resolves.toBe('second');

    await expect(limiter.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(limiter.getActiveCount()).toBe(0);
  });
});

describe('resolveConcurrency', () => {
  it('uses the batch length when no limit is set', () => {
    expect(resolveConcurrency(4, undefined, undefined)).toBe(4);
  });

  it('takes the smallest limit', () => {
    expect(resolveConcurrency(4, 3, undefined)).toBe(3);
    expect(resolveConcurrency(4, undefined, 2)).toBe(2);
    expect(resolveConcurrency(4, 3, 2)).toBe(2);
    expect(resolveConcurrency(2, 8, 10)).toBe(2);
  });

  it('ignores limits below one', () => {
    expect(resolveConcurrency(3, 0)).toBe(3);
  });
});
