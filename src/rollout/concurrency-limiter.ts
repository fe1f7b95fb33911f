/**
 * Concurrency Limiter
 *
 * FIFO semaphore bounding how many hosts of a batch are processed at once,
 * for RemoteExecutors that advertise a connection-count ceiling.
 */

export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be an integer >= 1 (got ${maxConcurrent})`);
    }
  }

  /**
   * Wait for a free slot. Slots are granted in request order.
   */
  public async acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Release a slot, handing it directly to the next waiter if any.
   */
  public release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.active > 0) {
      this.active -= 1;
    }
  }

  /**
   * Run `task` inside a slot.
   */
  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  public getActiveCount(): number {
    return this.active;
  }

  public getQueuedCount(): number {
    return this.waiters.length;
  }
}

/**
 * Effective in-batch concurrency: the smallest defined bound.
 */
export function resolveConcurrency(
  batchLength: number,
  ...limits: Array<number | undefined>
): number {
  let bound = batchLength;
  for (const limit of limits) {
    if (limit !== undefined && limit >= 1) {
      bound = Math.min(bound, Math.floor(limit));
    }
  }
  return Math.max(1, bound);
}
