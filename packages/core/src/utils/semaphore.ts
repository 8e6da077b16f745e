// packages/core/src/utils/semaphore.ts — Bounded concurrency for file reads and registry lookups

/** Promise-based semaphore. */
export class AsyncSemaphore {
  private queue: Array<() => void> = [];
  private running = 0;

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) next();
  }
}

/**
 * Like `Promise.all(items.map(fn))` with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new AsyncSemaphore(limit);
  return Promise.all(
    items.map(async (item, index) => {
      await semaphore.acquire();
      try {
        return await fn(item, index);
      } finally {
        semaphore.release();
      }
    }),
  );
}
