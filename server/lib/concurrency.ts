/**
 * Counting semaphore: at most `permits` holders at a time, FIFO hand-off.
 */
export class Semaphore {
  private queue: Array<() => void> = [];
  private available: number;

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  public async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  public release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.available += 1;
    }
  }

  public async run<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Map over `items` with at most `limit` calls in flight. Results keep input
 * order regardless of completion order.
 *
 * After the first failure no further item is started; the returned promise
 * rejects with that failure once the calls already in flight have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const semaphore = new Semaphore(limit);
  const results = new Array<R>(items.length);
  const outcome: { failure?: { error: unknown } } = {};

  await Promise.all(
    items.map((item, index) =>
      semaphore.run(async () => {
        if (outcome.failure) return;
        try {
          results[index] = await fn(item, index);
        } catch (err) {
          if (!outcome.failure) outcome.failure = { error: err };
        }
      })
    )
  );

  if (outcome.failure) throw outcome.failure.error;
  return results;
}
