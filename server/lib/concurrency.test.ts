import { describe, it, expect } from 'vitest';
import { Semaphore, mapWithConcurrency } from './concurrency';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should reject a non-positive permit count', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('should hand permits to waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    await semaphore.acquire();
    const a = semaphore.acquire().then(() => order.push('a'));
    const b = semaphore.acquire().then(() => order.push('b'));
    semaphore.release();
    await a;
    semaphore.release();
    await b;
    expect(order).toEqual(['a', 'b']);
  });
});

describe('mapWithConcurrency', () => {
  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 5));
      inFlight -= 1;
      return n * 10;
    });
    expect(results).toEqual([10, 20, 30, 40, 50, 60]);
    expect(peak).toBe(2);
  });

  it('should keep input order when later items finish first', async () => {
    const first = deferred<string>();
    const pending = mapWithConcurrency(['slow', 'fast'], 2, (item) =>
      item === 'slow' ? first.promise : Promise.resolve(item)
    );
    first.resolve('slow');
    expect(await pending).toEqual(['slow', 'fast']);
  });

  it('should reject with the first failure', async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (n) => {
        if (n === 2) throw new Error('second failed');
        return n;
      })
    ).rejects.toThrow('second failed');
  });

  it('should stop starting items after a failure and wait for those in flight', async () => {
    const slow = deferred<number>();
    const started: number[] = [];
    let rejected = false;

    const outcome = mapWithConcurrency([1, 2, 3, 4], 2, async (n) => {
      started.push(n);
      if (n === 1) throw new Error('first failed');
      if (n === 2) return slow.promise;
      return n;
    }).catch((err: unknown) => {
      rejected = true;
      return err instanceof Error ? err.message : String(err);
    });

    await new Promise((r) => setTimeout(r, 5));
    expect(rejected).toBe(false);

    slow.resolve(2);
    expect(await outcome).toBe('first failed');
    expect(started).toEqual([1, 2]);
  });
});
