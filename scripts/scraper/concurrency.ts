import { errorMessage } from './errors';
import { error as logError } from './logger';

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

export type PoolOptions<R> = {
  concurrency: number;
  // Called as each item finishes, in completion order.
  onSettled?: (result: Settled<R>, idx: number) => void;
};

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Results keep the index of their item; a rejected worker never stops the others.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, idx: number) => Promise<R>,
  opts: PoolOptions<R>
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length);
  let index = 0;
  async function next(): Promise<void> {
    while (index < items.length) {
      const i = index++;
      let result: Settled<R>;
      try {
        result = { ok: true, value: await worker(items[i], i) };
      } catch (err) {
        logError(`Error on item ${i}:`, errorMessage(err));
        result = { ok: false, error: err };
      }
      results[i] = result;
      opts.onSettled?.(result, i);
    }
  }
  const lanes = Math.max(1, Math.min(opts.concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, next));
  return results;
}
