import { InputValidationError } from '@era5-weather/core';

export type PoolOutcome<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; reason: unknown };

export interface PoolOptions {
  concurrency: number;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * A rejected item never stops the others; outcomes come back in input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<Array<PoolOutcome<T, R>>> {
  const { concurrency } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InputValidationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const outcomes: Array<PoolOutcome<T, R>> = [];
  let next = 0;

  const runNext = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      try {
        const value = await worker(item, index);
        outcomes[index] = { item, status: 'fulfilled', value };
      } catch (reason) {
        outcomes[index] = { item, status: 'rejected', reason };
      }
    }
  };

  const runners = Array.from({ length: Math.min(concurrency, items.length) }, () => runNext());
  await Promise.all(runners);
  return outcomes;
}
