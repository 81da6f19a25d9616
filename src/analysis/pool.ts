/**
 * Bounded async worker pool.
 */

export interface PoolOptions {
  concurrency: number;
  /** Checked before each item is started; in-flight items always finish */
  signal?: AbortSignal;
}

export interface PoolOutcome<R> {
  /** results[i] belongs to items[i]; undefined for items never started */
  results: (R | undefined)[];
  completed: number;
  /** The signal fired at some point during the run */
  aborted: boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Each worker writes only its own slot, so completion order does not
 * affect the result layout. `worker` is expected not to reject.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolOutcome<R>> {
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  const size = Math.max(1, Math.min(options.concurrency, items.length));
  let cursor = 0;
  let completed = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length && !options.signal?.aborted) {
      const index = cursor++;
      results[index] = await worker(items[index], index);
      completed++;
    }
  };

  await Promise.all(Array.from({ length: size }, () => lane()));

  return {
    results,
    completed,
    aborted: options.signal?.aborted === true,
  };
}
