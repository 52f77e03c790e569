/**
 * Fixed-size worker pool
 */

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * Results are stored at the index of their input, so the output order does
 * not depend on completion order. Once `signal` aborts no new item is
 * started; slots for items never started stay `undefined`.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
