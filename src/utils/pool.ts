import { availableParallelism } from 'node:os';

export function defaultConcurrency(): number {
  return Math.min(8, Math.max(2, availableParallelism()));
}

const nextTick = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Cooperative scheduling of `task` over `items` on at most `concurrency`
 * lanes. All lanes share the calling thread: a lane yields to the event loop
 * before each item, so other work interleaves, but no two tasks run at the
 * same time. Results keep the order of `items`.
 */
export async function mapCooperatively<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => R,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      await nextTick();
      results[index] = task(items[index], index);
    }
  };
  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
  return results;
}
