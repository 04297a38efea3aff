/**
 * Bounded-concurrency map over a list.
 *
 * At most `concurrency` workers run at once. A worker that throws yields
 * `undefined` in its slot; the others are unaffected. Results keep input order.
 */

import { logger } from "../utils/logger.js";

const log = logger.child({ component: "worker-pool" });

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = items.map(() => undefined);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        log.warn("Worker failed", {
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  return results;
}
