/**
 * Bounded worker pool over p-limit
 */

import pLimit from 'p-limit';

/**
 * Runs `worker` over `items` with at most `concurrency` in flight
 *
 * Workers handle their own local failures; anything a worker throws stops
 * the pool: queued items are skipped, in-flight ones settle, then the
 * first error is rethrown.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  const state: { failure: { error: unknown } | null } = { failure: null };

  await Promise.all(
    items.map((item, index) =>
      limit(async () => {
        if (state.failure) {
          return;
        }
        try {
          await worker(item, index);
        } catch (error) {
          state.failure ??= { error };
        }
      })
    )
  );

  if (state.failure) {
    throw state.failure.error;
  }
}
