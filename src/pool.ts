/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Workers
 * pull the next item only after finishing their current one, so an abort
 * stops dispatch between items without interrupting one in progress.
 *
 * `worker` is expected to handle its own failures; a rejection propagates
 * once every other in-flight item has settled.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<{ completed: number; aborted: boolean }> {
  let next = 0;
  let completed = 0;
  const workerCount = Math.max(1, Math.min(concurrency, items.length));

  const results = await Promise.allSettled(
    Array.from({ length: workerCount }, async () => {
      while (next < items.length) {
        if (signal?.aborted) {
          return;
        }

        const index = next++;
        await worker(items[index], index);
        completed++;
      }
    })
  );

  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }

  return { completed, aborted: signal?.aborted === true && completed < items.length };
}
