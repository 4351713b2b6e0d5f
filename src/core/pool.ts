/**
 * Runs `task` over `items` with at most `workerCount` calls in flight. Results
 * keep input order; a rejected call becomes a rejected settlement and never
 * stops its siblings.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  workerCount: number,
  task: (item: T, index: number) => Promise<R>
): Promise<Array<PromiseSettledResult<R>>> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const active = new Set<Promise<void>>();
  const limit = Math.max(1, Math.floor(workerCount));

  const scheduleNext = (): void => {
    while (active.size < limit && queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const run = Promise.resolve()
        .then(() => task(next.item, next.index))
        .then(
          (value) => {
            results[next.index] = { status: 'fulfilled', value };
          },
          (reason: unknown) => {
            results[next.index] = { status: 'rejected', reason };
          }
        )
        .then(() => {
          active.delete(run);
        });
      active.add(run);
    }
  };

  scheduleNext();
  while (active.size > 0) {
    await Promise.race(active);
    scheduleNext();
  }
  return results;
}
