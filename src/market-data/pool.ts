/**
 * Bounded worker pool over a list of items.
 *
 * At most `concurrency` calls to `worker` are pending at once. Results come
 * back in input order as settled results, so one rejected item never hides
 * the others.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  if (items.length === 0) {
    return [];
  }

  const limit = Math.max(1, Math.min(items.length, Math.floor(concurrency) || 1));
  const results = new Array<PromiseSettledResult<R>>(items.length);
  let cursor = 0;

  async function runOneWorker(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason: unknown) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}
