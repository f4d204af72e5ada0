/**
 * Map over `items` with at most `limit` calls in flight. Results keep the
 * input order. After the first failure no new items are started; calls
 * already running are awaited before the failure is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async () => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, worker));
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
  }
  return results;
}
