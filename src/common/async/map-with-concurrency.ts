/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  const workers = Array.from({ length: Math.min(Math.max(1, limit), queue.length) }).map(async () => {
    while (queue.length) {
      const job = queue.shift();
      if (!job) break;
      results[job.index] = await fn(job.item, job.index);
    }
  });

  await Promise.all(workers);
  return results;
}
