/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep
 * input order. If a call throws, no new calls start, in-flight ones are
 * awaited, then the first error is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const errors: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (errors.length === 0) {
      const job = queue.shift();
      if (!job) return;
      try {
        results[job.index] = await fn(job.item, job.index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  if (errors.length > 0) throw errors[0];
  return results;
}
