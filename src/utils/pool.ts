/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Results keep the input order. A rejected worker rejects the pool.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${String(concurrency)}`);
  }

  const results = new Array<R>(items.length);
  // Lanes pull from one shared iterator, so each index is taken exactly once.
  const queue = items.entries();

  async function lane(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  }

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.all(lanes);
  return results;
}
