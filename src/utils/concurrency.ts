/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`. The first rejection rejects the
 * returned promise, so workers whose failures belong in the results should
 * catch their own errors.
 */
export async function processInParallel<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(lanes);
  return results;
}
