/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 * Used to fan out per-item order lookups; pacing is left to the rate
 * limiter the processor goes through. Results come back in input order.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) return [];

  const results: R[] = new Array(items.length);
  let idx = 0;
  const getNextIndex = () => idx++;

  const workers = new Array(Math.min(Math.max(1, concurrency), items.length))
    .fill(0)
    .map(async () => {
      let myIdx: number;
      while ((myIdx = getNextIndex()) < items.length) {
        results[myIdx] = await processor(items[myIdx], myIdx);
      }
    });

  await Promise.all(workers);
  return results;
}
