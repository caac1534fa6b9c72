/**
 * Runs `task` over `items` with at most `batchSize` calls in flight. Results are
 * written by position, so the output order always matches the input order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);

  for (let start = 0; start < items.length; start += batchSize) {
    const batch = items.slice(start, start + batchSize);
    const batchResults = await Promise.all(batch.map((item, offset) => task(item, start + offset)));

    batchResults.forEach((result, offset) => {
      results[start + offset] = result;
    });
  }

  return results;
}
