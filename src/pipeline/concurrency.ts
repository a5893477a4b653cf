/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep input order; an item whose call throws yields its Error.
 * A limit below one is treated as one.
 */
export async function mapWithConcurrency<I, T>(
  items: readonly I[],
  limit: number,
  fn: (item: I, index: number) => Promise<T>,
): Promise<Array<T | Error>> {
  const results = new Array<T | Error>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  const worker = async (): Promise<void> => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      try {
        results[next.index] = await fn(next.item, next.index);
      } catch (err) {
        results[next.index] = err instanceof Error ? err : new Error(String(err));
      }
    }
  };

  const width = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: width }, worker));
  return results;
}
