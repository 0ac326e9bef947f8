/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep the
 * order of `items` regardless of completion order.
 */
export async function mapWithConcurrency<I, O>(
  items: readonly I[],
  limit: number,
  fn: (item: I, index: number) => Promise<O>,
): Promise<O[]> {
  if (items.length === 0) {
    return [];
  }
  const results: O[] = [];
  let next = 0;

  const processNext = async (): Promise<void> => {
    while (next < items.length) {
      const current = next++;
      results[current] = await fn(items[current], current);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => processNext());
  await Promise.all(workers);
  return results;
}
