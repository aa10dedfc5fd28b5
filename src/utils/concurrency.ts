/**
 * Map over items with at most `limit` calls in flight. Results keep input order.
 * `fn` is expected to settle; a rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  // A non-finite limit runs one call at a time.
  const width = Number.isFinite(limit) ? Math.floor(limit) : 1;
  const workers = Array.from({ length: Math.max(1, Math.min(width, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
