/**
 * Concurrency helpers for upload and text-retrieval batches.
 *
 * @module utils/concurrency
 */

/**
 * Split items into consecutive slices of at most `size` elements.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Run `fn` over every item with at most `limit` calls in flight.
 * Results come back in input order. The first rejection rejects the whole
 * call once in-flight work settles; no new work is started after it.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const workers = Math.max(1, Math.min(limit, items.length));
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
