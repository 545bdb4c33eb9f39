import { TranslationError } from '@connect-migrator/core';

/**
 * Calls fn for every item with at most `limit` calls pending.
 * Results keep input order; the first rejection rejects the whole batch.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new TranslationError({
      code: 'CONFIGURATION_ERROR',
      message: `Concurrency must be an integer >= 1 (got ${limit})`,
    });
  }

  const results = new Array<R>(items.length);
  // Shared by all workers: each entry is taken exactly once
  const pending = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await fn(item, index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}
