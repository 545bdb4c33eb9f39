import type { SimilarityProvider } from '../types/similarity.js';

export interface CachedSimilarityOptions {
  /** Entries kept before the oldest is evicted (default: 10000) */
  maxEntries?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Memoises scores of another provider.
 *
 * Template property texts repeat for every connector of the same class, so
 * one instance is shared across a batch. In-flight lookups are shared too;
 * a rejected lookup is not cached.
 */
export class CachedSimilarityProvider implements SimilarityProvider {
  readonly name: string;
  private readonly cache = new Map<string, Promise<number>>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly inner: SimilarityProvider,
    options: CachedSimilarityOptions = {}
  ) {
    this.name = `cached(${inner.name})`;
    this.maxEntries = Math.max(1, options.maxEntries ?? 10_000);
  }

  score(left: string, right: string): Promise<number> {
    const key = `${left}\u001F${right}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const pending = this.inner.score(left, right).catch((error: unknown) => {
      this.cache.delete(key);
      throw error;
    });

    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, pending);
    return pending;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
