/**
 * Bounded LRU cache with optional time-to-live.
 *
 * Map insertion order doubles as recency order: reads and writes move an
 * entry to the end, eviction takes from the front.
 */

export interface LRUCacheOptions<T> {
  /** Maximum number of entries before the least recently used is evicted */
  maxSize: number;
  /** Entries idle longer than this are treated as absent (optional) */
  ttlMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

interface CacheEntry<T> {
  value: T;
  /** Last access time; TTL is measured from here (sliding expiry) */
  touchedAt: number;
}

export class LRUCache<T> {
  private readonly cache = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;
  private readonly ttlMs?: number;
  private readonly now: () => number;

  constructor(options: LRUCacheOptions<T>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new Error(`LRUCache maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  set(key: string, value: T): void {
    // Delete first so the entry moves to the most-recent position
    if (this.cache.has(key)) {
      this.delete(key);
    }
    this.cache.set(key, { value, touchedAt: this.now() });
    this.evictToLimit();
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.delete(key);
      return undefined;
    }

    entry.touchedAt = this.now();
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  /**
   * Remove every expired entry.
   * @returns Number of entries removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of [...this.cache.entries()]) {
      if (this.isExpired(entry)) {
        this.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Entry count, including entries that expired but were not yet touched */
  get size(): number {
    return this.cache.size;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.ttlMs !== undefined && this.now() - entry.touchedAt > this.ttlMs;
  }

  private evictToLimit(): void {
    while (this.cache.size > this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.delete(oldest.value);
    }
  }
}
