export type CacheEntry<V> = {
  value: V;
  storedAt: number;
  etag?: string;
};

export const DEFAULT_MAX_ENTRIES = 1000;

/**
 * Keyed cache with a fixed time-to-live.
 *
 * Expired entries are kept so callers can revalidate them with their ETag,
 * up to `maxEntries`; past that the least recently stored entry is evicted.
 * A TTL of 0 disables the cache.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
    private readonly maxEntries = DEFAULT_MAX_ENTRIES
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.now() - entry.storedAt >= this.ttlMs) return undefined;
    return entry.value;
  }

  peek(key: string): CacheEntry<V> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V, etag?: string) {
    if (this.ttlMs <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now(), etag });
    this.evict();
  }

  /** Marks a still-valid entry (e.g. after a 304) as fresh again. */
  touch(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    entry.storedAt = this.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  private evict() {
    // Map iteration follows insertion order, oldest first
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(key);
    }
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear() {
    this.entries.clear();
  }

  get size() {
    return this.entries.size;
  }
}
