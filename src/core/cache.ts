/**
 * LRU Cache with optional TTL
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface LRUCacheOptions {
  /** Maximum number of entries (default: 100) */
  maxSize?: number;
  /** Entry lifetime in ms; 0 keeps entries until evicted (default: 0) */
  ttl?: number;
}

/**
 * Least Recently Used cache. Map iteration order doubles as recency order.
 */
export class LRUCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttl: number;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? 100);
    this.ttl = options.ttl ?? 0;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    const expiresAt = this.ttl > 0 ? Date.now() + this.ttl : Number.POSITIVE_INFINITY;
    this.entries.set(key, { value, expiresAt });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return Date.now() > entry.expiresAt;
  }
}
