// src/cache/ttl-cache.ts

interface CacheEntry<T> {
  value: T;
  expiresAt: number; // epoch ms
}

export interface TtlCacheOptions {
  ttlSeconds: number;
  maxSize: number;
}

/**
 * In-memory key/value store with a per-entry TTL and an entry-count ceiling.
 *
 * Expiry is lazy: every `get`/`set` first drops entries whose deadline has
 * passed. When full, `set` evicts the entry closest to expiry.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  readonly maxSize: number;

  constructor(options: TtlCacheOptions) {
    const { ttlSeconds, maxSize } = options;
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`ttlSeconds must be positive, got ${ttlSeconds}`);
    }
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new Error(`maxSize must be a positive integer, got ${maxSize}`);
    }
    this.ttlMs = ttlSeconds * 1000;
    this.maxSize = maxSize;
  }

  get(key: string): T | undefined {
    const now = Date.now();
    this.evictExpired(now);
    const entry = this.entries.get(key);
    if (!entry || now >= entry.expiresAt) return undefined;
    return entry.value;
  }

  set(key: string, value: T): void {
    const now = Date.now();
    this.evictExpired(now);
    if (this.entries.size >= this.maxSize && !this.entries.has(key)) {
      this.evictSoonestToExpire();
    }
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(now: number) {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  // Linear scan; fine for the few thousand entries this cache is sized for.
  private evictSoonestToExpire() {
    let victim: string | undefined;
    let soonest = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt < soonest) {
        soonest = entry.expiresAt;
        victim = key;
      }
    }
    if (victim !== undefined) this.entries.delete(victim);
  }
}
