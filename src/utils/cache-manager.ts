interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  hits: number;
}

export interface CacheStats {
  size: number;
  validEntries: number;
  totalHits: number;
  avgHits: number;
}

/**
 * Map with per-entry expiry. Expired entries are dropped lazily on read and
 * in bulk by `cleanup()`.
 */
export class CacheManager<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();

  constructor(
    private readonly defaultTTL: number = 300000, // 5 minutes
    private readonly now: () => number = Date.now
  ) {}

  set(key: string, value: T, ttl?: number): void {
    this.cache.set(key, {
      value,
      expiresAt: this.now() + (ttl ?? this.defaultTTL),
      hits: 0,
    });
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);

    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    entry.hits++;
    return entry.value;
  }

  /** Pushes the expiry of a live entry forward; false if it is gone. */
  touch(key: string, ttl?: number): boolean {
    const entry = this.cache.get(key);
    if (!entry || this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return false;
    }
    entry.expiresAt = this.now() + (ttl ?? this.defaultTTL);
    return true;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): CacheStats {
    let totalHits = 0;
    let validEntries = 0;
    const now = this.now();

    this.cache.forEach(entry => {
      if (now <= entry.expiresAt) {
        validEntries++;
        totalHits += entry.hits;
      }
    });

    return {
      size: this.cache.size,
      validEntries,
      totalHits,
      avgHits: validEntries > 0 ? totalHits / validEntries : 0,
    };
  }

  /** Removes expired entries and returns how many were dropped. */
  cleanup(): number {
    const now = this.now();
    const keysToDelete: string[] = [];

    this.cache.forEach((entry, key) => {
      if (now > entry.expiresAt) {
        keysToDelete.push(key);
      }
    });

    keysToDelete.forEach(key => this.cache.delete(key));
    return keysToDelete.length;
  }
}
