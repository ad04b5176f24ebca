interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory cache with a fixed time-to-live per entry.
 * Expired entries are dropped lazily on read. A TTL of 0 disables caching.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private inflight = new Map<string, Promise<T>>();

  constructor(private readonly ttlMs: number) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  /**
   * Return the cached value for `key`, or run `load` and cache its result.
   * Concurrent callers for the same key share one in-flight load; a failed
   * load is not cached.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<{ value: T; hit: boolean }> {
    const cachedValue = this.get(key);
    if (cachedValue !== undefined) return { value: cachedValue, hit: true };

    let pending = this.inflight.get(key);
    if (!pending) {
      pending = load().finally(() => this.inflight.delete(key));
      this.inflight.set(key, pending);
    }
    const value = await pending;
    this.set(key, value);
    return { value, hit: false };
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.inflight.clear();
  }
}
