import { logger } from '../../utils/logger';

export interface CacheEntry<T> {
  value: T;
  lastRefreshed: number;
}

/**
 * In-process cache holding one timestamped value per key. Owned by whoever
 * constructs it and passed to consumers explicitly.
 */
export class TimedCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, lastRefreshed: this.now() });
  }

  /**
   * Missing entries are stale. A max age of 0 makes every entry stale.
   */
  isStale(key: string, maxAgeMs: number): boolean {
    const entry = this.entries.get(key);
    if (!entry || maxAgeMs <= 0) {
      return true;
    }
    return this.now() - entry.lastRefreshed >= maxAgeMs;
  }

  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(key);
  }

  /**
   * Returns the cached value while fresh, otherwise runs `loader` once even
   * when several callers ask at the same time. A failed load leaves the
   * previous entry untouched and rejects every waiting caller.
   */
  async getOrRefresh(key: string, maxAgeMs: number, loader: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && !this.isStale(key, maxAgeMs)) {
      return entry.value;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const load = (async () => {
      try {
        const value = await loader();
        this.set(key, value);
        logger.debug(`[TimedCache] Refreshed ${key}`);
        return value;
      } finally {
        this.pending.delete(key);
      }
    })();
    this.pending.set(key, load);
    return load;
  }
}
