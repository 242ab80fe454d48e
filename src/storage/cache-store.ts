/**
 * Storage contract for one cache tier. Values are opaque serialized text;
 * each store enforces its own expiry.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  remove(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}

export type Clock = () => number;

interface StoredValue {
  value: string;
  expiresAt: number;
}

export interface MemoryCacheStoreOptions {
  name?: string;
  // Least recently used entries are evicted beyond this count
  maxEntries?: number;
  now?: Clock;
}

/**
 * Process-local cache store. Serves as the local tier, and as the backing
 * tier when no Redis connection is configured.
 */
export class MemoryCacheStore implements CacheStore {
  readonly name: string;
  private entries: Map<string, StoredValue> = new Map();
  private maxEntries: number;
  private now: Clock;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.name = options.name ?? 'memory';
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) return null;

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.delete(key);
    if (ttlMs <= 0) return;

    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    this.evict();
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  /**
   * Drop every expired entry, returning how many were removed.
   */
  async cleanup(): Promise<number> {
    const now = this.now();
    let cleaned = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        cleaned++;
      }
    }
    return cleaned;
  }

  private live(key: string): StoredValue | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
