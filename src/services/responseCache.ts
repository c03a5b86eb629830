/**
 * In-memory memo of resolved query answers, keyed by normalized query and
 * grouped by tags so a write-through can drop every answer it made stale.
 */

export interface ResponseCache<V> {
  get(key: string): V | undefined;
  set(key: string, value: V, tags?: string[]): void;
  /** Drop every entry carrying `tag`; returns how many were removed. */
  invalidateTag(tag: string): number;
  clear(): void;
}

export interface TtlResponseCacheOptions {
  /** 0 disables the cache. */
  ttlSeconds: number;
  maxEntries: number;
  now?: () => number; // ms epoch
}

type CacheEntry<V> = {
  value: V;
  expiresAt: number;
  tags: string[];
};

export class TtlResponseCache<V> implements ResponseCache<V> {
  private readonly map = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(opts: TtlResponseCacheOptions) {
    this.ttlMs = Math.max(0, opts.ttlSeconds) * 1000;
    this.maxEntries = Math.max(0, Math.floor(opts.maxEntries));
    this.now = opts.now ?? (() => Date.now());
  }

  get enabled(): boolean {
    return this.ttlMs > 0 && this.maxEntries > 0;
  }

  get(key: string): V | undefined {
    const entry = this.map.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V, tags: string[] = []): void {
    if (!this.enabled) return;
    this.map.delete(key);
    // Evict in insertion order once full.
    while (this.map.size >= this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
    }
    this.map.set(key, { value, expiresAt: this.now() + this.ttlMs, tags });
  }

  invalidateTag(tag: string): number {
    let removed = 0;
    for (const [key, entry] of this.map) {
      if (entry.tags.includes(tag)) {
        this.map.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  stats() {
    return { size: this.map.size, hits: this.hits, misses: this.misses };
  }
}
