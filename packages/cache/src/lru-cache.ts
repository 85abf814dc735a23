import { logger, type Logger } from '@tenantune/logger';

export interface LruCacheEntry<V> {
  key: string;
  value: V;
  size: number;
  lastAccess: number;
  expiry?: number;
}

/**
 * Receives hit/miss/eviction counts; implemented by the metrics layer.
 */
export interface CacheMetricsSink {
  cacheHit(cache: string): void;
  cacheMiss(cache: string): void;
  cacheEviction(cache: string): void;
}

export interface LruCacheOptions<V> {
  name: string;
  /** Total capacity in the units returned by `sizeOf`. */
  capacity: number;
  /** Defaults to 1 per entry, making `capacity` an entry count. */
  sizeOf?: (value: V) => number;
  defaultTTL?: number;
  cleanupInterval?: number;
  metrics?: CacheMetricsSink;
}

export interface LruCacheStats {
  name: string;
  entries: number;
  used: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/**
 * Size-bounded cache with least-recently-used eviction
 *
 * The backing Map is kept in recency order: every read re-inserts the key,
 * so the first key is always the eviction candidate. Entries are replaced,
 * never updated in place. An optional TTL expires entries lazily on read and
 * through a periodic sweep.
 */
export class LruCache<V> {
  private data = new Map<string, LruCacheEntry<V>>();
  private used = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private cleanupTimer?: NodeJS.Timeout;

  readonly name: string;
  readonly capacity: number;
  private readonly sizeOf: (value: V) => number;
  private readonly defaultTTL?: number;
  private readonly metrics?: CacheMetricsSink;
  private readonly log: Logger;

  constructor(options: LruCacheOptions<V>) {
    if (!(options.capacity > 0)) {
      throw new RangeError(`Cache ${options.name} needs a positive capacity`);
    }
    this.name = options.name;
    this.capacity = options.capacity;
    this.sizeOf = options.sizeOf ?? (() => 1);
    this.defaultTTL = options.defaultTTL;
    this.metrics = options.metrics;
    this.log = logger.child({ component: 'lru-cache', cache: options.name });

    if (this.defaultTTL !== undefined) {
      this.cleanupTimer = setInterval(() => this.cleanup(), options.cleanupInterval ?? 60000);
      this.cleanupTimer.unref();
    }
  }

  /**
   * Counted lookup: refreshes recency on a hit.
   */
  get(key: string): V | undefined {
    const entry = this.data.get(key);
    if (!entry || this.isExpired(entry)) {
      if (entry) this.remove(key, entry);
      this.misses++;
      this.metrics?.cacheMiss(this.name);
      return undefined;
    }

    this.data.delete(key);
    this.data.set(key, { ...entry, lastAccess: Date.now() });
    this.hits++;
    this.metrics?.cacheHit(this.name);
    return entry.value;
  }

  /**
   * Uncounted lookup that leaves recency untouched.
   */
  peek(key: string): V | undefined {
    const entry = this.data.get(key);
    if (!entry || this.isExpired(entry)) return undefined;
    return entry.value;
  }

  has(key: string): boolean {
    return this.peek(key) !== undefined;
  }

  /**
   * Stores a value, evicting LRU entries until it fits. Returns false when the
   * value alone exceeds the capacity; nothing is evicted in that case.
   */
  set(key: string, value: V, ttl?: number): boolean {
    const size = this.sizeOf(value);
    if (size > this.capacity) {
      this.log.warn({ key, size, capacity: this.capacity }, 'Cache entry exceeds capacity, not cached');
      return false;
    }

    const previous = this.data.get(key);
    if (previous) this.remove(key, previous);

    while (this.used + size > this.capacity) {
      this.evictLRU();
    }

    const effectiveTTL = ttl ?? this.defaultTTL;
    this.data.set(key, {
      key,
      value,
      size,
      lastAccess: Date.now(),
      expiry: effectiveTTL === undefined ? undefined : Date.now() + effectiveTTL,
    });
    this.used += size;

    this.log.debug({ key, size, used: this.used, capacity: this.capacity }, 'Cache entry set');
    return true;
  }

  delete(key: string): boolean {
    const entry = this.data.get(key);
    if (!entry) return false;
    this.remove(key, entry);
    return true;
  }

  clear(): void {
    this.data.clear();
    this.used = 0;
  }

  get size(): number {
    return this.data.size;
  }

  get usedCapacity(): number {
    return this.used;
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): string[] {
    return Array.from(this.data.keys());
  }

  entry(key: string): Readonly<LruCacheEntry<V>> | undefined {
    return this.data.get(key);
  }

  stats(): LruCacheStats {
    const lookups = this.hits + this.misses;
    return {
      name: this.name,
      entries: this.data.size,
      used: this.used,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  cleanup(): number {
    let removed = 0;
    for (const [key, entry] of this.data) {
      if (this.isExpired(entry)) {
        this.remove(key, entry);
        removed++;
      }
    }

    if (removed > 0) {
      this.log.debug({ removed, remaining: this.data.size }, 'Cache cleanup completed');
    }
    return removed;
  }

  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.clear();
  }

  private evictLRU(): void {
    const oldest = this.data.entries().next();
    if (oldest.done) return;

    const [key, entry] = oldest.value;
    this.remove(key, entry);
    this.evictions++;
    this.metrics?.cacheEviction(this.name);

    this.log.debug({ evictedKey: key, size: entry.size, used: this.used }, 'Cache LRU eviction');
  }

  private remove(key: string, entry: LruCacheEntry<V>): void {
    this.data.delete(key);
    this.used -= entry.size;
  }

  private isExpired(entry: LruCacheEntry<V>): boolean {
    return entry.expiry !== undefined && Date.now() > entry.expiry;
  }
}
