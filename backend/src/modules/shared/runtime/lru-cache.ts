/**
 * LRU CACHE
 * =========
 *
 * Process-local cache in front of the persistent store.
 *
 * - Bounded entry count, least-recently-used eviction
 * - TTL per class (LIVE / HISTORICAL / ANALYSIS), checked lazily on read
 * - An expired entry is a miss and is removed on the spot; there is no sweeper
 *
 * Map insertion order doubles as recency order: a hit re-inserts the key.
 */

import type { Clock } from '../../../common/host.deps.js';
import { systemClock } from '../../../common/host.deps.js';
import type { TtlClass } from '../../market-data/market-data.types.js';

export type TtlTable = Record<TtlClass, number>;

export interface LruEntry<T> {
  key: string;
  value: T;
  fetchedAt: number;
  ttlClass: TtlClass;
}

export interface LruCacheOptions {
  maxSize: number;
  ttl: TtlTable;
  clock?: Clock;
}

export class LruCache<T> {
  private map = new Map<string, LruEntry<T>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private readonly maxSize: number;
  private readonly ttl: TtlTable;
  private readonly clock: Clock;

  constructor(options: LruCacheOptions) {
    if (options.maxSize < 1) {
      throw new Error(`LruCache maxSize must be >= 1, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.ttl = options.ttl;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Get value if present and not expired
   */
  get(key: string): T | null {
    const entry = this.lookup(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: T, ttlClass: TtlClass, fetchedAt?: number): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      this.evictLru();
    }
    this.map.set(key, {
      key,
      value,
      fetchedAt: fetchedAt ?? this.clock.now(),
      ttlClass,
    });
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  /**
   * Delete every entry matching the predicate, returns how many went
   */
  deleteWhere(predicate: (key: string, value: T) => boolean): number {
    let removed = 0;
    for (const [key, entry] of this.map) {
      if (predicate(key, entry.value)) {
        this.map.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): number {
    const n = this.map.size;
    this.map.clear();
    return n;
  }

  /** Physical size, may include expired entries not yet read */
  size(): number {
    return this.map.size;
  }

  stats() {
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  private lookup(key: string): LruEntry<T> | null {
    const entry = this.map.get(key);
    if (!entry) return null;

    if (this.isExpired(entry)) {
      this.map.delete(key);
      this.expirations++;
      return null;
    }

    // Refresh recency
    this.map.delete(key);
    this.map.set(key, entry);
    return entry;
  }

  private isExpired(entry: LruEntry<T>): boolean {
    return this.clock.now() >= entry.fetchedAt + this.ttl[entry.ttlClass];
  }

  private evictLru(): void {
    const oldest = this.map.keys().next();
    if (!oldest.done) {
      this.map.delete(oldest.value);
      this.evictions++;
    }
  }
}
