/**
 * @fileoverview Exact-match LRU cache
 *
 * Fixed-capacity cache from a query fingerprint to a ranked result list. Both
 * lookup and insert refresh recency; inserting past capacity evicts the least
 * recently used entry. `Map` iteration order is insertion order, so the first
 * key is always the eviction candidate and "touching" an entry is a
 * delete-then-set.
 *
 * Every method is a synchronous section over the map (see core/snapshot.ts);
 * values are deep-copied on the way in and on the way out.
 *
 * @packageDocumentation
 */

import { ValidationError, type CacheTier } from '../core/errors.js';
import { snapshot } from '../core/snapshot.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** Epoch ms when the entry was written */
  insertedAt: number;
  /** Epoch ms of the last get/put touching the entry */
  lastAccessedAt: number;
}

export interface LRUCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  /** hits / (hits + misses), 0 when there were no lookups */
  hitRate: number;
}

export interface LRUCacheOptions {
  capacity: number;
  /** Label used in CacheError reports (default: 'exact') */
  tier?: CacheTier;
  now?: () => number;
}

// ============================================================================
// CACHE
// ============================================================================

export class LRUCache<V> {
  private readonly store = new Map<string, CacheEntry<V>>();
  private readonly capacity: number;
  private readonly tier: CacheTier;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LRUCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new ValidationError('capacity', 'positive integer', String(options.capacity));
    }
    this.capacity = options.capacity;
    this.tier = options.tier ?? 'exact';
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Look up a key, refreshing its recency on a hit.
   * @throws CacheError if the stored value cannot be copied out
   */
  get(key: string): V | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    const copy = snapshot(entry.value, this.tier, 'get');
    this.store.delete(key);
    entry.lastAccessedAt = this.now();
    this.store.set(key, entry);
    this.hits++;
    return copy;
  }

  /**
   * Read without touching recency or hit statistics.
   */
  peek(key: string): V | undefined {
    const entry = this.store.get(key);
    return entry ? snapshot(entry.value, this.tier, 'get') : undefined;
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  /**
   * Insert or replace a value. The value is copied before any state changes,
   * so a CacheError leaves the cache untouched.
   */
  put(key: string, value: V): void {
    const copy = snapshot(value, this.tier, 'put');
    const timestamp = this.now();
    const existing = this.store.get(key);
    if (existing) {
      this.store.delete(key);
    }
    this.store.set(key, {
      key,
      value: copy,
      insertedAt: timestamp,
      lastAccessedAt: timestamp,
    });
    while (this.store.size > this.capacity) {
      this.evictOldest();
    }
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  /** Drop every entry. Hit/miss counters survive; they describe the process lifetime. */
  clear(): void {
    this.store.clear();
  }

  stats(): LRUCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.store.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  /**
   * Copies of all entries, least recently used first.
   */
  entries(): CacheEntry<V>[] {
    return snapshot([...this.store.values()], this.tier, 'snapshot');
  }

  private evictOldest(): void {
    const oldest = this.store.keys().next();
    if (oldest.done) return;
    this.store.delete(oldest.value);
    this.evictions++;
  }
}

export function createLRUCache<V>(options: LRUCacheOptions): LRUCache<V> {
  return new LRUCache<V>(options);
}
