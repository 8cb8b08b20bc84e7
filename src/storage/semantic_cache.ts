/**
 * @fileoverview Semantic query cache
 *
 * Approximate cache in front of the exact LRU cache: a lookup hits when the
 * cosine similarity between the query embedding and the closest stored
 * embedding (within the same parameter scope) reaches the threshold.
 *
 * Lookups are a linear scan over the bounded entry set. This is intentional:
 * capacities are in the hundreds to low thousands, where a scan over
 * contiguous Float32Arrays costs well under a millisecond and needs no index
 * maintenance on eviction. Past that size an approximate nearest-neighbour
 * index should replace the scan; see DESIGN.md.
 *
 * Eviction is LRU exactly as in lru_cache.ts, plus an optional TTL.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';
import { snapshot } from '../core/snapshot.js';
import { cosineSimilarity } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SemanticCacheOptions {
  /** Maximum number of stored queries (default: 500) */
  capacity?: number;
  /** Minimum cosine similarity for a hit (default: 0.85) */
  similarityThreshold?: number;
  /** Entry lifetime in ms; 0 disables expiry (default: 1 hour) */
  ttlMs?: number;
  now?: () => number;
}

export interface SemanticCacheHit<V> {
  value: V;
  similarity: number;
  /** The query text the stored value was computed for */
  query: string;
}

export interface SemanticCachePutOptions {
  query: string;
  /** Parameter scope; lookups only match entries in the same scope */
  scope?: string;
}

export interface SemanticCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  totalQueries: number;
  hitRate: number;
  /** size / capacity */
  utilization: number;
  evictions: number;
  expirations: number;
  similarityThreshold: number;
}

export interface TopQuery {
  query: string;
  hits: number;
}

interface SemanticEntry<V> {
  embedding: Float32Array;
  value: V;
  query: string;
  scope: string;
  insertedAt: number;
  lastAccessedAt: number;
  hits: number;
}

// ============================================================================
// CACHE
// ============================================================================

export class SemanticCache<V> {
  /** Insertion order doubles as recency order; see lru_cache.ts. */
  private readonly store = new Map<number, SemanticEntry<V>>();
  private readonly capacity: number;
  private readonly similarityThreshold: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private nextId = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: SemanticCacheOptions = {}) {
    const capacity = options.capacity ?? 500;
    const threshold = options.similarityThreshold ?? 0.85;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError('capacity', 'positive integer', String(capacity));
    }
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new ValidationError('similarityThreshold', 'number in [0, 1]', String(threshold));
    }
    this.capacity = capacity;
    this.similarityThreshold = threshold;
    this.ttlMs = options.ttlMs ?? 3_600_000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Closest stored entry in `scope` if its similarity reaches the threshold.
   */
  get(embedding: ArrayLike<number>, scope = ''): SemanticCacheHit<V> | undefined {
    const best = this.scan(embedding, scope);
    if (!best || best.similarity < this.similarityThreshold) {
      this.misses++;
      return undefined;
    }
    const hit = snapshot(
      { value: best.entry.value, similarity: best.similarity, query: best.entry.query },
      'semantic',
      'get'
    );
    this.touch(best.id, best.entry);
    best.entry.hits++;
    this.hits++;
    return hit;
  }

  /**
   * Closest stored entry in `scope` regardless of threshold. Used for stale
   * fallbacks; does not affect recency or statistics.
   */
  nearest(embedding: ArrayLike<number>, scope = ''): SemanticCacheHit<V> | undefined {
    const best = this.scan(embedding, scope);
    if (!best) return undefined;
    return snapshot(
      { value: best.entry.value, similarity: best.similarity, query: best.entry.query },
      'semantic',
      'get'
    );
  }

  /**
   * Store a value. An existing entry for the same query text and scope is
   * replaced rather than duplicated.
   */
  put(embedding: ArrayLike<number>, value: V, options: SemanticCachePutOptions): void {
    const copy = snapshot(value, 'semantic', 'put');
    const scope = options.scope ?? '';
    for (const [id, entry] of this.store) {
      if (entry.query === options.query && entry.scope === scope) {
        this.store.delete(id);
        break;
      }
    }
    const timestamp = this.now();
    this.store.set(this.nextId++, {
      embedding: Float32Array.from(embedding),
      value: copy,
      query: options.query,
      scope,
      insertedAt: timestamp,
      lastAccessedAt: timestamp,
      hits: 0,
    });
    while (this.store.size > this.capacity) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
      this.evictions++;
    }
  }

  /**
   * Remove expired entries; returns how many were removed.
   */
  cleanupExpired(): number {
    if (this.ttlMs <= 0) return 0;
    const timestamp = this.now();
    let removed = 0;
    for (const [id, entry] of this.store) {
      if (timestamp - entry.insertedAt > this.ttlMs) {
        this.store.delete(id);
        removed++;
      }
    }
    this.expirations += removed;
    return removed;
  }

  /**
   * Most frequently hit queries, descending.
   */
  topQueries(limit = 10): TopQuery[] {
    return [...this.store.values()]
      .map((entry) => ({ query: entry.query, hits: entry.hits }))
      .sort((a, b) => b.hits - a.hits || a.query.localeCompare(b.query))
      .slice(0, limit);
  }

  clear(): void {
    this.store.clear();
  }

  stats(): SemanticCacheStats {
    const totalQueries = this.hits + this.misses;
    return {
      size: this.store.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      totalQueries,
      hitRate: totalQueries === 0 ? 0 : this.hits / totalQueries,
      utilization: this.store.size / this.capacity,
      evictions: this.evictions,
      expirations: this.expirations,
      similarityThreshold: this.similarityThreshold,
    };
  }

  private scan(
    embedding: ArrayLike<number>,
    scope: string
  ): { id: number; entry: SemanticEntry<V>; similarity: number } | undefined {
    const timestamp = this.now();
    let best: { id: number; entry: SemanticEntry<V>; similarity: number } | undefined;
    const expired: number[] = [];
    for (const [id, entry] of this.store) {
      if (this.ttlMs > 0 && timestamp - entry.insertedAt > this.ttlMs) {
        expired.push(id);
        continue;
      }
      if (entry.scope !== scope) continue;
      const similarity = cosineSimilarity(embedding, entry.embedding);
      if (!best || similarity > best.similarity) {
        best = { id, entry, similarity };
      }
    }
    for (const id of expired) {
      this.store.delete(id);
    }
    this.expirations += expired.length;
    return best;
  }

  private touch(id: number, entry: SemanticEntry<V>): void {
    this.store.delete(id);
    entry.lastAccessedAt = this.now();
    this.store.set(id, entry);
  }
}

export function createSemanticCache<V>(options: SemanticCacheOptions = {}): SemanticCache<V> {
  return new SemanticCache<V>(options);
}
