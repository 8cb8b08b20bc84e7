/**
 * @fileoverview Hybrid query engine request, response and health types
 */

import { z } from 'zod';
import type { CircuitBreakerStatus, CircuitState } from '../resilience/circuit_breaker.js';
import type { RetryStats } from '../resilience/retry.js';
import type { RerankStats } from '../query/reranker.js';
import type { LRUCacheStats } from '../storage/lru_cache.js';
import type { SemanticCacheStats } from '../storage/semantic_cache.js';
import type { SearchCandidate, SearchFilters } from '../types.js';

// ============================================================================
// REQUEST
// ============================================================================

export const SearchRequestSchema = z.object({
  query: z.string(),
  /** Consult and populate the result caches (default: true) */
  useCache: z.boolean().optional(),
  /** Candidates re-scored by the cross-encoder; 0 disables (default: config) */
  rerankTopK: z.number().int().nonnegative().optional(),
  /** MMR trade-off in [0, 1]; null or absent skips diversity re-ordering */
  diversityLambda: z.number().min(0).max(1).nullable().optional(),
  resultLimit: z.number().int().positive().optional(),
  filters: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  /** Whole-request deadline in ms */
  timeoutMs: z.number().int().positive().optional(),
}).strict();

export type SearchRequest = z.input<typeof SearchRequestSchema>;

export interface SearchOptions {
  /** Caller cancellation; aborting sends the request down the fallback chain */
  signal?: AbortSignal;
}

/**
 * Per-request, read-only view of a validated request. Never shared between
 * requests.
 */
export interface QueryContext {
  readonly rawQuery: string;
  readonly normalizedQuery: string;
  /** Original content terms first, then related terms */
  readonly expandedTerms: readonly string[];
  readonly useCache: boolean;
  readonly rerankTopK: number;
  readonly diversityLambda: number | null;
  readonly resultLimit: number;
  readonly filters: SearchFilters;
  readonly timeoutMs: number | null;
  /** Exact-cache key */
  readonly fingerprint: string;
  /** Parameter scope for the semantic cache */
  readonly scope: string;
}

// ============================================================================
// RESPONSE
// ============================================================================

/**
 * Which path produced the answer. Anything but `hybrid`, `cache` and
 * `empty_query` is a degraded answer. `empty_query` means the trimmed query
 * was empty and nothing was looked up.
 */
export type RetrievalMode = 'hybrid' | 'cache' | 'vector_only' | 'keyword_only' | 'stale_cache' | 'empty_query';

export type CacheHitTier = 'semantic' | 'exact';

export interface SearchTimings {
  totalMs: number;
  embeddingMs: number;
  vectorMs: number;
  keywordMs: number;
  rerankMs: number;
  diversifyMs: number;
}

export interface SearchResponse {
  results: SearchCandidate[];
  degradedMode: boolean;
  mode: RetrievalMode;
  /** Cache tier that answered, if any */
  cacheHit: CacheHitTier | null;
  expandedTerms: string[];
  timings: SearchTimings;
  /** Why each failed path failed, keyed by path name */
  failures: Partial<Record<'embedding' | 'vector' | 'keyword', string>>;
}

/** What the result caches store per query. */
export interface CachedResult {
  query: string;
  normalizedQuery: string;
  scope: string;
  results: SearchCandidate[];
  storedAt: number;
}

// ============================================================================
// HEALTH
// ============================================================================

export type EngineHealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface EngineHealth {
  status: EngineHealthStatus;
  breakerStates: Record<string, CircuitState>;
  breakers: CircuitBreakerStatus[];
  cacheStats: {
    exact: LRUCacheStats;
    semantic: SemanticCacheStats | null;
    embedding: LRUCacheStats;
  };
  retryStats: RetryStats;
  rerankStats: RerankStats | null;
  /** ISO timestamp of the last degraded answer */
  lastDegradedAt: string | null;
  /** ISO timestamp of the last request no path could answer */
  lastUnavailableAt: string | null;
  checkedAt: string;
}
