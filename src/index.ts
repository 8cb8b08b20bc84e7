/**
 * @fileoverview Hybrid Retrieval Core - fault-tolerant hybrid search engine
 *
 * Combines a vector backend and a keyword backend behind one query call, with
 * result caching, query expansion, rank fusion, cross-encoder re-ranking and
 * diversity re-ordering. Backend outages degrade the answer instead of failing
 * the request.
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   createHybridQueryEngine,
 *   createInMemoryVectorIndex,
 *   createSqliteKeywordIndex,
 *   HashingEmbeddingProvider,
 * } from 'hybrid-retrieval-core';
 *
 * const engine = createHybridQueryEngine({
 *   vectorBackend: createInMemoryVectorIndex(),
 *   keywordBackend: createSqliteKeywordIndex(),
 *   embeddingProvider: new HashingEmbeddingProvider(),
 * });
 *
 * const response = await engine.search({ query: 'machine learning basics', resultLimit: 5 });
 * if (response.degradedMode) {
 *   console.error(`answered from ${response.mode}`);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ENGINE
// ============================================================================

export {
  HybridQueryEngine,
  createHybridQueryEngine,
  VECTOR_BREAKER,
  EMBEDDING_BREAKER,
  type HybridQueryEngineOptions,
} from './engines/hybrid_query_engine.js';
export {
  SearchRequestSchema,
  type SearchRequest,
  type SearchOptions,
  type SearchResponse,
  type SearchTimings,
  type RetrievalMode,
  type CacheHitTier,
  type CachedResult,
  type QueryContext,
  type EngineHealth,
  type EngineHealthStatus,
} from './engines/types.js';

export type {
  SearchCandidate,
  UnrankedCandidate,
  SearchFilters,
  BackendCandidate,
  BackendCallOptions,
  VectorBackend,
  KeywordBackend,
  EmbeddingProvider,
  PairwiseRelevanceModel,
} from './types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export * from './config/index.js';

// ============================================================================
// ERRORS
// ============================================================================

export * from './core/errors.js';
export { classifyFailure, countsAgainstDependency } from './resilience/failure_classifier.js';

// ============================================================================
// CACHES
// ============================================================================

export { LRUCache, createLRUCache, type CacheEntry, type LRUCacheOptions, type LRUCacheStats } from './storage/lru_cache.js';
export {
  SemanticCache,
  createSemanticCache,
  type SemanticCacheOptions,
  type SemanticCacheHit,
  type SemanticCachePutOptions,
  type SemanticCacheStats,
  type TopQuery,
} from './storage/semantic_cache.js';
export { computeQueryFingerprint, computeScopeKey, stableStringify, type FingerprintParams } from './storage/fingerprint.js';

// ============================================================================
// RESILIENCE
// ============================================================================

export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerOptions,
  type CircuitBreakerStatus,
  type CircuitCallOptions,
} from './resilience/circuit_breaker.js';
export {
  RetryExecutor,
  createRetryExecutor,
  computeRetryDelayMs,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryStats,
  type RetryExecutorOptions,
  type RetryExecuteOptions,
} from './resilience/retry.js';

// ============================================================================
// QUERY PROCESSING AND RANKING
// ============================================================================

export {
  QueryExpander,
  createQueryExpander,
  loadLexicon,
  type QueryExpanderOptions,
  type ExpansionResult,
  type QueryExpanderStats,
  type Lexicon,
} from './query/query_expander.js';
export { normalizeText, tokenize, contentTerms, loadStopwords } from './query/tokenizer.js';
export {
  fuse,
  rrfScore,
  rankSingleSource,
  DEFAULT_FUSION_OPTIONS,
  type FusionOptions,
} from './query/score_fusion.js';
export {
  CrossEncoderReranker,
  createCrossEncoderReranker,
  type CrossEncoderRerankerOptions,
  type RerankOptions,
  type RerankStats,
} from './query/reranker.js';
export { diversify, diversitySample, createCandidateSimilarity, type SimilarityFn } from './query/diversity.js';

// ============================================================================
// REFERENCE BACKENDS
// ============================================================================

export {
  InMemoryVectorIndex,
  createInMemoryVectorIndex,
  type VectorIndexItem,
  type VectorMetadata,
} from './storage/vector_index.js';
export {
  SqliteKeywordIndex,
  createSqliteKeywordIndex,
  type KeywordDocument,
  type SqliteKeywordIndexOptions,
} from './storage/keyword_index.js';
export {
  HashingEmbeddingProvider,
  DEFAULT_HASHING_DIMENSION,
} from './api/embedding_providers/hashing_embedding_provider.js';

// ============================================================================
// OBSERVABILITY
// ============================================================================

export {
  InMemoryMetrics,
  noopMetrics,
  exportPrometheusMetrics,
  METRIC_NAMES,
  CIRCUIT_STATE_GAUGE,
  DEFAULT_DURATION_BUCKETS_MS,
  type MetricsSink,
  type MetricLabels,
  type MetricsSnapshot,
  type Outcome,
} from './metrics/recorder.js';
export { defaultLogger, silentLogger, type Logger, type LogContext } from './telemetry/logger.js';
