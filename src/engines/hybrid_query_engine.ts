/**
 * @fileoverview Hybrid Query Engine
 *
 * Orchestrates one retrieval request end to end:
 *
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │ validate ─▶ expand ─▶ semantic cache ─▶ exact cache ─┐               │
 * │                                                      ▼ miss          │
 * │        ┌─ vector path (embed ▸ breaker ▸ retry ▸ timeout) ─┐         │
 * │        └─ keyword path (timeout) ──────────────────────────┤ settled │
 * │                                                            ▼         │
 * │   fuse ─▶ cross-encoder rerank ─▶ MMR ─▶ limit ─▶ write-through      │
 * └──────────────────────────────────────────────────────────────────────┘
 *
 * Backend failures never reach the caller. The fallback chain is
 *
 *   hybrid ─▶ vector only / keyword only ─▶ stale cache ─▶ SearchUnavailableError
 *
 * and every answer off the hybrid path is flagged `degradedMode`. Only request
 * validation errors and an exhausted chain propagate.
 *
 * Degraded answers are never written to the result caches; a cache only ever
 * replays a full hybrid answer.
 *
 * @packageDocumentation
 */

import {
  BackendError,
  CacheError,
  CancelledError,
  RerankError,
  SearchUnavailableError,
  TimeoutError,
  ValidationError,
} from '../core/errors.js';
import { deepFreeze } from '../core/snapshot.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/engine_config.js';
import { METRIC_NAMES, noopMetrics, type MetricsSink, type Outcome } from '../metrics/recorder.js';
import { assignRanks } from '../query/candidates.js';
import { diversify } from '../query/diversity.js';
import { QueryExpander } from '../query/query_expander.js';
import { CrossEncoderReranker } from '../query/reranker.js';
import { fuse } from '../query/score_fusion.js';
import { normalizeText, tokenSet, tokenize } from '../query/tokenizer.js';
import { CircuitBreakerRegistry } from '../resilience/circuit_breaker.js';
import { classifyFailure } from '../resilience/failure_classifier.js';
import { RetryExecutor } from '../resilience/retry.js';
import { computeQueryFingerprint, computeScopeKey, type FingerprintParams } from '../storage/fingerprint.js';
import { LRUCache } from '../storage/lru_cache.js';
import { SemanticCache } from '../storage/semantic_cache.js';
import { defaultLogger, type Logger } from '../telemetry/logger.js';
import type {
  BackendCandidate,
  EmbeddingProvider,
  KeywordBackend,
  PairwiseRelevanceModel,
  SearchCandidate,
  SearchFilters,
  VectorBackend,
} from '../types.js';
import { runWithTimeout, sleep } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { jaccard } from '../utils/math.js';
import {
  SearchRequestSchema,
  type CacheHitTier,
  type CachedResult,
  type EngineHealth,
  type EngineHealthStatus,
  type QueryContext,
  type RetrievalMode,
  type SearchOptions,
  type SearchRequest,
  type SearchResponse,
  type SearchTimings,
} from './types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export const VECTOR_BREAKER = 'vector-backend';
export const EMBEDDING_BREAKER = 'embedding-provider';

export interface HybridQueryEngineOptions {
  vectorBackend: VectorBackend;
  keywordBackend: KeywordBackend;
  embeddingProvider: EmbeddingProvider;
  /** Cross-encoder; without one the rerank stage is skipped */
  relevanceModel?: PairwiseRelevanceModel;
  config?: EngineConfigInput;
  /** Replaces the expander built from `config.expansion` */
  expander?: QueryExpander;
  logger?: Logger;
  metrics?: MetricsSink;
  /** Wall clock (epoch ms) for caches, breakers and health */
  now?: () => number;
  /** Monotonic clock for latency measurement */
  clock?: () => number;
  /** Backoff wait used between retries */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

interface StaleHit {
  results: SearchCandidate[];
  source: 'exact' | 'semantic' | 'overlap';
  similarity: number;
}

interface RequestDeadline {
  signal: AbortSignal;
  dispose: () => void;
}

// ============================================================================
// ENGINE
// ============================================================================

export class HybridQueryEngine {
  readonly config: EngineConfig;
  private readonly vectorBackend: VectorBackend;
  private readonly keywordBackend: KeywordBackend;
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly expander: QueryExpander;
  private readonly reranker: CrossEncoderReranker | null;
  private readonly resultCache: LRUCache<CachedResult>;
  private readonly semanticCache: SemanticCache<CachedResult> | null;
  private readonly embeddingCache: LRUCache<Float32Array>;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;
  private readonly metrics: MetricsSink;
  private readonly now: () => number;
  private readonly clock: () => number;
  private lastDegradedAt: number | null = null;
  private lastUnavailableAt: number | null = null;

  constructor(options: HybridQueryEngineOptions) {
    this.config = resolveEngineConfig(options.config ?? {});
    const { config } = this;
    this.vectorBackend = options.vectorBackend;
    this.keywordBackend = options.keywordBackend;
    this.embeddingProvider = options.embeddingProvider;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? noopMetrics;
    this.now = options.now ?? Date.now;
    this.clock = options.clock ?? (() => performance.now());

    this.expander = options.expander ?? new QueryExpander(config.expansion);
    this.reranker = options.relevanceModel
      ? new CrossEncoderReranker({
          model: options.relevanceModel,
          timeoutMs: config.timeouts.rerankMs,
          logger: this.logger,
          metrics: this.metrics,
          clock: this.clock,
        })
      : null;

    this.resultCache = new LRUCache<CachedResult>({ capacity: config.cache.capacity, tier: 'exact', now: this.now });
    this.embeddingCache = new LRUCache<Float32Array>({
      capacity: config.cache.embeddingCapacity,
      tier: 'embedding',
      now: this.now,
    });
    this.semanticCache = config.semanticCache.enabled
      ? new SemanticCache<CachedResult>({
          capacity: config.semanticCache.capacity,
          similarityThreshold: config.semanticCache.similarityThreshold,
          ttlMs: config.semanticCache.ttlMs,
          now: this.now,
        })
      : null;

    this.breakers = new CircuitBreakerRegistry({
      ...config.circuitBreaker,
      now: this.now,
      logger: this.logger,
      metrics: this.metrics,
    });
    // Created up front so health reports them before the first request.
    this.breakers.get(VECTOR_BREAKER);
    this.breakers.get(EMBEDDING_BREAKER);

    this.retry = new RetryExecutor({
      policy: config.retry,
      sleep: options.sleep ?? sleep,
      random: options.random,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  /**
   * Answer a retrieval request.
   *
   * @throws ValidationError for a malformed request
   * @throws SearchUnavailableError when no backend answered and no cached
   * answer could stand in
   */
  async search(request: SearchRequest, options: SearchOptions = {}): Promise<SearchResponse> {
    const started = this.clock();
    let outcome: Outcome = 'error';
    let deadline: RequestDeadline | undefined;
    try {
      const context = this.buildContext(request);
      if (context.rawQuery.length === 0) {
        // Nothing to look up: answer empty without touching a backend or cache.
        outcome = 'success';
        return this.respond(context, [], 'empty_query', null, emptyTimings(), {}, started);
      }
      deadline = createDeadline(context.timeoutMs, options.signal);
      const response = await this.execute(context, deadline.signal, started);
      outcome = response.degradedMode ? 'degraded' : 'success';
      return response;
    } catch (error) {
      if (error instanceof SearchUnavailableError) {
        this.lastUnavailableAt = this.now();
        this.logger.error('[retrieval] Search unavailable', { query: request.query, causes: error.causes });
      }
      throw error;
    } finally {
      deadline?.dispose();
      this.metrics.observeDuration(METRIC_NAMES.queryDuration, this.clock() - started, { outcome });
    }
  }

  /**
   * Run each query through the full path to populate the caches. Failures are
   * logged and skipped.
   *
   * @returns how many queries produced a cacheable (non-degraded) answer
   */
  async warm(queries: readonly string[], request: Omit<SearchRequest, 'query' | 'useCache'> = {}): Promise<number> {
    let warmed = 0;
    for (const query of queries) {
      try {
        const response = await this.search({ ...request, query, useCache: true });
        if (!response.degradedMode && response.mode !== 'empty_query') warmed++;
      } catch (error) {
        this.logger.warn('[retrieval] Cache warm-up query failed', { query, error: getErrorMessage(error) });
      }
    }
    return warmed;
  }

  getHealth(): EngineHealth {
    const now = this.now();
    const breakerStates = this.breakers.states();
    const recent = (at: number | null) => at !== null && now - at <= this.config.circuitBreaker.failureWindowMs;

    let status: EngineHealthStatus = 'healthy';
    if (recent(this.lastUnavailableAt)) {
      status = 'unhealthy';
    } else if (Object.values(breakerStates).some((state) => state !== 'closed') || recent(this.lastDegradedAt)) {
      status = 'degraded';
    }

    return {
      status,
      breakerStates,
      breakers: this.breakers.statuses(),
      cacheStats: {
        exact: this.resultCache.stats(),
        semantic: this.semanticCache?.stats() ?? null,
        embedding: this.embeddingCache.stats(),
      },
      retryStats: this.retry.getStats(),
      rerankStats: this.reranker?.stats() ?? null,
      lastDegradedAt: toIso(this.lastDegradedAt),
      lastUnavailableAt: toIso(this.lastUnavailableAt),
      checkedAt: new Date(now).toISOString(),
    };
  }

  /** Drop every cached answer and embedding. Statistics are kept. */
  clearCaches(): void {
    this.resultCache.clear();
    this.semanticCache?.clear();
    this.embeddingCache.clear();
  }

  /** Close every breaker and forget recorded failures. */
  resetBreakers(): void {
    this.breakers.resetAll();
  }

  // ==========================================================================
  // REQUEST
  // ==========================================================================

  private buildContext(request: SearchRequest): QueryContext {
    const parsed = SearchRequestSchema.safeParse(request);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'request';
      const received = issue && 'received' in issue ? String(issue.received) : 'invalid value';
      throw new ValidationError(field, issue?.message ?? 'valid search request', received);
    }
    const input = parsed.data;
    const limits = this.config.query;

    const rawQuery = input.query.trim();
    if (rawQuery.length > limits.maxQueryLength) {
      throw new ValidationError('query', `at most ${limits.maxQueryLength} characters`, `${rawQuery.length} characters`);
    }
    const resultLimit = input.resultLimit ?? limits.defaultResultLimit;
    if (resultLimit > limits.maxResultLimit) {
      throw new ValidationError('resultLimit', `integer <= ${limits.maxResultLimit}`, String(resultLimit));
    }

    const rerankTopK = input.rerankTopK ?? limits.defaultRerankTopK;
    if (rerankTopK > limits.maxRerankTopK) {
      throw new ValidationError('rerankTopK', `integer <= ${limits.maxRerankTopK}`, String(rerankTopK));
    }

    const filters: SearchFilters = input.filters ?? {};
    const params: FingerprintParams = {
      rerankTopK,
      diversityLambda: input.diversityLambda ?? null,
      resultLimit,
      filters,
    };
    return deepFreeze({
      rawQuery,
      normalizedQuery: normalizeText(rawQuery),
      expandedTerms: this.expander.expand(rawQuery),
      useCache: input.useCache ?? true,
      rerankTopK: params.rerankTopK,
      diversityLambda: params.diversityLambda,
      resultLimit,
      filters: { ...filters },
      timeoutMs: input.timeoutMs ?? null,
      fingerprint: computeQueryFingerprint(rawQuery, params),
      scope: computeScopeKey(params),
    });
  }

  // ==========================================================================
  // PIPELINE
  // ==========================================================================

  private async execute(context: QueryContext, signal: AbortSignal, started: number): Promise<SearchResponse> {
    const timings = emptyTimings();
    const failures: SearchResponse['failures'] = {};

    let embeddingTask: Promise<Float32Array> | null = null;
    let embeddingFailure: unknown;
    const getEmbedding = () =>
      (embeddingTask ??= this.embedQuery(context.rawQuery, signal, timings).catch((error: unknown) => {
        embeddingFailure = error;
        throw error;
      }));

    if (context.useCache) {
      const cached = await this.lookupCaches(context, getEmbedding, failures);
      if (cached) {
        return this.respond(context, cached.results, 'cache', cached.tier, timings, failures, started);
      }
    }

    const candidateCount = Math.max(
      context.resultLimit * this.config.query.candidateMultiplier,
      context.rerankTopK
    );
    const [vectorOutcome, keywordOutcome] = await Promise.allSettled([
      this.vectorPath(context, getEmbedding, candidateCount, signal, timings),
      this.keywordPath(context, candidateCount, signal, timings),
    ]);

    // A backend rejecting the request's own parameters is the caller's error.
    // The vector path fails on either the embedding (query text) or the
    // vector backend (filters).
    if (vectorOutcome.status === 'rejected') {
      const embeddingRejected = embeddingFailure !== undefined && vectorOutcome.reason === embeddingFailure;
      surfaceInvalidInput(vectorOutcome.reason, embeddingRejected ? 'query' : 'filters');
    }
    if (keywordOutcome.status === 'rejected') surfaceInvalidInput(keywordOutcome.reason, 'query');

    const { k, vectorWeight, keywordWeight } = this.config.fusion;
    const weights = { vectorWeight, keywordWeight };
    let mode: RetrievalMode;
    let fused: SearchCandidate[];

    if (vectorOutcome.status === 'fulfilled' && keywordOutcome.status === 'fulfilled') {
      mode = 'hybrid';
      fused = fuse(vectorOutcome.value, keywordOutcome.value, k, weights);
    } else if (keywordOutcome.status === 'fulfilled') {
      mode = 'keyword_only';
      failures.vector = describeFailure(vectorOutcome);
      fused = fuse([], keywordOutcome.value, k, weights);
    } else if (vectorOutcome.status === 'fulfilled') {
      mode = 'vector_only';
      failures.keyword = describeFailure(keywordOutcome);
      fused = fuse(vectorOutcome.value, [], k, weights);
    } else {
      failures.vector = describeFailure(vectorOutcome);
      failures.keyword = describeFailure(keywordOutcome);
      const stale = await this.findStale(context, getEmbedding);
      if (!stale) {
        throw new SearchUnavailableError({
          vector: failures.vector,
          keyword: failures.keyword,
          stale_cache: this.config.staleFallback.enabled ? 'no cached answer for this query' : 'disabled',
        });
      }
      this.logger.warn('[retrieval] Both backends failed; serving stale cached answer', {
        source: stale.source,
        similarity: stale.similarity,
      });
      return this.respond(
        context,
        assignRanks(stale.results.slice(0, context.resultLimit)),
        'stale_cache',
        null,
        timings,
        failures,
        started
      );
    }

    if (mode !== 'hybrid') {
      this.logger.warn(`[retrieval] Serving ${mode} results`, { ...failures });
    }

    const results = await this.rank(context, fused, signal, timings);
    if (mode === 'hybrid' && context.useCache) {
      await this.writeThrough(context, results, getEmbedding);
    }
    return this.respond(context, results, mode, null, timings, failures, started);
  }

  private async lookupCaches(
    context: QueryContext,
    getEmbedding: () => Promise<Float32Array>,
    failures: SearchResponse['failures']
  ): Promise<{ results: SearchCandidate[]; tier: CacheHitTier } | undefined> {
    if (this.semanticCache) {
      let embedding: Float32Array | undefined;
      try {
        embedding = await getEmbedding();
      } catch (error) {
        failures.embedding = getErrorMessage(error);
        this.logger.debug('[retrieval] Skipping semantic cache: no query embedding', { error: failures.embedding });
      }
      const semanticCache = this.semanticCache;
      if (embedding) {
        const queryEmbedding = embedding;
        const hit = this.readCache('semantic', () => semanticCache.get(queryEmbedding, context.scope)?.value);
        if (hit) return { results: hit.results, tier: 'semantic' };
      }
    }
    const hit = this.readCache('exact', () => this.resultCache.get(context.fingerprint));
    return hit ? { results: hit.results, tier: 'exact' } : undefined;
  }

  /** A failing cache read counts as a miss. */
  private readCache(tier: CacheHitTier, read: () => CachedResult | undefined): CachedResult | undefined {
    try {
      const value = read();
      this.metrics.incrementCounter(METRIC_NAMES.cacheLookups, { tier, result: value ? 'hit' : 'miss' });
      return value;
    } catch (error) {
      this.metrics.incrementCounter(METRIC_NAMES.cacheLookups, { tier, result: 'error' });
      if (!(error instanceof CacheError)) throw error;
      this.logger.warn('[retrieval] Cache read failed; treating as miss', { tier, error: error.message });
      return undefined;
    }
  }

  private async embedQuery(text: string, signal: AbortSignal, timings: SearchTimings): Promise<Float32Array> {
    const key = normalizeText(text);
    let cached: Float32Array | undefined;
    try {
      cached = this.embeddingCache.get(key);
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      this.logger.warn('[retrieval] Embedding cache read failed', { error: error.message });
    }
    this.metrics.incrementCounter(METRIC_NAMES.cacheLookups, { tier: 'embedding', result: cached ? 'hit' : 'miss' });
    if (cached) return cached;

    const started = this.clock();
    try {
      const embedding = await this.breakers.get(EMBEDDING_BREAKER).call(
        () =>
          this.retry.execute(
            () =>
              runWithTimeout(
                (attemptSignal) => this.embeddingProvider.embed(text, { signal: attemptSignal }),
                this.config.timeouts.embeddingMs,
                { signal, context: 'query embedding' }
              ),
            { operation: EMBEDDING_BREAKER, signal }
          ),
        { signal }
      );
      try {
        this.embeddingCache.put(key, embedding);
      } catch (error) {
        if (!(error instanceof CacheError)) throw error;
        this.logger.warn('[retrieval] Embedding cache write failed', { error: error.message });
      }
      return embedding;
    } finally {
      timings.embeddingMs += this.clock() - started;
    }
  }

  private async vectorPath(
    context: QueryContext,
    getEmbedding: () => Promise<Float32Array>,
    topK: number,
    signal: AbortSignal,
    timings: SearchTimings
  ): Promise<BackendCandidate[]> {
    const embedding = await getEmbedding();
    const started = this.clock();
    let outcome: Outcome = 'error';
    try {
      const hits = await this.breakers.get(VECTOR_BREAKER).call(
        () =>
          this.retry.execute(
            () =>
              runWithTimeout(
                (attemptSignal) =>
                  this.vectorBackend.query(embedding, topK, context.filters, { signal: attemptSignal }),
                this.config.timeouts.backendMs,
                { signal, context: 'vector backend query' }
              ),
            { operation: VECTOR_BREAKER, signal }
          ),
        { signal }
      );
      outcome = 'success';
      return hits;
    } finally {
      const elapsed = this.clock() - started;
      timings.vectorMs = elapsed;
      this.metrics.observeDuration(METRIC_NAMES.vectorBackendDuration, elapsed, { outcome });
    }
  }

  private async keywordPath(
    context: QueryContext,
    topK: number,
    signal: AbortSignal,
    timings: SearchTimings
  ): Promise<BackendCandidate[]> {
    const terms = context.expandedTerms.length > 0 ? [...context.expandedTerms] : tokenize(context.rawQuery);
    const started = this.clock();
    try {
      return await runWithTimeout(
        (attemptSignal) => this.keywordBackend.query(terms, topK, { signal: attemptSignal }),
        this.config.timeouts.backendMs,
        { signal, context: 'keyword backend query' }
      );
    } finally {
      timings.keywordMs = this.clock() - started;
    }
  }

  /** Rerank the fused list, diversify it, and cut it to the result limit. */
  private async rank(
    context: QueryContext,
    fused: SearchCandidate[],
    signal: AbortSignal,
    timings: SearchTimings
  ): Promise<SearchCandidate[]> {
    let ranked = fused;
    if (this.reranker && context.rerankTopK > 0) {
      const started = this.clock();
      ranked = await this.reranker.rerank(context.rawQuery, ranked, context.rerankTopK, { signal });
      timings.rerankMs = this.clock() - started;
    }

    if (context.diversityLambda !== null) {
      const started = this.clock();
      try {
        ranked = diversify(ranked, context.diversityLambda, context.resultLimit);
      } catch (error) {
        const failure = new RerankError('diversity', getErrorMessage(error), error);
        this.logger.warn('[retrieval] Diversity re-ordering failed; keeping ranked order', { error: failure.message });
      }
      timings.diversifyMs = this.clock() - started;
    }

    return assignRanks(ranked.slice(0, context.resultLimit));
  }

  private async writeThrough(
    context: QueryContext,
    results: SearchCandidate[],
    getEmbedding: () => Promise<Float32Array>
  ): Promise<void> {
    const entry: CachedResult = {
      query: context.rawQuery,
      normalizedQuery: context.normalizedQuery,
      scope: context.scope,
      results,
      storedAt: this.now(),
    };
    this.writeCache('exact', () => this.resultCache.put(context.fingerprint, entry));

    const semanticCache = this.semanticCache;
    if (!semanticCache) return;
    let embedding: Float32Array;
    try {
      embedding = await getEmbedding();
    } catch (error) {
      this.logger.debug('[retrieval] Skipping semantic cache write: no query embedding', {
        error: getErrorMessage(error),
      });
      return;
    }
    this.writeCache('semantic', () =>
      semanticCache.put(embedding, entry, { query: context.normalizedQuery, scope: context.scope })
    );
  }

  private writeCache(tier: CacheHitTier, write: () => void): void {
    try {
      write();
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      this.logger.warn('[retrieval] Cache write failed', { tier, error: error.message });
    }
  }

  // ==========================================================================
  // STALE FALLBACK
  // ==========================================================================

  /**
   * Best cached answer computed under the same parameters: the exact entry,
   * then the nearest semantic entry above `staleFallback.minSimilarity`, then
   * the exact-cache entry sharing the most query terms.
   */
  private async findStale(
    context: QueryContext,
    getEmbedding: () => Promise<Float32Array>
  ): Promise<StaleHit | undefined> {
    if (!this.config.staleFallback.enabled) return undefined;
    try {
      const exact = this.resultCache.peek(context.fingerprint);
      if (exact) return { results: exact.results, source: 'exact', similarity: 1 };

      if (this.semanticCache) {
        const embedding = await getEmbedding().catch((error: unknown) => {
          this.logger.debug('[retrieval] Stale lookup without embedding', { error: getErrorMessage(error) });
          return undefined;
        });
        const nearest = embedding ? this.semanticCache.nearest(embedding, context.scope) : undefined;
        if (nearest && nearest.similarity >= this.config.staleFallback.minSimilarity) {
          return { results: nearest.value.results, source: 'semantic', similarity: nearest.similarity };
        }
      }

      const terms = tokenSet(context.normalizedQuery);
      let best: StaleHit | undefined;
      for (const entry of this.resultCache.entries()) {
        if (entry.value.scope !== context.scope) continue;
        const overlap = jaccard(terms, tokenSet(entry.value.normalizedQuery));
        if (overlap > 0 && (!best || overlap > best.similarity)) {
          best = { results: entry.value.results, source: 'overlap', similarity: overlap };
        }
      }
      return best;
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      this.logger.warn('[retrieval] Stale cache lookup failed', { error: error.message });
      return undefined;
    }
  }

  // ==========================================================================
  // RESPONSE
  // ==========================================================================

  private respond(
    context: QueryContext,
    results: SearchCandidate[],
    mode: RetrievalMode,
    cacheHit: CacheHitTier | null,
    timings: SearchTimings,
    failures: SearchResponse['failures'],
    started: number
  ): SearchResponse {
    const degradedMode = mode !== 'hybrid' && mode !== 'cache' && mode !== 'empty_query';
    if (degradedMode) {
      this.lastDegradedAt = this.now();
    }
    return {
      results: results.map((candidate) => deepFreeze(candidate)),
      degradedMode,
      mode,
      cacheHit,
      expandedTerms: [...context.expandedTerms],
      timings: { ...timings, totalMs: this.clock() - started },
      failures,
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Signal that fires when the caller aborts or the request deadline passes.
 */
function createDeadline(timeoutMs: number | null, parent?: AbortSignal): RequestDeadline {
  const controller = new AbortController();
  const onAbort = () => controller.abort(new CancelledError('search', parent?.reason));
  if (parent?.aborted) {
    onAbort();
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }
  const timer =
    timeoutMs === null
      ? undefined
      : setTimeout(() => controller.abort(new TimeoutError(timeoutMs, 'search request')), timeoutMs);
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

function emptyTimings(): SearchTimings {
  return { totalMs: 0, embeddingMs: 0, vectorMs: 0, keywordMs: 0, rerankMs: 0, diversifyMs: 0 };
}

function surfaceInvalidInput(reason: unknown, field: string): void {
  if (reason instanceof ValidationError) throw reason;
  if (reason instanceof BackendError && classifyFailure(reason) === 'invalid_input') {
    throw new ValidationError(field, `value accepted by ${reason.backend}`, reason.message);
  }
}

function describeFailure(outcome: PromiseSettledResult<unknown>): string {
  return outcome.status === 'rejected' ? getErrorMessage(outcome.reason) : 'no failure';
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

export function createHybridQueryEngine(options: HybridQueryEngineOptions): HybridQueryEngine {
  return new HybridQueryEngine(options);
}
