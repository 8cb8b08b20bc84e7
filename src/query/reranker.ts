/**
 * @fileoverview Cross-encoder re-ranking
 *
 * Fusion ranks documents by where they appeared; a cross-encoder reads the
 * query and each document together and scores the pair, which is slower but
 * more precise. Only the head of the fused list is re-scored:
 *
 * ┌──────────────────────────────────────────────────────────┐
 * │  fused list ─▶ top-K (query, content) pairs ─▶ model     │
 * │            ─▶ logistic(score) ─▶ re-sorted head          │
 * │  remaining candidates keep fusion order after the head   │
 * └──────────────────────────────────────────────────────────┘
 *
 * Re-ranking improves quality but is never required: a timeout, a model
 * error, or a head candidate without text returns the input order unchanged.
 */

import { RerankError, ValidationError } from '../core/errors.js';
import { METRIC_NAMES, noopMetrics, type MetricsSink } from '../metrics/recorder.js';
import { defaultLogger, type Logger } from '../telemetry/logger.js';
import type { PairwiseRelevanceModel, SearchCandidate, UnrankedCandidate } from '../types.js';
import { runWithTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { clamp, sigmoid } from '../utils/math.js';
import { assignRanks, compareDocIds, stripRank } from './candidates.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CrossEncoderRerankerOptions {
  model: PairwiseRelevanceModel;
  /** Deadline for one model call (default: 500ms) */
  timeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  /** Monotonic clock for latency measurement */
  clock?: () => number;
}

export interface RerankOptions {
  signal?: AbortSignal;
}

export interface RerankStats {
  totalCalls: number;
  rescored: number;
  fallbacks: number;
  timeouts: number;
  averageLatencyMs: number;
}

// ============================================================================
// RERANKER
// ============================================================================

export class CrossEncoderReranker {
  private readonly model: PairwiseRelevanceModel;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsSink;
  private readonly clock: () => number;
  private totalCalls = 0;
  private rescored = 0;
  private fallbacks = 0;
  private timeouts = 0;
  private totalLatencyMs = 0;

  constructor(options: CrossEncoderRerankerOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 500;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? noopMetrics;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Re-score the first `topK` candidates against `query`.
   *
   * `topK = 0` skips re-scoring. On any model failure the input ordering is
   * returned unchanged.
   */
  async rerank(
    query: string,
    candidates: readonly (UnrankedCandidate | SearchCandidate)[],
    topK: number,
    options: RerankOptions = {}
  ): Promise<SearchCandidate[]> {
    if (!Number.isInteger(topK) || topK < 0) {
      throw new ValidationError('rerankTopK', 'integer >= 0', String(topK));
    }
    const input = candidates.map(stripRank);
    if (topK === 0 || input.length === 0) {
      return assignRanks(input);
    }

    const head = input.slice(0, topK);
    const tail = input.slice(topK);
    const documents: string[] = [];
    for (const candidate of head) {
      if (candidate.content === undefined) {
        this.logger.debug('[retrieval] Skipping rerank: candidate has no content', { docId: candidate.docId });
        this.fallbacks++;
        return assignRanks(input);
      }
      documents.push(candidate.content);
    }

    this.totalCalls++;
    const started = this.clock();
    let scores: number[];
    try {
      scores = await runWithTimeout(
        (signal) => this.model.score(query, documents, { signal }),
        this.timeoutMs,
        { signal: options.signal, context: 'cross-encoder rerank' }
      );
      if (scores.length !== documents.length || scores.some((score) => !Number.isFinite(score))) {
        throw new RerankError(
          'cross_encoder',
          `model returned ${scores.length} scores for ${documents.length} documents`
        );
      }
    } catch (error) {
      const elapsed = this.clock() - started;
      this.totalLatencyMs += elapsed;
      this.fallbacks++;
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.timeouts++;
      }
      this.metrics.observeDuration(METRIC_NAMES.rerankDuration, elapsed, { outcome: 'error' });
      this.logger.warn('[retrieval] Cross-encoder rerank failed; keeping fusion order', {
        error: getErrorMessage(error),
        candidates: documents.length,
      });
      return assignRanks(input);
    }

    const elapsed = this.clock() - started;
    this.totalLatencyMs += elapsed;
    this.rescored += documents.length;
    this.metrics.observeDuration(METRIC_NAMES.rerankDuration, elapsed, { outcome: 'success' });

    const rescoredHead = head
      .map((candidate, index) => {
        const rerankScore = sigmoid(scores[index] ?? 0);
        return { ...candidate, rerankScore, finalScore: rerankScore };
      })
      .sort(
        (a, b) =>
          b.finalScore - a.finalScore ||
          b.fusedScore - a.fusedScore ||
          compareDocIds(a.docId, b.docId)
      );

    return assignRanks([...rescoredHead, ...scaleTail(tail, rescoredHead)]);
  }

  stats(): RerankStats {
    return {
      totalCalls: this.totalCalls,
      rescored: this.rescored,
      fallbacks: this.fallbacks,
      timeouts: this.timeouts,
      averageLatencyMs: this.totalCalls === 0 ? 0 : this.totalLatencyMs / this.totalCalls,
    };
  }
}

/**
 * Keep the tail in fusion order but move its scores under the lowest
 * re-scored head score, proportionally to each candidate's original score.
 */
function scaleTail(tail: readonly UnrankedCandidate[], head: readonly UnrankedCandidate[]): UnrankedCandidate[] {
  if (tail.length === 0) return [];
  const floor = head[head.length - 1]?.finalScore ?? 0;
  const tailMax = Math.max(...tail.map((candidate) => candidate.finalScore));
  return tail.map((candidate) => ({
    ...candidate,
    finalScore: tailMax > 0 ? clamp((candidate.finalScore / tailMax) * floor, 0, floor) : 0,
  }));
}

export function createCrossEncoderReranker(options: CrossEncoderRerankerOptions): CrossEncoderReranker {
  return new CrossEncoderReranker(options);
}
