/**
 * @fileoverview Reciprocal rank fusion
 *
 * RRF formula: score(d) = Σ weight_L / (k + rank_L(d)) over the lists L that
 * contain d, where rank_L(d) is d's 1-indexed position in L as the backend
 * returned it. k (default 60) dampens the head of each list.
 *
 * Output order is total: fused score descending, then the higher raw vector
 * score (absent = -∞), then docId ascending.
 */

import { ValidationError } from '../core/errors.js';
import type { BackendCandidate, SearchCandidate } from '../types.js';
import { assignRanks, compareDocIds, sortableScore } from './candidates.js';

export interface FusionOptions {
  /** Damping constant (default: 60) */
  k: number;
  /** Weight multiplier for vector results (default: 1.0) */
  vectorWeight: number;
  /** Weight multiplier for keyword results (default: 1.0) */
  keywordWeight: number;
}

export const DEFAULT_FUSION_OPTIONS: FusionOptions = {
  k: 60,
  vectorWeight: 1.0,
  keywordWeight: 1.0,
};

interface FusionAccumulator {
  docId: string;
  contentRef?: string;
  content?: string;
  embedding?: number[];
  vectorScore: number | null;
  keywordScore: number | null;
  fusedScore: number;
}

/**
 * Contribution of one list position to a fused score.
 */
export function rrfScore(rank: number, k: number = DEFAULT_FUSION_OPTIONS.k, weight = 1): number {
  return weight / (k + rank);
}

/**
 * Drop repeated docIds from a backend list, keeping each doc's first position.
 * Ranks come from list order, not from `score`: backends disagree on whether a
 * higher score is better (similarity) or worse (distance).
 */
export function orderBackendResults(results: readonly BackendCandidate[]): BackendCandidate[] {
  const seen = new Set<string>();
  return results.filter((hit) => {
    if (seen.has(hit.docId)) return false;
    seen.add(hit.docId);
    return true;
  });
}

/**
 * Fuse vector and keyword result lists into one ranked candidate list.
 */
export function fuse(
  vectorResults: readonly BackendCandidate[],
  keywordResults: readonly BackendCandidate[],
  k: number = DEFAULT_FUSION_OPTIONS.k,
  options: Partial<Omit<FusionOptions, 'k'>> = {}
): SearchCandidate[] {
  if (!Number.isFinite(k) || k < 0) {
    throw new ValidationError('k', 'finite number >= 0', String(k));
  }
  const vectorWeight = options.vectorWeight ?? DEFAULT_FUSION_OPTIONS.vectorWeight;
  const keywordWeight = options.keywordWeight ?? DEFAULT_FUSION_OPTIONS.keywordWeight;
  const fused = new Map<string, FusionAccumulator>();

  const accumulate = (results: readonly BackendCandidate[], source: 'vector' | 'keyword', weight: number) => {
    orderBackendResults(results).forEach((hit, index) => {
      let entry = fused.get(hit.docId);
      if (!entry) {
        entry = { docId: hit.docId, vectorScore: null, keywordScore: null, fusedScore: 0 };
        fused.set(hit.docId, entry);
      }
      entry.fusedScore += rrfScore(index + 1, k, weight);
      if (source === 'vector') {
        entry.vectorScore = hit.score;
      } else {
        entry.keywordScore = hit.score;
      }
      entry.contentRef ??= hit.contentRef;
      entry.content ??= hit.content;
      if (!entry.embedding && hit.embedding) {
        entry.embedding = Array.from(hit.embedding);
      }
    });
  };

  accumulate(vectorResults, 'vector', vectorWeight);
  accumulate(keywordResults, 'keyword', keywordWeight);

  const ordered = [...fused.values()].sort(
    (a, b) =>
      b.fusedScore - a.fusedScore ||
      sortableScore(b.vectorScore) - sortableScore(a.vectorScore) ||
      compareDocIds(a.docId, b.docId)
  );

  return assignRanks(
    ordered.map((entry) => ({
      docId: entry.docId,
      contentRef: entry.contentRef ?? entry.docId,
      ...(entry.content !== undefined ? { content: entry.content } : {}),
      ...(entry.embedding !== undefined ? { embedding: entry.embedding } : {}),
      vectorScore: entry.vectorScore,
      keywordScore: entry.keywordScore,
      fusedScore: entry.fusedScore,
      rerankScore: null,
      finalScore: entry.fusedScore,
    }))
  );
}

/**
 * Rank a single backend list as if it had been fused alone (keyword-only
 * degraded mode). Scores are RRF contributions so downstream stages see the
 * same scale as a fused list.
 */
export function rankSingleSource(
  results: readonly BackendCandidate[],
  source: 'vector' | 'keyword',
  k: number = DEFAULT_FUSION_OPTIONS.k
): SearchCandidate[] {
  return source === 'vector' ? fuse(results, [], k) : fuse([], results, k);
}
