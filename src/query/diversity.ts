/**
 * @fileoverview Maximal marginal relevance
 *
 * Re-orders a ranked list so near-duplicates do not crowd the top. Each step
 * picks the remaining candidate maximizing
 *
 *   λ · relevance(d) − (1 − λ) · max_{s ∈ selected} similarity(d, s)
 *
 * λ = 1 keeps relevance order, λ = 0 maximizes spread. Relevance is the
 * candidate's final score divided by the list maximum. Similarity is the
 * cosine of embeddings when both candidates carry one, else the Jaccard index
 * of their content tokens, clamped to [0, 1].
 *
 * The MMR value becomes the candidate's final score. The penalty term can only
 * grow as the selected set grows, so scores come out non-increasing.
 */

import { ValidationError } from '../core/errors.js';
import type { SearchCandidate, UnrankedCandidate } from '../types.js';
import { clamp01, cosineSimilarity, jaccard } from '../utils/math.js';
import { assignRanks, stripRank } from './candidates.js';
import { tokenSet } from './tokenizer.js';

type CandidateLike = UnrankedCandidate | SearchCandidate;

export type SimilarityFn = (a: UnrankedCandidate, b: UnrankedCandidate) => number;

/**
 * Default pairwise similarity. Token sets are cached per candidate object.
 */
export function createCandidateSimilarity(): SimilarityFn {
  const tokens = new WeakMap<UnrankedCandidate, Set<string>>();
  const tokensOf = (candidate: UnrankedCandidate): Set<string> => {
    let set = tokens.get(candidate);
    if (!set) {
      set = tokenSet(candidate.content ?? '');
      tokens.set(candidate, set);
    }
    return set;
  };

  return (a, b) => {
    if (a.embedding && b.embedding && a.embedding.length === b.embedding.length) {
      return clamp01(cosineSimilarity(a.embedding, b.embedding));
    }
    if (a.content !== undefined && b.content !== undefined) {
      return jaccard(tokensOf(a), tokensOf(b));
    }
    return a.docId === b.docId ? 1 : 0;
  };
}

export function assertLambda(lambda: number): void {
  if (!Number.isFinite(lambda) || lambda < 0 || lambda > 1) {
    throw new ValidationError('diversityLambda', 'number in [0, 1]', String(lambda));
  }
}

/**
 * MMR re-ordering. A null or undefined λ skips the stage and returns the
 * input ranking.
 *
 * @param limit - stop after this many selections (default: all)
 * @throws ValidationError when λ is outside [0, 1]
 */
export function diversify(
  candidates: readonly CandidateLike[],
  lambda: number | null | undefined,
  limit?: number,
  similarity: SimilarityFn = createCandidateSimilarity()
): SearchCandidate[] {
  const input = candidates.map(stripRank);
  if (lambda === null || lambda === undefined) {
    return assignRanks(input);
  }
  assertLambda(lambda);
  if (input.length === 0) return [];

  const target = Math.min(limit ?? input.length, input.length);
  const maxScore = Math.max(...input.map((candidate) => candidate.finalScore));
  const relevance = input.map((candidate) => (maxScore > 0 ? Math.max(0, candidate.finalScore) / maxScore : 0));
  // maxSimilarity[i]: highest similarity of input[i] to anything selected so far.
  const maxSimilarity = input.map(() => 0);
  const remaining = new Set(input.map((_, index) => index));
  const selected: UnrankedCandidate[] = [];

  while (selected.length < target && remaining.size > 0) {
    let bestIndex = -1;
    let bestScore = -Infinity;
    for (const index of remaining) {
      const score = lambda * (relevance[index] ?? 0) - (1 - lambda) * (maxSimilarity[index] ?? 0);
      if (score > bestScore) {
        bestScore = score;
        bestIndex = index;
      }
    }
    const picked = input[bestIndex];
    if (!picked) break;
    remaining.delete(bestIndex);
    selected.push({ ...picked, finalScore: bestScore });

    for (const index of remaining) {
      const other = input[index];
      if (!other) continue;
      const sim = clamp01(similarity(picked, other));
      if (sim > (maxSimilarity[index] ?? 0)) {
        maxSimilarity[index] = sim;
      }
    }
  }

  return assignRanks(selected);
}

/**
 * Greedy near-duplicate filter: walk the list in rank order and drop any
 * candidate at least `threshold` similar to one already kept. Scores are
 * left as they are.
 */
export function diversitySample(
  candidates: readonly CandidateLike[],
  threshold: number,
  similarity: SimilarityFn = createCandidateSimilarity()
): SearchCandidate[] {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError('diversityThreshold', 'number in [0, 1]', String(threshold));
  }
  const kept: UnrankedCandidate[] = [];
  for (const candidate of candidates.map(stripRank)) {
    if (kept.every((existing) => similarity(existing, candidate) < threshold)) {
      kept.push(candidate);
    }
  }
  return assignRanks(kept);
}
