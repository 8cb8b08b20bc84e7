/**
 * @fileoverview Candidate list helpers
 *
 * Ranks are assigned in exactly one place, after the last stage that can
 * change a final score.
 */

import { deepFreeze } from '../core/snapshot.js';
import type { SearchCandidate, UnrankedCandidate } from '../types.js';

/** Treat NaN as the lowest possible score so sorts stay total. */
export function sortableScore(score: number | null | undefined): number {
  return score === null || score === undefined || Number.isNaN(score) ? -Infinity : score;
}

/** Deterministic docId order (code-unit comparison, locale independent). */
export function compareDocIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Freeze `candidates` in final-score order (stable for equal scores) with
 * 1-indexed ranks.
 */
export function assignRanks(candidates: readonly UnrankedCandidate[]): SearchCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => sortableScore(b.candidate.finalScore) - sortableScore(a.candidate.finalScore) || a.index - b.index)
    .map(({ candidate }, index) => deepFreeze({ ...stripRank(candidate), rank: index + 1 }));
}

/**
 * Drop a `rank` a ranked candidate may carry, so a stage re-ranking its input
 * cannot leak stale positions.
 */
export function stripRank(candidate: UnrankedCandidate | SearchCandidate): UnrankedCandidate {
  if ('rank' in candidate) {
    const { rank: _rank, ...rest } = candidate;
    return rest;
  }
  return candidate;
}
