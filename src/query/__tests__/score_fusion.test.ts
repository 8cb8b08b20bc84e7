/**
 * @fileoverview Tests for reciprocal rank fusion
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import type { BackendCandidate } from '../../types.js';
import { fuse, orderBackendResults, rankSingleSource, rrfScore } from '../score_fusion.js';

const VECTOR: BackendCandidate[] = [
  { docId: 'doc1', score: 0.9 },
  { docId: 'doc2', score: 0.7 },
];
const KEYWORD: BackendCandidate[] = [
  { docId: 'doc2', score: 0.8 },
  { docId: 'doc3', score: 0.5 },
];

describe('rrfScore', () => {
  it('should weight a position by 1 / (k + rank)', () => {
    expect(rrfScore(1)).toBe(1 / 61);
    expect(rrfScore(2, 10, 0.5)).toBe(0.5 / 12);
  });
});

describe('fuse', () => {
  it('should rank a document found by both backends first', () => {
    const fused = fuse(VECTOR, KEYWORD, 60);

    expect(fused.map((candidate) => candidate.docId)).toEqual(['doc2', 'doc1', 'doc3']);
    expect(fused.map((candidate) => candidate.rank)).toEqual([1, 2, 3]);
    expect(fused[0]).toMatchObject({
      docId: 'doc2',
      contentRef: 'doc2',
      vectorScore: 0.7,
      keywordScore: 0.8,
      fusedScore: 1 / 62 + 1 / 61,
      rerankScore: null,
      finalScore: 1 / 62 + 1 / 61,
    });
    expect(fused[2]?.vectorScore).toBeNull();
  });

  it('should rank by list position rather than by raw score', () => {
    // Distance-style scores: lower is better, and the backend lists x first.
    const fused = fuse(
      [
        { docId: 'x', score: 0.1 },
        { docId: 'y', score: 0.9 },
      ],
      []
    );

    expect(fused.map((candidate) => [candidate.docId, candidate.fusedScore])).toEqual([
      ['x', 1 / 61],
      ['y', 1 / 62],
    ]);
    expect(fused[0]?.vectorScore).toBe(0.1);
  });

  it('should break equal fused scores the same way whichever list is passed first', () => {
    const left = [
      { docId: 'p', score: 0.5 },
      { docId: 'q', score: 0.5 },
    ];
    const right = [
      { docId: 'q', score: 0.5 },
      { docId: 'p', score: 0.5 },
    ];

    const forward = fuse(left, right);
    const swapped = fuse(right, left);

    expect(forward.map((candidate) => candidate.docId)).toEqual(['p', 'q']);
    expect(swapped).toEqual(forward);
  });

  it('should break fused-score ties by vector score, then docId', () => {
    const fused = fuse(
      [{ docId: 'b', score: 0.9 }],
      [{ docId: 'a', score: 0.9 }, { docId: 'c', score: 0.1 }]
    );
    // b and a both sit at rank 1 of one list; b has a vector score.
    expect(fused.map((candidate) => candidate.docId)).toEqual(['b', 'a', 'c']);

    const keywordOnly = fuse([], [{ docId: 'z', score: 1 }, { docId: 'y', score: 1 }]);
    expect(keywordOnly.map((candidate) => candidate.docId)).toEqual(['z', 'y']);
  });

  it('should apply per-source weights', () => {
    const fused = fuse(VECTOR, KEYWORD, 60, { vectorWeight: 0, keywordWeight: 1 });
    expect(fused.map((candidate) => candidate.docId)).toEqual(['doc2', 'doc3', 'doc1']);
  });

  it('should carry content and embeddings from the first list that has them', () => {
    const fused = fuse(
      [{ docId: 'doc1', score: 1, embedding: Float32Array.from([1, 0]), contentRef: 'ref-1' }],
      [{ docId: 'doc1', score: 2, content: 'body text' }]
    );
    expect(fused[0]).toMatchObject({ contentRef: 'ref-1', content: 'body text', embedding: [1, 0] });
  });

  it('should return an empty list when both inputs are empty', () => {
    expect(fuse([], [])).toEqual([]);
  });

  it('should reject a negative or non-finite k', () => {
    expect(() => fuse(VECTOR, KEYWORD, -1)).toThrow(ValidationError);
    expect(() => fuse(VECTOR, KEYWORD, Number.NaN)).toThrow(ValidationError);
  });

  it('should freeze returned candidates', () => {
    const [first] = fuse(VECTOR, KEYWORD);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe('orderBackendResults', () => {
  it('should keep list order and the first hit per document', () => {
    const ordered = orderBackendResults([
      { docId: 'a', score: 0.2 },
      { docId: 'b', score: 0.9 },
      { docId: 'a', score: 0.5 },
    ]);
    expect(ordered).toEqual([
      { docId: 'a', score: 0.2 },
      { docId: 'b', score: 0.9 },
    ]);
  });

  it('should count a repeated document once at its first rank when fusing', () => {
    const fused = fuse(
      [
        { docId: 'a', score: 0.2 },
        { docId: 'b', score: 0.9 },
        { docId: 'a', score: 0.5 },
      ],
      []
    );
    expect(fused.map((candidate) => [candidate.docId, candidate.fusedScore, candidate.vectorScore])).toEqual([
      ['a', 1 / 61, 0.2],
      ['b', 1 / 62, 0.9],
    ]);
  });
});

describe('rankSingleSource', () => {
  it('should rank one list on the fused scale', () => {
    const ranked = rankSingleSource(KEYWORD, 'keyword');
    expect(ranked.map((candidate) => [candidate.docId, candidate.fusedScore])).toEqual([
      ['doc2', 1 / 61],
      ['doc3', 1 / 62],
    ]);
  });
});
