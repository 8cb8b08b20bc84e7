/**
 * @fileoverview Tests for cross-encoder re-ranking
 */

import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { InMemoryMetrics, METRIC_NAMES } from '../../metrics/recorder.js';
import { silentLogger, type Logger } from '../../telemetry/logger.js';
import type { PairwiseRelevanceModel } from '../../types.js';
import { CrossEncoderReranker, createCrossEncoderReranker } from '../reranker.js';
import { fuse } from '../score_fusion.js';

const CANDIDATES = fuse(
  [],
  [
    { docId: 'd1', score: 3, content: 'alpha' },
    { docId: 'd2', score: 2, content: 'beta' },
    { docId: 'd3', score: 1, content: 'gamma' },
  ]
);

/** Scores each document by a fixed table keyed on its text. */
function tableModel(table: Record<string, number>): PairwiseRelevanceModel {
  return {
    score: vi.fn(async (_query: string, documents: readonly string[]) =>
      documents.map((document) => table[document] ?? 0)
    ),
  };
}

describe('CrossEncoderReranker', () => {
  it('should re-sort the head by cross-encoder score and keep the tail below it', async () => {
    const model = tableModel({ alpha: 0, beta: 2 });
    const reranker = createCrossEncoderReranker({ model, logger: silentLogger });

    const ranked = await reranker.rerank('query', CANDIDATES, 2);

    expect(ranked.map((candidate) => candidate.docId)).toEqual(['d2', 'd1', 'd3']);
    expect(ranked.map((candidate) => candidate.rank)).toEqual([1, 2, 3]);
    expect(ranked[0]?.rerankScore).toBeCloseTo(1 / (1 + Math.exp(-2)), 10);
    expect(ranked[1]?.finalScore).toBe(0.5);
    expect(ranked[2]).toMatchObject({ rerankScore: null, finalScore: 0.5 });
    expect(model.score).toHaveBeenCalledWith('query', ['alpha', 'beta'], expect.anything());
  });

  it('should skip the model when topK is 0', async () => {
    const model = tableModel({});
    const reranker = new CrossEncoderReranker({ model, logger: silentLogger });

    const ranked = await reranker.rerank('query', CANDIDATES, 0);

    expect(ranked.map((candidate) => candidate.docId)).toEqual(['d1', 'd2', 'd3']);
    expect(model.score).not.toHaveBeenCalled();
  });

  it('should reject a negative or fractional topK', async () => {
    const reranker = new CrossEncoderReranker({ model: tableModel({}), logger: silentLogger });

    await expect(reranker.rerank('query', CANDIDATES, -1)).rejects.toBeInstanceOf(ValidationError);
    await expect(reranker.rerank('query', CANDIDATES, 1.5)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should fall back to the input order when the model times out', async () => {
    const model: PairwiseRelevanceModel = { score: () => new Promise<number[]>(() => {}) };
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const reranker = new CrossEncoderReranker({ model, timeoutMs: 20, logger });

    const ranked = await reranker.rerank('query', CANDIDATES, 3);

    expect(ranked.map((candidate) => candidate.docId)).toEqual(['d1', 'd2', 'd3']);
    expect(ranked.every((candidate) => candidate.rerankScore === null)).toBe(true);
    expect(reranker.stats()).toMatchObject({ totalCalls: 1, fallbacks: 1, timeouts: 1, rescored: 0 });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back when the model returns the wrong number of scores', async () => {
    const model: PairwiseRelevanceModel = { score: async () => [1] };
    const metrics = new InMemoryMetrics();
    const reranker = new CrossEncoderReranker({ model, logger: silentLogger, metrics });

    const ranked = await reranker.rerank('query', CANDIDATES, 2);

    expect(ranked.map((candidate) => candidate.docId)).toEqual(['d1', 'd2', 'd3']);
    expect(metrics.getHistogram(METRIC_NAMES.rerankDuration, { outcome: 'error' })?.count).toBe(1);
    expect(reranker.stats().timeouts).toBe(0);
  });

  it('should fall back without calling the model when a head candidate has no text', async () => {
    const model = tableModel({});
    const reranker = new CrossEncoderReranker({ model, logger: silentLogger });
    const bare = fuse([{ docId: 'x', score: 1 }], []);

    const ranked = await reranker.rerank('query', bare, 1);

    expect(ranked.map((candidate) => candidate.docId)).toEqual(['x']);
    expect(model.score).not.toHaveBeenCalled();
    expect(reranker.stats().fallbacks).toBe(1);
  });

  it('should record latency for successful calls', async () => {
    let now = 0;
    const model: PairwiseRelevanceModel = {
      score: async (_query, documents) => {
        now += 40;
        return documents.map(() => 1);
      },
    };
    const metrics = new InMemoryMetrics();
    const reranker = new CrossEncoderReranker({ model, logger: silentLogger, metrics, clock: () => now });

    await reranker.rerank('query', CANDIDATES, 3);

    expect(metrics.getHistogram(METRIC_NAMES.rerankDuration, { outcome: 'success' })?.sum).toBe(40);
    expect(reranker.stats()).toMatchObject({ totalCalls: 1, rescored: 3, averageLatencyMs: 40 });
  });

  it('should return an empty list unchanged', async () => {
    const reranker = new CrossEncoderReranker({ model: tableModel({}), logger: silentLogger });
    await expect(reranker.rerank('query', [], 5)).resolves.toEqual([]);
  });
});
