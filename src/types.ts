/**
 * @fileoverview Core types for the hybrid retrieval engine
 */

// ============================================================================
// CANDIDATES
// ============================================================================

/**
 * One ranked document chunk in a result list. Created fresh per query and
 * frozen once built; within a list `finalScore` is non-increasing by `rank`.
 */
export interface SearchCandidate {
  readonly docId: string;
  /** Opaque pointer to the chunk's stored content */
  readonly contentRef: string;
  /** Chunk text when the backend supplied it (needed by the cross-encoder) */
  readonly content?: string;
  /** Chunk embedding when the vector backend supplied it (used by MMR) */
  readonly embedding?: readonly number[];
  /** Raw vector-similarity score; null when the doc was not a vector hit */
  readonly vectorScore: number | null;
  /** Raw keyword-match score; null when the doc was not a keyword hit */
  readonly keywordScore: number | null;
  readonly fusedScore: number;
  /** Cross-encoder relevance in [0, 1]; null when not re-scored */
  readonly rerankScore: number | null;
  readonly finalScore: number;
  /** 1-indexed position in the list */
  readonly rank: number;
}

/**
 * A candidate whose final score may still change. Ranking stages consume and
 * produce these; only `assignRanks` turns them into {@link SearchCandidate}s.
 */
export type UnrankedCandidate = Omit<SearchCandidate, 'rank'>;

// ============================================================================
// EXTERNAL INTERFACES
// ============================================================================

export type SearchFilters = Readonly<Record<string, string | number | boolean>>;

/**
 * A single hit as returned by a backend. Backends return hits best first;
 * fusion ranks by that order and carries `score` through as the raw value,
 * whichever direction the backend's scale runs.
 */
export interface BackendCandidate {
  docId: string;
  score: number;
  contentRef?: string;
  content?: string;
  embedding?: ArrayLike<number>;
}

export interface BackendCallOptions {
  signal?: AbortSignal;
}

/**
 * k-nearest-neighbour search over chunk embeddings. Implementations raise
 * BackendError with a transient kind (timeout, connection, io) or a permanent
 * one (invalid_input for an unknown filter, not_found).
 */
export interface VectorBackend {
  query(
    embedding: Float32Array,
    topK: number,
    filters: SearchFilters,
    options?: BackendCallOptions
  ): Promise<BackendCandidate[]>;
}

export interface KeywordBackend {
  query(terms: readonly string[], topK: number, options?: BackendCallOptions): Promise<BackendCandidate[]>;
}

export interface EmbeddingProvider {
  embed(text: string, options?: BackendCallOptions): Promise<Float32Array>;
}

/**
 * Cross-encoder style model: scores each (query, document) pair jointly.
 * Returns one raw logit per document, in input order.
 */
export interface PairwiseRelevanceModel {
  score(query: string, documents: readonly string[], options?: BackendCallOptions): Promise<number[]>;
}
