/**
 * @fileoverview In-memory vector index
 *
 * Brute-force cosine search behind the {@link VectorBackend} interface. It is
 * the reference backend for embedding the engine in small deployments and
 * tests; production deployments plug an ANN service in behind the same
 * interface.
 *
 * @example
 * ```typescript
 * const index = new InMemoryVectorIndex();
 * index.add({ docId: 'doc-1', embedding, content: 'intro to retrieval', metadata: { lang: 'en' } });
 * const hits = await index.query(queryEmbedding, 10, { lang: 'en' });
 * ```
 */

import { BackendError, ValidationError } from '../core/errors.js';
import type { BackendCallOptions, BackendCandidate, SearchFilters, VectorBackend } from '../types.js';
import { throwIfAborted } from '../utils/async.js';
import { cosineSimilarity } from '../utils/math.js';
import { compareDocIds } from '../query/candidates.js';

export type VectorMetadata = Readonly<Record<string, string | number | boolean>>;

export interface VectorIndexItem {
  docId: string;
  embedding: Float32Array;
  content?: string;
  contentRef?: string;
  metadata?: VectorMetadata;
}

const BACKEND_NAME = 'vector-index';

export class InMemoryVectorIndex implements VectorBackend {
  private readonly items = new Map<string, VectorIndexItem>();
  private readonly metadataKeys = new Set<string>();
  private dimension: number | null = null;

  /**
   * Get the number of indexed vectors.
   */
  size(): number {
    return this.items.size;
  }

  /**
   * Insert or replace a vector. All vectors must share one dimension.
   */
  add(item: VectorIndexItem): void {
    if (item.embedding.length === 0) {
      throw new ValidationError('embedding', 'non-empty vector', 'empty vector');
    }
    if (this.dimension !== null && item.embedding.length !== this.dimension) {
      throw new ValidationError('embedding', `dimension ${this.dimension}`, `dimension ${item.embedding.length}`);
    }
    this.dimension = item.embedding.length;
    for (const key of Object.keys(item.metadata ?? {})) {
      this.metadataKeys.add(key);
    }
    this.items.set(item.docId, {
      ...item,
      embedding: Float32Array.from(item.embedding),
      metadata: { ...item.metadata },
    });
  }

  remove(docId: string): boolean {
    return this.items.delete(docId);
  }

  clear(): void {
    this.items.clear();
    this.metadataKeys.clear();
    this.dimension = null;
  }

  async query(
    embedding: Float32Array,
    topK: number,
    filters: SearchFilters = {},
    options: BackendCallOptions = {}
  ): Promise<BackendCandidate[]> {
    throwIfAborted(options.signal, 'vector index query');
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new BackendError(BACKEND_NAME, 'invalid_input', `topK must be a positive integer, got ${topK}`);
    }
    if (this.dimension !== null && embedding.length !== this.dimension) {
      throw new BackendError(
        BACKEND_NAME,
        'invalid_input',
        `query dimension ${embedding.length} does not match index dimension ${this.dimension}`
      );
    }
    const unknownKeys = Object.keys(filters).filter((key) => !this.metadataKeys.has(key));
    if (unknownKeys.length > 0) {
      throw new BackendError(BACKEND_NAME, 'invalid_input', `unknown filter field(s): ${unknownKeys.join(', ')}`);
    }

    const scored: Array<{ item: VectorIndexItem; score: number }> = [];
    for (const item of this.items.values()) {
      if (!matchesFilters(item.metadata, filters)) continue;
      scored.push({ item, score: cosineSimilarity(embedding, item.embedding) });
    }
    scored.sort((a, b) => b.score - a.score || compareDocIds(a.item.docId, b.item.docId));

    return scored.slice(0, topK).map(({ item, score }) => ({
      docId: item.docId,
      score,
      contentRef: item.contentRef ?? item.docId,
      ...(item.content !== undefined ? { content: item.content } : {}),
      embedding: Float32Array.from(item.embedding),
    }));
  }
}

function matchesFilters(metadata: VectorMetadata | undefined, filters: SearchFilters): boolean {
  for (const [key, expected] of Object.entries(filters)) {
    if (metadata?.[key] !== expected) return false;
  }
  return true;
}

export function createInMemoryVectorIndex(): InMemoryVectorIndex {
  return new InMemoryVectorIndex();
}
