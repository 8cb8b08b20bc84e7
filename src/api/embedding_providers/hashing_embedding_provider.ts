/**
 * @fileoverview Feature-hashing embedding provider
 *
 * Deterministic bag-of-words embeddings: each token is hashed (FNV-1a) into
 * one of `dimension` buckets with a hash-derived sign, and the vector is
 * L2-normalized. Texts sharing vocabulary get high cosine similarity.
 *
 * No model download and no network, which makes it the default for local
 * development, examples and tests. Production hosts inject a real provider.
 */

import { ValidationError } from '../../core/errors.js';
import { tokenize } from '../../query/tokenizer.js';
import type { BackendCallOptions, EmbeddingProvider } from '../../types.js';
import { throwIfAborted } from '../../utils/async.js';

export const DEFAULT_HASHING_DIMENSION = 256;

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimension: number = DEFAULT_HASHING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError('dimension', 'positive integer', String(dimension));
    }
  }

  /** Synchronous core of {@link embed}. */
  embedSync(text: string): Float32Array {
    const vector = new Float32Array(this.dimension);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + ((hash & 0x80000000) === 0 ? 1 : -1);
    }
    let norm = 0;
    for (const value of vector) norm += value * value;
    if (norm > 0) {
      const scale = 1 / Math.sqrt(norm);
      for (let i = 0; i < vector.length; i++) {
        vector[i] = (vector[i] ?? 0) * scale;
      }
    }
    return vector;
  }

  async embed(text: string, options: BackendCallOptions = {}): Promise<Float32Array> {
    throwIfAborted(options.signal, 'hashing embed');
    return this.embedSync(text);
  }
}
