/**
 * @fileoverview Cache fingerprints
 *
 * SHA-256 over the normalized query text and every request parameter that
 * changes the answer. Keys are stable across processes and key order.
 */

import { createHash } from 'node:crypto';
import { normalizeText } from '../query/tokenizer.js';

/** Request parameters that change the ranked answer for a query. */
export interface FingerprintParams {
  rerankTopK: number;
  diversityLambda: number | null;
  resultLimit: number;
  filters: Readonly<Record<string, unknown>>;
}

/**
 * JSON with object keys sorted at every level.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  const body = keys
    .filter((key) => Reflect.get(value, key) !== undefined)
    .map((key) => `${JSON.stringify(key)}:${stableStringify(Reflect.get(value, key))}`);
  return `{${body.join(',')}}`;
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Exact-cache key for (normalized query, parameters).
 */
export function computeQueryFingerprint(query: string, params: FingerprintParams): string {
  return sha256(stableStringify({ q: normalizeText(query), p: params }));
}

/**
 * Parameters-only key. The semantic cache matches queries by embedding, but
 * only among entries computed under the same parameters.
 */
export function computeScopeKey(params: FingerprintParams): string {
  return sha256(stableStringify(params));
}
