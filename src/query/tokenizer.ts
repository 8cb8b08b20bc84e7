/**
 * @fileoverview Query text normalization and tokenization
 *
 * Shared by the expander, the cache fingerprint and the stale-cache fallback,
 * so "Machine  Learning" and "machine learning" always agree.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

const STOPWORDS_URL = new URL('../../data/stopwords.json', import.meta.url);
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

const StopwordsSchema = z.array(z.string().min(1));

let defaultStopwords: ReadonlySet<string> | null = null;

/**
 * Load a stopword list (JSON array of strings). Without a path, the bundled
 * English list is loaded once and shared.
 */
export function loadStopwords(path?: URL | string): ReadonlySet<string> {
  if (!path && defaultStopwords) return defaultStopwords;
  const source = path ?? STOPWORDS_URL;
  let parsed: z.infer<typeof StopwordsSchema>;
  try {
    parsed = StopwordsSchema.parse(JSON.parse(readFileSync(source, 'utf8')));
  } catch (error) {
    throw new ConfigurationError('stopwords', `cannot load ${String(source)}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const words: ReadonlySet<string> = new Set(parsed.map((word) => word.toLowerCase()));
  if (!path) defaultStopwords = words;
  return words;
}

/**
 * Unicode-normalize, lowercase and collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Lowercased word tokens in order of appearance, duplicates kept. */
export function tokenize(text: string): string[] {
  return normalizeText(text).match(TOKEN_PATTERN) ?? [];
}

/**
 * Distinct non-stopword tokens in order of first appearance.
 */
export function contentTerms(text: string, stopwords: ReadonlySet<string> = loadStopwords()): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const token of tokenize(text)) {
    if (stopwords.has(token) || seen.has(token)) continue;
    seen.add(token);
    terms.push(token);
  }
  return terms;
}

export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}
