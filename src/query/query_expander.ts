/**
 * @fileoverview Query expansion
 *
 * Widens a query with related terms to improve keyword recall:
 * - acronyms ("ml" → "machine", "learning")
 * - synonyms from a lexicon, filtered by part of speech and corpus frequency
 *
 * Original content terms always come first. Related terms are taken
 * round-robin across the original terms so one richly connected word cannot
 * use up the whole expansion budget.
 *
 * An expander is immutable after construction; `expand` reads nothing else
 * and can be called from any number of concurrent requests.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { deepFreeze } from '../core/snapshot.js';
import { getErrorMessage } from '../utils/errors.js';
import { contentTerms, loadStopwords } from './tokenizer.js';

// ============================================================================
// LEXICON
// ============================================================================

const LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

const PartOfSpeechSchema = z.enum(['noun', 'verb', 'adj', 'adv']);

const RelatedTermSchema = z.object({
  term: z.string().min(1),
  pos: PartOfSpeechSchema,
  frequency: z.number().min(0).max(1),
}).strict();

const LexiconSchema = z.object({
  version: z.literal(1),
  synonyms: z.record(
    z.string(),
    z.object({
      pos: z.array(PartOfSpeechSchema).min(1),
      related: z.array(RelatedTermSchema),
    }).strict()
  ),
  acronyms: z.record(z.string(), z.string().min(1)),
}).strict();

export type PartOfSpeech = z.infer<typeof PartOfSpeechSchema>;
export type RelatedTerm = z.infer<typeof RelatedTermSchema>;
export type Lexicon = z.infer<typeof LexiconSchema>;

let bundledLexicon: Lexicon | null = null;

/**
 * Load and validate a lexicon file. Without a path the bundled lexicon is
 * loaded once and shared (frozen).
 */
export function loadLexicon(path?: URL | string): Lexicon {
  if (!path && bundledLexicon) return bundledLexicon;
  const source = path ?? LEXICON_URL;
  let lexicon: Lexicon;
  try {
    lexicon = deepFreeze(LexiconSchema.parse(JSON.parse(readFileSync(source, 'utf8'))));
  } catch (error) {
    throw new ConfigurationError('lexicon', `cannot load ${String(source)}: ${getErrorMessage(error)}`);
  }
  if (!path) bundledLexicon = lexicon;
  return lexicon;
}

// ============================================================================
// TYPES
// ============================================================================

export interface QueryExpanderOptions {
  enabled?: boolean;
  useSynonyms?: boolean;
  useAcronyms?: boolean;
  /** Cap on related terms contributed by a single original term (default: 5) */
  maxExpansionsPerTerm?: number;
  /** Output never exceeds this multiple of the original term count (default: 3) */
  maxExpansionFactor?: number;
  /** Synonyms rarer than this are pruned (default: 0.2) */
  minFrequency?: number;
  /** Extra acronyms; override bundled entries with the same key */
  acronyms?: Record<string, string>;
  lexicon?: Lexicon;
  stopwords?: ReadonlySet<string>;
}

export interface ExpansionResult {
  originalQuery: string;
  originalTerms: string[];
  /** Original terms first, then related terms; deduplicated */
  terms: string[];
  /** The raw query followed by the added terms */
  expandedQuery: string;
  /** Synonyms that made it into `terms`, per original term */
  synonymExpansions: Record<string, string[]>;
  /** Acronyms recognised in the query and their long forms */
  acronymExpansions: Record<string, string>;
  totalExpansions: number;
}

export interface QueryExpanderStats {
  enabled: boolean;
  useSynonyms: boolean;
  useAcronyms: boolean;
  maxExpansionsPerTerm: number;
  maxExpansionFactor: number;
  minFrequency: number;
  acronymCount: number;
  synonymEntryCount: number;
}

interface Candidate {
  term: string;
  source: 'acronym' | 'synonym';
}

// ============================================================================
// EXPANDER
// ============================================================================

export class QueryExpander {
  private readonly enabled: boolean;
  private readonly useSynonyms: boolean;
  private readonly useAcronyms: boolean;
  private readonly maxExpansionsPerTerm: number;
  private readonly maxExpansionFactor: number;
  private readonly minFrequency: number;
  private readonly lexicon: Lexicon;
  private readonly acronyms: ReadonlyMap<string, string>;
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: QueryExpanderOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.useSynonyms = options.useSynonyms ?? true;
    this.useAcronyms = options.useAcronyms ?? true;
    this.maxExpansionsPerTerm = options.maxExpansionsPerTerm ?? 5;
    this.maxExpansionFactor = options.maxExpansionFactor ?? 3;
    this.minFrequency = options.minFrequency ?? 0.2;
    this.lexicon = options.lexicon ?? loadLexicon();
    this.stopwords = options.stopwords ?? loadStopwords();

    const acronyms = new Map<string, string>();
    for (const [short, long] of Object.entries(this.lexicon.acronyms)) {
      acronyms.set(short.toLowerCase(), long);
    }
    for (const [short, long] of Object.entries(options.acronyms ?? {})) {
      acronyms.set(short.toLowerCase(), long);
    }
    this.acronyms = acronyms;
  }

  /**
   * Expanded term list: original content terms first, then related terms.
   */
  expand(query: string): string[] {
    return this.expandDetailed(query).terms;
  }

  expandDetailed(query: string): ExpansionResult {
    const originalTerms = contentTerms(query, this.stopwords);
    const result: ExpansionResult = {
      originalQuery: query,
      originalTerms,
      terms: [...originalTerms],
      expandedQuery: query,
      synonymExpansions: {},
      acronymExpansions: {},
      totalExpansions: 0,
    };
    if (!this.enabled || originalTerms.length === 0) {
      return result;
    }

    const queues = originalTerms.map((term) => this.candidatesFor(term, result));
    const budget = Math.floor(originalTerms.length * this.maxExpansionFactor);
    const seen = new Set(originalTerms);
    const added: string[] = [];
    const taken = originalTerms.map(() => 0);

    let progressed = true;
    while (progressed && result.terms.length < budget) {
      progressed = false;
      for (let i = 0; i < originalTerms.length && result.terms.length < budget; i++) {
        const queue = queues[i];
        const source = originalTerms[i];
        if (!queue || source === undefined || (taken[i] ?? 0) >= this.maxExpansionsPerTerm) continue;
        let candidate = queue.shift();
        while (candidate && seen.has(candidate.term)) {
          candidate = queue.shift();
        }
        if (!candidate) continue;
        progressed = true;
        seen.add(candidate.term);
        taken[i] = (taken[i] ?? 0) + 1;
        result.terms.push(candidate.term);
        added.push(candidate.term);
        if (candidate.source === 'synonym') {
          (result.synonymExpansions[source] ??= []).push(candidate.term);
        }
      }
    }

    result.totalExpansions = added.length;
    result.expandedQuery = added.length > 0 ? `${query} ${added.join(' ')}` : query;
    return result;
  }

  /**
   * Boolean OR form for keyword engines that accept it: `(raw) OR term OR ...`.
   */
  toOrQuery(query: string): string {
    const { originalTerms, terms } = this.expandDetailed(query);
    const extra = terms.slice(originalTerms.length);
    return extra.length > 0 ? [`(${query})`, ...extra].join(' OR ') : query;
  }

  stats(): QueryExpanderStats {
    return {
      enabled: this.enabled,
      useSynonyms: this.useSynonyms,
      useAcronyms: this.useAcronyms,
      maxExpansionsPerTerm: this.maxExpansionsPerTerm,
      maxExpansionFactor: this.maxExpansionFactor,
      minFrequency: this.minFrequency,
      acronymCount: this.acronyms.size,
      synonymEntryCount: Object.keys(this.lexicon.synonyms).length,
    };
  }

  /**
   * Ordered related terms for one original term: acronym long-form words,
   * then synonyms by descending frequency.
   */
  private candidatesFor(term: string, result: ExpansionResult): Candidate[] {
    const candidates: Candidate[] = [];

    if (this.useAcronyms) {
      const longForm = this.acronyms.get(term);
      if (longForm) {
        result.acronymExpansions[term] = longForm;
        for (const word of contentTerms(longForm, this.stopwords)) {
          candidates.push({ term: word, source: 'acronym' });
        }
      }
    }

    if (this.useSynonyms) {
      const entry = this.lexicon.synonyms[term];
      if (entry) {
        const related = entry.related
          .filter((candidate) => entry.pos.includes(candidate.pos) && candidate.frequency >= this.minFrequency)
          .sort((a, b) => b.frequency - a.frequency || a.term.localeCompare(b.term));
        for (const candidate of related) {
          candidates.push({ term: candidate.term.toLowerCase(), source: 'synonym' });
        }
      }
    }

    return candidates;
  }
}

export function createQueryExpander(options: QueryExpanderOptions = {}): QueryExpander {
  return new QueryExpander(options);
}
