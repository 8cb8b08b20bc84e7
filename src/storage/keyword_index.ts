/**
 * @fileoverview SQLite FTS5 keyword index
 *
 * Keyword backend over an FTS5 virtual table, ranked with BM25. SQLite's
 * `bm25()` is lower-is-better (and negative), so the backend reports its
 * negation as the score.
 *
 * Query terms are quoted individually and OR-ed, which keeps user text from
 * being interpreted as FTS5 syntax.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { BackendError, type FailureKind } from '../core/errors.js';
import type { BackendCallOptions, BackendCandidate, KeywordBackend } from '../types.js';
import { throwIfAborted } from '../utils/async.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface KeywordDocument {
  docId: string;
  content: string;
  contentRef?: string;
}

export interface SqliteKeywordIndexOptions {
  /** Database file; ':memory:' keeps the index in process (default) */
  path?: string;
}

const BACKEND_NAME = 'keyword-index';

const MatchRowSchema = z.object({
  doc_id: z.string(),
  content_ref: z.string(),
  content: z.string(),
  rank: z.number(),
});

const CountRowSchema = z.object({ count: z.number() });

// ============================================================================
// INDEX
// ============================================================================

export class SqliteKeywordIndex implements KeywordBackend {
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement;
  private readonly deleteStatement: Database.Statement;
  private readonly searchStatement: Database.Statement;
  private readonly countStatement: Database.Statement;

  constructor(options: SqliteKeywordIndexOptions = {}) {
    const path = options.path ?? ':memory:';
    this.db = new Database(path);
    if (path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('busy_timeout = 5000');
    }
    this.db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS retrieval_chunks_fts USING fts5(
        doc_id UNINDEXED,
        content_ref UNINDEXED,
        content,
        tokenize = 'unicode61 remove_diacritics 2'
      )
    `);
    this.insertStatement = this.db.prepare(
      'INSERT INTO retrieval_chunks_fts (doc_id, content_ref, content) VALUES (?, ?, ?)'
    );
    this.deleteStatement = this.db.prepare('DELETE FROM retrieval_chunks_fts WHERE doc_id = ?');
    this.searchStatement = this.db.prepare(`
      SELECT doc_id, content_ref, content, bm25(retrieval_chunks_fts) AS rank
      FROM retrieval_chunks_fts
      WHERE retrieval_chunks_fts MATCH ?
      ORDER BY rank, doc_id
      LIMIT ?
    `);
    this.countStatement = this.db.prepare('SELECT COUNT(*) AS count FROM retrieval_chunks_fts');
  }

  /**
   * Insert or replace documents in one transaction.
   */
  upsert(documents: readonly KeywordDocument[]): void {
    const write = this.db.transaction((batch: readonly KeywordDocument[]) => {
      for (const document of batch) {
        this.deleteStatement.run(document.docId);
        this.insertStatement.run(document.docId, document.contentRef ?? document.docId, document.content);
      }
    });
    write(documents);
  }

  remove(docId: string): boolean {
    return this.deleteStatement.run(docId).changes > 0;
  }

  count(): number {
    return CountRowSchema.parse(this.countStatement.get()).count;
  }

  async query(terms: readonly string[], topK: number, options: BackendCallOptions = {}): Promise<BackendCandidate[]> {
    throwIfAborted(options.signal, 'keyword index query');
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new BackendError(BACKEND_NAME, 'invalid_input', `topK must be a positive integer, got ${topK}`);
    }
    const expression = buildMatchExpression(terms);
    if (!expression) {
      return [];
    }

    let rows: unknown[];
    try {
      rows = this.searchStatement.all(expression, topK);
    } catch (error) {
      throw new BackendError(BACKEND_NAME, classifySqliteError(error), getErrorMessage(error), error);
    }

    return rows.map((row) => {
      const match = MatchRowSchema.parse(row);
      return {
        docId: match.doc_id,
        contentRef: match.content_ref,
        content: match.content,
        score: -match.rank,
      };
    });
  }

  close(): void {
    this.db.close();
  }
}

/**
 * `"term one" OR "term two"`, with embedded quotes doubled.
 */
export function buildMatchExpression(terms: readonly string[]): string {
  return terms
    .map((term) => term.trim())
    .filter((term) => term.length > 0)
    .map((term) => `"${term.replace(/"/g, '""')}"`)
    .join(' OR ');
}

function classifySqliteError(error: unknown): FailureKind {
  const code = getErrorCode(error) ?? '';
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED') || code.startsWith('SQLITE_IOERR')) {
    return 'io';
  }
  if (code.startsWith('SQLITE_ERROR')) {
    return 'invalid_input';
  }
  return 'unknown';
}

export function createSqliteKeywordIndex(options: SqliteKeywordIndexOptions = {}): SqliteKeywordIndex {
  return new SqliteKeywordIndex(options);
}
