/**
 * Ledger - Durable Completion Record
 *
 * Persistent set of activity tuples that have been fully processed. The
 * Run Coordinator holds the only writing reference; the Feed Walker reads it
 * to find the stop page.
 *
 * INVARIANTS:
 * - Append-only: no deletion or rewrite is exposed (and the schema's triggers
 *   reject both)
 * - Marking an id twice keeps the first completion time
 * - A failed write is fatal to the run (LedgerWriteError), so processing never
 *   continues without a durable completion record
 */

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { LedgerWriteError, errorMessage } from '../core/errors.js';
import type { LedgerEntry } from '../core/types.js';

// ============================================================================
// Contract
// ============================================================================

/**
 * Append-only completion ledger
 */
export interface Ledger {
  /** True once `uniqueId` has been marked completed */
  has(uniqueId: string): Promise<boolean>;

  /**
   * Record `uniqueId` as fully processed
   *
   * @throws {LedgerWriteError} If the marker could not be persisted
   */
  markCompleted(uniqueId: string, completedAt: Date): Promise<void>;

  /** Number of distinct ids in `uniqueIds` that are already completed */
  countCompleted(uniqueIds: Iterable<string>): Promise<number>;
}

export interface LedgerStats {
  readonly total: number;
  readonly lastCompletedAt: string | null;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/** SQLite's default host-parameter limit is 999; stay well below it */
const MAX_IDS_PER_QUERY = 500;

/**
 * Apply the ledger schema (idempotent)
 */
export function initializeLedgerSchema(db: SqliteDatabase): void {
  db.exec(readFileSync(SCHEMA_PATH, 'utf-8'));
}

/**
 * Open (or create) the ledger database file and apply the schema
 *
 * @param path - Database file path, or ':memory:'
 */
export function openLedgerDatabase(path: string): SqliteDatabase {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = FULL');
  initializeLedgerSchema(db);
  return db;
}

// ============================================================================
// SQLite Ledger
// ============================================================================

/**
 * Ledger backed by the `ledger_entries` table
 *
 * @example
 * ```typescript
 * const db = openLedgerDatabase('./data/ledger.sqlite3');
 * const ledger = new SqliteLedger(db);
 *
 * if (!(await ledger.has(tuple.uniqueId))) {
 *   // ... process ...
 *   await ledger.markCompleted(tuple.uniqueId, new Date());
 * }
 * ```
 */
export class SqliteLedger implements Ledger {
  constructor(private readonly db: SqliteDatabase) {}

  async has(uniqueId: string): Promise<boolean> {
    const row = this.db
      .prepare('SELECT 1 AS present FROM ledger_entries WHERE unique_id = ?')
      .get(uniqueId);
    return row !== undefined;
  }

  async markCompleted(uniqueId: string, completedAt: Date): Promise<void> {
    try {
      this.db
        .prepare(`
          INSERT INTO ledger_entries (unique_id, completed_at)
          VALUES (?, ?)
          ON CONFLICT(unique_id) DO NOTHING
        `)
        .run(uniqueId, completedAt.toISOString());
    } catch (error) {
      throw new LedgerWriteError(uniqueId, errorMessage(error), { cause: error });
    }
  }

  async countCompleted(uniqueIds: Iterable<string>): Promise<number> {
    const distinct = [...new Set(uniqueIds)];
    let completed = 0;

    for (let i = 0; i < distinct.length; i += MAX_IDS_PER_QUERY) {
      const chunk = distinct.slice(i, i + MAX_IDS_PER_QUERY);
      const placeholders = chunk.map(() => '?').join(', ');
      const row = this.db
        .prepare(`SELECT COUNT(*) AS count FROM ledger_entries WHERE unique_id IN (${placeholders})`)
        .get(...chunk) as { count: number };
      completed += row.count;
    }

    return completed;
  }

  /**
   * Look up one completion marker
   */
  async get(uniqueId: string): Promise<LedgerEntry | null> {
    const row = this.db
      .prepare('SELECT unique_id, completed_at FROM ledger_entries WHERE unique_id = ?')
      .get(uniqueId) as { unique_id: string; completed_at: string } | undefined;

    return row ? { uniqueId: row.unique_id, completedAt: row.completed_at } : null;
  }

  async stats(): Promise<LedgerStats> {
    const row = this.db
      .prepare('SELECT COUNT(*) AS total, MAX(completed_at) AS last FROM ledger_entries')
      .get() as { total: number; last: string | null };

    return { total: row.total, lastCompletedAt: row.last };
  }
}
