/**
 * Run Lock
 *
 * Exclusive access to the ledger for one run at a time. A second run that
 * finds the lock held aborts early: the ledger only grows, so nothing it
 * skipped is lost; the next run picks it up.
 *
 * A lock older than the staleness window belongs to a run that died without
 * releasing it and is taken over.
 */

import type { Database as SqliteDatabase } from 'better-sqlite3';
import { RunLockedError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'run-lock' });

export interface RunLockOptions {
  /** Age after which a held lock is considered abandoned (default: 6 hours) */
  readonly staleAfterMs?: number;
  readonly now?: () => Date;
}

export class RunLock {
  private readonly staleAfterMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: SqliteDatabase,
    options: RunLockOptions = {}
  ) {
    this.staleAfterMs = options.staleAfterMs ?? 6 * 60 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Take the lock for `runId`
   *
   * @throws {RunLockedError} If another live run holds it
   */
  acquire(runId: string): void {
    const take = this.db.transaction((id: string) => {
      const held = this.db
        .prepare('SELECT run_id, acquired_at FROM run_lock WHERE id = 1')
        .get() as { run_id: string; acquired_at: string } | undefined;

      const now = this.now();

      if (held) {
        const age = now.getTime() - Date.parse(held.acquired_at);
        if (age < this.staleAfterMs) {
          throw new RunLockedError(held.run_id, held.acquired_at);
        }
        log.warn('Taking over stale run lock', {
          staleRunId: held.run_id,
          acquiredAt: held.acquired_at,
        });
      }

      this.db
        .prepare(`
          INSERT INTO run_lock (id, run_id, acquired_at) VALUES (1, ?, ?)
          ON CONFLICT(id) DO UPDATE SET run_id = excluded.run_id, acquired_at = excluded.acquired_at
        `)
        .run(id, now.toISOString());
    });

    // IMMEDIATE: take the write lock before reading so two runs cannot both see it free
    take.immediate(runId);
    log.debug('Run lock acquired', { runId });
  }

  /**
   * Release the lock if `runId` still holds it
   */
  release(runId: string): void {
    this.db.prepare('DELETE FROM run_lock WHERE id = 1 AND run_id = ?').run(runId);
    log.debug('Run lock released', { runId });
  }

  /**
   * Current holder, if any
   */
  holder(): { runId: string; acquiredAt: string } | null {
    const row = this.db
      .prepare('SELECT run_id, acquired_at FROM run_lock WHERE id = 1')
      .get() as { run_id: string; acquired_at: string } | undefined;

    return row ? { runId: row.run_id, acquiredAt: row.acquired_at } : null;
  }
}
