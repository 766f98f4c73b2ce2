/**
 * Ledger Stats Command
 *
 * Usage:
 *   authority-sync ledger stats [--json]
 */

import type { Command } from 'commander';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { errorMessage } from '../../../core/errors.js';
import { SqliteLedger, type LedgerStats } from '../../../persistence/ledger.js';
import { RunLock } from '../../../persistence/run-lock.js';
import type { SyncConfig } from '../../lib/config.js';
import { EXIT_CODES } from '../../lib/exit-codes.js';
import { openExistingLedger } from './open.js';

export interface LedgerStatsView extends LedgerStats {
  readonly path: string;
  readonly lockHolder: { readonly runId: string; readonly acquiredAt: string } | null;
}

/**
 * Collect the stats shown by `ledger stats`
 */
export async function collectLedgerStats(db: SqliteDatabase, path: string): Promise<LedgerStatsView> {
  const stats = await new SqliteLedger(db).stats();
  return { path, ...stats, lockHolder: new RunLock(db).holder() };
}

export function formatLedgerStats(view: LedgerStatsView): string {
  const lines = [
    `Ledger: ${view.path}`,
    `  Completed entries: ${view.total}`,
    `  Last completed:    ${view.lastCompletedAt ?? 'never'}`,
    `  Run lock:          ${view.lockHolder ? `${view.lockHolder.runId} since ${view.lockHolder.acquiredAt}` : 'free'}`,
  ];
  return lines.join('\n');
}

/**
 * Register the stats command
 */
export function registerStatsCommand(parent: Command, loadConfig: () => SyncConfig): void {
  parent
    .command('stats')
    .description('Completed-entry count and most recent completion time')
    .action(async () => {
      let config: SyncConfig;
      try {
        config = loadConfig();
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      let db: SqliteDatabase;
      try {
        db = openExistingLedger(config.paths.ledger);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      try {
        const view = await collectLedgerStats(db, config.paths.ledger);
        console.log(config.json ? JSON.stringify(view, null, 2) : formatLedgerStats(view));
      } finally {
        db.close();
      }
    });
}
