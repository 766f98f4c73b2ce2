/**
 * Ledger Has Command
 *
 * Usage:
 *   authority-sync ledger has <unique-id> [--json]
 *
 * Exits 0 when the tuple is completed, 1 when it is not.
 */

import type { Command } from 'commander';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { errorMessage } from '../../../core/errors.js';
import { SqliteLedger } from '../../../persistence/ledger.js';
import type { SyncConfig } from '../../lib/config.js';
import { EXIT_CODES } from '../../lib/exit-codes.js';
import { openExistingLedger } from './open.js';

/**
 * Register the has command
 */
export function registerHasCommand(parent: Command, loadConfig: () => SyncConfig): void {
  parent
    .command('has <uniqueId>')
    .description('Whether an activity tuple (authority-update-published) is completed')
    .action(async (uniqueId: string) => {
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
        const entry = await new SqliteLedger(db).get(uniqueId);
        if (config.json) {
          console.log(JSON.stringify({ uniqueId, completed: entry !== null, completedAt: entry?.completedAt ?? null }));
        } else {
          console.log(entry ? `completed at ${entry.completedAt}` : 'not completed');
        }
        process.exitCode = entry ? EXIT_CODES.SUCCESS : EXIT_CODES.SOFT_FAILURES;
      } finally {
        db.close();
      }
    });
}
