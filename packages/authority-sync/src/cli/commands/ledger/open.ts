/**
 * Open an existing ledger for inspection
 */

import { existsSync } from 'node:fs';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { ConfigError } from '../../../core/errors.js';
import { openLedgerDatabase } from '../../../persistence/ledger.js';

/**
 * @throws {ConfigError} If no ledger exists at `path` (inspection never creates one)
 */
export function openExistingLedger(path: string): SqliteDatabase {
  if (!existsSync(path)) {
    throw new ConfigError(`No ledger at ${path}`);
  }
  return openLedgerDatabase(path);
}
