/**
 * Ledger Commands Index
 *
 * Registers read-only ledger subcommands:
 * - stats: Completed-entry count, last completion time, lock holder
 * - has: Whether one activity tuple is completed
 */

import type { Command } from 'commander';
import type { SyncConfig } from '../../lib/config.js';
import { registerStatsCommand } from './stats.js';
import { registerHasCommand } from './has.js';

/**
 * Register all ledger subcommands
 *
 * @param program - Commander program instance
 * @param loadConfig - Resolves configuration for this invocation
 */
export function registerLedgerCommands(program: Command, loadConfig: () => SyncConfig): void {
  const ledger = program
    .command('ledger')
    .description('Inspect the completion ledger');

  registerStatsCommand(ledger, loadConfig);
  registerHasCommand(ledger, loadConfig);
}
