/**
 * Reports Commands Index
 *
 * Registers read-only report subcommands:
 * - recent: Actions logged by the runs of the last N days
 */

import type { Command } from 'commander';
import type { SyncConfig } from '../../lib/config.js';
import { registerRecentCommand } from './recent.js';

/**
 * Register all report subcommands
 *
 * @param program - Commander program instance
 * @param loadConfig - Resolves configuration for this invocation
 */
export function registerReportsCommands(program: Command, loadConfig: () => SyncConfig): void {
  const reports = program
    .command('reports')
    .description('Review published run reports');

  registerRecentCommand(reports, loadConfig);
}
