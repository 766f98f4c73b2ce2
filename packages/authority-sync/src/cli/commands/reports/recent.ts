/**
 * Recent Reports Command
 *
 * Usage:
 *   authority-sync reports recent [--days <n>] [--action <label>] [--json]
 */

import type { Command } from 'commander';
import { errorMessage } from '../../../core/errors.js';
import { listRecentActions, type ArchivedAction } from '../../../reporting/report-archive.js';
import type { SyncConfig } from '../../lib/config.js';
import { EXIT_CODES } from '../../lib/exit-codes.js';

interface RecentOptions {
  readonly days: string;
  readonly action?: string;
}

export function formatRecentActions(actions: readonly ArchivedAction[]): string {
  if (actions.length === 0) {
    return 'No logged actions.';
  }

  const lines = actions.map(
    (entry) =>
      `${entry.startedAt.slice(0, 10)}  ${entry.action.padEnd(15)} ${entry.authorityId.padEnd(14)} ${entry.entityId || '-'}`
  );
  lines.push('', `${actions.length} action(s)`);
  return lines.join('\n');
}

/**
 * Register the recent command
 */
export function registerRecentCommand(parent: Command, loadConfig: () => SyncConfig): void {
  parent
    .command('recent')
    .description('List the actions logged by recent runs')
    .option('--days <n>', 'Days back to include', '14')
    .option('--action <label>', 'Only this action, e.g. NEED_REVIEW')
    .action(async (options: RecentOptions) => {
      let config: SyncConfig;
      try {
        config = loadConfig();
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      const daysBack = Number(options.days);
      if (!Number.isInteger(daysBack) || daysBack < 0) {
        console.error(`Error: --days must be a whole number, got ${options.days}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      const actions = await listRecentActions(config.paths.reports, {
        daysBack,
        ...(options.action !== undefined ? { action: options.action } : {}),
      });
      console.log(config.json ? JSON.stringify(actions, null, 2) : formatRecentActions(actions));
    });
}
