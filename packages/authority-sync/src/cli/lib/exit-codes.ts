/**
 * Process exit codes
 */

import type { RunReport } from '../../core/types.js';
import { softFailureCount } from '../../services/run-report.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  SOFT_FAILURES: 1,
  RUN_LOCKED: 2,
  CONFIG_ERROR: 3,
  FEED_ABORTED: 4,
  LEDGER_FATAL: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a finished (possibly aborted) run
 *
 * Any abort other than a feed fetch failure is fatal ledger trouble: a failed
 * ledger read during the walk or a failed mark during processing.
 */
export function exitCodeForReport(report: RunReport): ExitCode {
  if (report.abort) {
    return report.abort.errorCode === 'feed_fetch' ? EXIT_CODES.FEED_ABORTED : EXIT_CODES.LEDGER_FATAL;
  }
  return softFailureCount(report) > 0 ? EXIT_CODES.SOFT_FAILURES : EXIT_CODES.SUCCESS;
}
