/**
 * Exit Code Tests
 */

import { describe, it, expect } from 'vitest';
import { EXIT_CODES, exitCodeForReport } from '../../../cli/lib/exit-codes.js';
import { RunReportAccumulator } from '../../../services/run-report.js';
import { emptyReport, finishedAt, mixedReport, startedAt } from '../../utils/reports.js';

function abortedReport(errorCode: string, fatal: boolean) {
  const report = new RunReportAccumulator('run-x', startedAt, false);
  report.abort({ errorCode, message: 'stopped', fatal });
  return report.finalize(finishedAt);
}

describe('exitCodeForReport', () => {
  it('should succeed for a clean run', () => {
    expect(exitCodeForReport(emptyReport())).toBe(EXIT_CODES.SUCCESS);
  });

  it('should signal soft failures when any tuple failed to fetch', () => {
    expect(exitCodeForReport(mixedReport())).toBe(EXIT_CODES.SOFT_FAILURES);
  });

  it('should distinguish a feed abort from ledger trouble', () => {
    expect(exitCodeForReport(abortedReport('feed_fetch', false))).toBe(EXIT_CODES.FEED_ABORTED);
    expect(exitCodeForReport(abortedReport('ledger_write', true))).toBe(EXIT_CODES.LEDGER_FATAL);
  });
});
