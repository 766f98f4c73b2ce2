/**
 * Run report accumulator
 *
 * Collects report entries in processing (feed) order while a run is in
 * progress and produces the immutable RunReport once at the end.
 */

import type {
  ReportEntry,
  ReportOutcomeKind,
  RunAbort,
  RunReport,
} from '../core/types.js';

export const REPORT_OUTCOME_KINDS: readonly ReportOutcomeKind[] = [
  'no_action',
  'qualifier_updated',
  'claim_added',
  'conflict_flagged',
  'fetch_error',
] as const;

function emptyCounts(): Record<ReportOutcomeKind, number> {
  return {
    no_action: 0,
    qualifier_updated: 0,
    claim_added: 0,
    conflict_flagged: 0,
    fetch_error: 0,
  };
}

export class RunReportAccumulator {
  private readonly entries: ReportEntry[] = [];
  private readonly counts = emptyCounts();
  private pagesWalked = 0;
  private abortInfo: RunAbort | undefined;
  private finalized: RunReport | null = null;

  constructor(
    private readonly runId: string,
    private readonly startedAt: Date,
    private readonly dryRun: boolean
  ) {}

  setPagesWalked(pages: number): void {
    this.assertOpen();
    this.pagesWalked = pages;
  }

  record(entry: ReportEntry): void {
    this.assertOpen();
    this.entries.push(entry);
    this.counts[entry.outcome.kind] += 1;
  }

  abort(info: RunAbort): void {
    this.assertOpen();
    this.abortInfo = info;
  }

  get entryCount(): number {
    return this.entries.length;
  }

  /**
   * Freeze the report. Later calls return the same object.
   */
  finalize(finishedAt: Date): RunReport {
    if (this.finalized) return this.finalized;

    const report: RunReport = {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      dryRun: this.dryRun,
      pagesWalked: this.pagesWalked,
      entries: Object.freeze([...this.entries]),
      counts: Object.freeze({ ...this.counts }),
      ...(this.abortInfo ? { abort: this.abortInfo } : {}),
    };

    this.finalized = Object.freeze(report);
    return this.finalized;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error(`Run report ${this.runId} is finalized`);
    }
  }
}

/**
 * Number of per-tuple soft failures in a report
 */
export function softFailureCount(report: RunReport): number {
  return report.counts.fetch_error;
}
