/**
 * Run Coordinator - One Reconciliation Run
 *
 * Drives Feed Walker -> Record Extractor -> Entity Merger for every
 * unprocessed activity tuple, marks the ledger, and accumulates the report.
 *
 * ALGORITHM:
 * 1. Take the run lock (a second concurrent run aborts here)
 * 2. Walk the feed for the unprocessed batch; a FeedFetchError ends the run
 *    with nothing marked
 * 3. For each tuple, in feed order:
 *    a. extract the record
 *    b. no candidate id         -> NoAction ("no knowledge-base reference found")
 *       several candidate ids   -> ConflictFlagged, no write
 *       one candidate id        -> Entity Merger decision
 *    c. decision reached        -> ledger mark (conflicts included: they are terminal)
 *       per-tuple failure       -> report it, no ledger mark, continue
 * 4. A ledger write failure stops the run immediately (fatal)
 *
 * The ledger is written only here, once per settled tuple.
 */

import { v4 as uuidv4 } from 'uuid';
import { CONFLICT_REASONS, NO_ACTION_REASONS } from '../core/constants.js';
import { FeedFetchError, SyncError, errorMessage } from '../core/errors.js';
import type { ActivityTuple, ReportEntry, RunReport } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { FeedWalker } from '../acquisition/feed-walker.js';
import type { RecordExtractor } from '../extraction/record-extractor.js';
import type { EntityMerger } from '../reconciliation/entity-merger.js';
import { normalizeAuthorityValue } from '../reconciliation/entity-merger.js';
import type { Ledger } from '../persistence/ledger.js';
import type { RunLock } from '../persistence/run-lock.js';
import { RunReportAccumulator } from './run-report.js';

const log = createLogger({ module: 'run-coordinator' });

export interface RunCoordinatorConfig {
  readonly walker: Pick<FeedWalker, 'nextUnprocessedBatch'>;
  readonly extractor: Pick<RecordExtractor, 'extract'>;
  readonly merger: Pick<EntityMerger, 'merge'>;
  readonly ledger: Pick<Ledger, 'markCompleted'>;

  /** Exclusive-access lock; omitted in tests that drive a single run */
  readonly lock?: Pick<RunLock, 'acquire' | 'release'>;

  /** Skip ledger marks (the merger is configured separately) */
  readonly dryRun?: boolean;

  readonly now?: () => Date;
  readonly runId?: string;
}

interface TupleResult {
  readonly entry: ReportEntry;
  /** True when the tuple reached a terminal outcome and may be ledger-marked */
  readonly settled: boolean;
}

export class RunCoordinator {
  private readonly dryRun: boolean;
  private readonly now: () => Date;
  private readonly runId: string;

  constructor(private readonly config: RunCoordinatorConfig) {
    this.dryRun = config.dryRun ?? false;
    this.now = config.now ?? (() => new Date());
    this.runId = config.runId ?? `run_${uuidv4()}`;
  }

  /**
   * Execute one run
   *
   * @returns The finalized report (aborted runs included)
   * @throws {RunLockedError} If another run holds the lock
   */
  async run(): Promise<RunReport> {
    this.config.lock?.acquire(this.runId);

    try {
      return await this.execute();
    } finally {
      this.config.lock?.release(this.runId);
    }
  }

  private async execute(): Promise<RunReport> {
    const report = new RunReportAccumulator(this.runId, this.now(), this.dryRun);

    log.info('Starting run', { runId: this.runId, dryRun: this.dryRun });

    let tuples: readonly ActivityTuple[];
    try {
      const batch = await this.config.walker.nextUnprocessedBatch();
      report.setPagesWalked(batch.pagesWalked);
      tuples = batch.tuples;
    } catch (error) {
      const fatal = !(error instanceof FeedFetchError);
      log.error('Feed walk aborted', { runId: this.runId, error: errorMessage(error), fatal });
      report.abort({
        errorCode: error instanceof SyncError ? error.code : 'unexpected',
        message: errorMessage(error),
        fatal,
      });
      return report.finalize(this.now());
    }

    for (const tuple of tuples) {
      const { entry, settled } = await this.processTuple(tuple);
      report.record(entry);

      if (!settled || this.dryRun) {
        continue;
      }

      try {
        await this.config.ledger.markCompleted(tuple.uniqueId, this.now());
      } catch (error) {
        log.error('Ledger write failed; stopping run', {
          runId: this.runId,
          uniqueId: tuple.uniqueId,
          error: errorMessage(error),
        });
        report.abort({
          errorCode: 'ledger_write',
          message: errorMessage(error),
          fatal: true,
        });
        break;
      }
    }

    const finalized = report.finalize(this.now());

    log.info('Run complete', {
      runId: this.runId,
      tuples: finalized.entries.length,
      ...finalized.counts,
    });

    return finalized;
  }

  private async processTuple(tuple: ActivityTuple): Promise<TupleResult> {
    let entityId: string | undefined;

    try {
      const record = await this.config.extractor.extract(tuple.recordRef);

      if (normalizeAuthorityValue(record.authorityId) !== normalizeAuthorityValue(tuple.authorityId)) {
        log.warn('Record authority id differs from feed entry', {
          feedAuthorityId: tuple.authorityId,
          recordAuthorityId: record.authorityId,
        });
      }

      const candidates = [...record.candidateIds].sort();

      if (candidates.length === 0) {
        return {
          entry: { tuple, outcome: { kind: 'no_action', reason: NO_ACTION_REASONS.noReference } },
          settled: true,
        };
      }

      if (candidates.length > 1) {
        return {
          entry: {
            tuple,
            outcome: {
              kind: 'conflict_flagged',
              reason: CONFLICT_REASONS.multipleCandidates,
              existingValues: candidates,
            },
          },
          settled: true,
        };
      }

      entityId = candidates[0];
      const outcome = await this.config.merger.merge(
        record.authorityId,
        record.authorizedHeading,
        entityId
      );

      return { entry: { tuple, entityId, outcome }, settled: true };
    } catch (error) {
      const errorCode = error instanceof SyncError ? error.code : 'unexpected';

      log.warn('Tuple failed; will retry next run', {
        uniqueId: tuple.uniqueId,
        entityId,
        errorCode,
        error: errorMessage(error),
      });

      return {
        entry: {
          tuple,
          ...(entityId !== undefined ? { entityId } : {}),
          outcome: { kind: 'fetch_error', errorCode, message: errorMessage(error) },
        },
        settled: false,
      };
    }
  }
}
