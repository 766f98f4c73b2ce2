/**
 * Feed Walker - Minimal Unprocessed Batch
 *
 * Walks the activity feed from page 1 and returns the activity tuples that
 * have no ledger entry yet.
 *
 * PRECONDITION: the feed is ordered newest-first (or at least consistently
 * ordered across runs). The stop-page heuristic relies on it: once a whole
 * page is known to the ledger, everything behind it is assumed known too.
 * A feed that violates this can hide older unprocessed entries behind a
 * fully-ledgered page.
 *
 * ALGORITHM:
 * 1. Fetch pages 1, 2, 3, ... accumulating their tuples in feed order
 * 2. Stop at the first page whose unique ids are all ledgered (stop page),
 *    at an empty page, at the end of the feed, or at the page limit
 * 3. From everything accumulated (stop page included), keep tuples with no
 *    ledger entry, deduplicated by unique id (first occurrence wins)
 *
 * A page fetch failure propagates as FeedFetchError: the walk is abandoned
 * and nothing is marked, so the next run retries it wholesale.
 */

import type { ActivityTuple } from '../core/types.js';
import type { Ledger } from '../persistence/ledger.js';
import { createLogger } from '../core/utils/logger.js';
import type { FeedSource } from './activity-feed.js';

const log = createLogger({ module: 'feed-walker' });

export type WalkStopReason = 'stop_page' | 'empty_page' | 'end_of_feed' | 'page_limit';

/**
 * Result of one walk
 */
export interface FeedBatch {
  /** Unprocessed tuples in feed order */
  readonly tuples: readonly ActivityTuple[];

  /** Number of pages fetched and inspected */
  readonly pagesWalked: number;

  readonly stopReason: WalkStopReason;
}

export interface FeedWalkerOptions {
  /** Upper bound on pages fetched per run (default: 50) */
  readonly maxPages?: number;
}

export class FeedWalker {
  private readonly maxPages: number;

  constructor(
    private readonly source: FeedSource,
    private readonly ledger: Pick<Ledger, 'has' | 'countCompleted'>,
    options: FeedWalkerOptions = {}
  ) {
    this.maxPages = options.maxPages ?? 50;
    if (!Number.isInteger(this.maxPages) || this.maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${this.maxPages}`);
    }
  }

  /**
   * Walk the feed and return the tuples this run must process
   *
   * @throws {FeedFetchError} If a page cannot be fetched or parsed
   */
  async nextUnprocessedBatch(): Promise<FeedBatch> {
    const accumulated: ActivityTuple[] = [];
    let pagesWalked = 0;
    let stopReason: WalkStopReason = 'page_limit';

    for (let pageNumber = 1; pageNumber <= this.maxPages; pageNumber++) {
      const page = await this.source.fetchPage(pageNumber);

      if (page === null) {
        stopReason = 'end_of_feed';
        break;
      }

      pagesWalked = pageNumber;

      if (page.tuples.length === 0) {
        stopReason = 'empty_page';
        break;
      }

      accumulated.push(...page.tuples);

      const pageIds = new Set(page.tuples.map((tuple) => tuple.uniqueId));
      const completed = await this.ledger.countCompleted(pageIds);

      log.debug('Feed page inspected', {
        pageNumber,
        entries: page.tuples.length,
        distinct: pageIds.size,
        completed,
      });

      if (completed === pageIds.size) {
        stopReason = 'stop_page';
        break;
      }
    }

    const tuples = await this.selectUnprocessed(accumulated);

    log.info('Feed walk complete', {
      pagesWalked,
      stopReason,
      accumulated: accumulated.length,
      unprocessed: tuples.length,
    });

    return { tuples, pagesWalked, stopReason };
  }

  private async selectUnprocessed(accumulated: readonly ActivityTuple[]): Promise<ActivityTuple[]> {
    const seen = new Set<string>();
    const unprocessed: ActivityTuple[] = [];

    for (const tuple of accumulated) {
      if (seen.has(tuple.uniqueId)) {
        continue;
      }
      seen.add(tuple.uniqueId);

      if (!(await this.ledger.has(tuple.uniqueId))) {
        unprocessed.push(tuple);
      }
    }

    return unprocessed;
  }
}
