/**
 * Run Command
 *
 * One reconciliation run: walk the activity feed, reconcile every unprocessed
 * tuple against the knowledge base, publish the report.
 *
 * Usage:
 *   authority-sync run [options]
 *
 * Options:
 *   --max-pages <n>     Page limit for this run
 *   --ledger <path>     Ledger database path
 *   --report-dir <dir>  Report output directory
 *   --no-annotate       Publish reports without review annotations
 *
 * Exit status follows EXIT_CODES: 0 clean, 1 soft failures, 2 locked,
 * 3 configuration, 4 feed aborted, 5 ledger fatal.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Command } from 'commander';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { ActivityFeedSource } from '../../acquisition/activity-feed.js';
import { FeedWalker } from '../../acquisition/feed-walker.js';
import { ConfigError, RunLockedError, errorMessage } from '../../core/errors.js';
import { createHTTPClient, type HTTPClient } from '../../core/http-client.js';
import type { RunReport } from '../../core/types.js';
import { createLogger } from '../../core/utils/logger.js';
import { MarcXmlRecordSource, RecordExtractor } from '../../extraction/record-extractor.js';
import { SqliteLedger, openLedgerDatabase } from '../../persistence/ledger.js';
import { RunLock } from '../../persistence/run-lock.js';
import { EntityMerger } from '../../reconciliation/entity-merger.js';
import { WikibaseGateway } from '../../reconciliation/wikibase-gateway.js';
import { ReportPublisher, type PublishedReport } from '../../reporting/report-publisher.js';
import {
  annotateReport,
  needsReview,
  type ReviewSources,
} from '../../reporting/review-annotations.js';
import { RunCoordinator } from '../../services/run-coordinator.js';
import { lockStaleAfterMs, type SyncConfig } from '../lib/config.js';
import { EXIT_CODES, exitCodeForReport, type ExitCode } from '../lib/exit-codes.js';

const log = createLogger({ module: 'cli:run' });

/**
 * Run options from CLI
 */
interface RunOptions {
  readonly maxPages?: string;
  readonly ledger?: string;
  readonly reportDir?: string;
  /** false when --no-annotate is given */
  readonly annotate?: boolean;
}

/**
 * Overrides the run command contributes to configuration loading
 */
export function runOverrides(options: RunOptions): {
  maxPages?: number;
  ledgerPath?: string;
  reportDir?: string;
  annotate?: boolean;
} {
  return {
    ...(options.maxPages !== undefined ? { maxPages: Number(options.maxPages) } : {}),
    ...(options.ledger !== undefined ? { ledgerPath: options.ledger } : {}),
    ...(options.reportDir !== undefined ? { reportDir: options.reportDir } : {}),
    ...(options.annotate === false ? { annotate: false } : {}),
  };
}

/**
 * Register the run command
 *
 * @param loadConfig - Resolves configuration for this invocation, given the
 *   command's own overrides
 */
export function registerRunCommand(
  program: Command,
  loadConfig: (overrides: ReturnType<typeof runOverrides>) => SyncConfig
): void {
  program
    .command('run')
    .description('Reconcile recent authority changes into the knowledge base')
    .option('--max-pages <n>', 'Page limit for this run')
    .option('--ledger <path>', 'Ledger database path')
    .option('--report-dir <dir>', 'Report output directory')
    .option('--no-annotate', 'Publish reports without review annotations')
    .action(async (options: RunOptions) => {
      let config: SyncConfig;
      try {
        config = loadConfig(runOverrides(options));
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
      process.exitCode = await executeRun(config);
    });
}

function httpClientFor(config: SyncConfig): HTTPClient {
  return createHTTPClient({
    userAgent: config.http.userAgent,
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.retries,
  });
}

function gatewayFor(config: SyncConfig, httpClient: HTTPClient): WikibaseGateway {
  return new WikibaseGateway({
    httpClient,
    entityDataBaseUrl: config.knowledgeBase.entityDataBaseUrl,
    apiUrl: config.knowledgeBase.apiUrl,
    accessToken: config.knowledgeBase.accessToken,
    labelLanguage: config.review.labelLanguage,
  });
}

/**
 * Wire the production collaborators around an open ledger database
 */
export function createRunCoordinator(config: SyncConfig, db: SqliteDatabase): RunCoordinator {
  const httpClient = httpClientFor(config);

  const ledger = new SqliteLedger(db);

  const walker = new FeedWalker(
    new ActivityFeedSource({
      baseUrl: config.feed.baseUrl,
      httpClient,
      forceHttps: config.feed.forceHttps,
    }),
    ledger,
    { maxPages: config.feed.maxPages }
  );

  const extractor = new RecordExtractor(new MarcXmlRecordSource(httpClient), {
    knowledgeBaseDomain: config.knowledgeBase.domain,
  });

  const gateway = gatewayFor(config, httpClient);

  return new RunCoordinator({
    walker,
    extractor,
    merger: new EntityMerger(gateway, { dryRun: config.dryRun }),
    ledger,
    lock: new RunLock(db, { staleAfterMs: lockStaleAfterMs(config) }),
    dryRun: config.dryRun,
  });
}

/**
 * Read-only lookups that annotate a finished report
 */
export function createReviewSources(config: SyncConfig): ReviewSources {
  const httpClient = httpClientFor(config);
  return {
    entities: gatewayFor(config, httpClient),
    authorities: new RecordExtractor(new MarcXmlRecordSource(httpClient), {
      knowledgeBaseDomain: config.knowledgeBase.domain,
    }),
  };
}

/**
 * Execute one run and map its outcome to an exit code
 */
export async function executeRun(config: SyncConfig): Promise<ExitCode> {
  if (!config.dryRun && config.knowledgeBase.accessToken === undefined) {
    const error = new ConfigError('KB_ACCESS_TOKEN is required unless --dry-run is set');
    console.error(`Configuration error: ${error.message}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  let db: SqliteDatabase;
  try {
    mkdirSync(dirname(config.paths.ledger), { recursive: true });
    db = openLedgerDatabase(config.paths.ledger);
  } catch (error) {
    log.error('Cannot open ledger', { path: config.paths.ledger, error: errorMessage(error) });
    return EXIT_CODES.LEDGER_FATAL;
  }

  try {
    let report: RunReport;
    try {
      report = await createRunCoordinator(config, db).run();
    } catch (error) {
      if (error instanceof RunLockedError) {
        log.warn('Another run holds the ledger; exiting', { error: error.message });
        return EXIT_CODES.RUN_LOCKED;
      }
      log.error('Run failed before processing', { error: errorMessage(error) });
      return EXIT_CODES.LEDGER_FATAL;
    }

    const exitCode = exitCodeForReport(report);

    if (config.review.annotate && report.entries.some(needsReview)) {
      report = await annotateReport(report, createReviewSources(config));
    }

    let published: PublishedReport;
    try {
      published = await new ReportPublisher(config.paths.reports).publish(report);
    } catch (error) {
      // The ledger is already marked; only the report for this run is lost
      log.error('Report publishing failed', { runId: report.runId, error: errorMessage(error) });
      return exitCode === EXIT_CODES.SUCCESS ? EXIT_CODES.SOFT_FAILURES : exitCode;
    }

    printSummary(report, published, config.json);
    return exitCode;
  } finally {
    db.close();
  }
}

function printSummary(report: RunReport, published: PublishedReport, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        {
          runId: report.runId,
          dryRun: report.dryRun,
          pagesWalked: report.pagesWalked,
          counts: report.counts,
          abort: report.abort ?? null,
          reports: published,
        },
        null,
        2
      )
    );
    return;
  }

  console.log(`\nRun ${report.runId}${report.dryRun ? ' (dry run)' : ''}`);
  console.log(`  Pages walked:      ${report.pagesWalked}`);
  console.log(`  Tuples processed:  ${report.entries.length}`);
  console.log(`  Claims added:      ${report.counts.claim_added}`);
  console.log(`  Qualifiers set:    ${report.counts.qualifier_updated}`);
  console.log(`  No action:         ${report.counts.no_action}`);
  console.log(`  Conflicts:         ${report.counts.conflict_flagged}`);
  console.log(`  Failures:          ${report.counts.fetch_error}`);
  if (report.abort) {
    console.log(`  Aborted:           ${report.abort.errorCode}: ${report.abort.message}`);
  }
  console.log(`\n  Report: ${published.xmlPath}`);
  console.log(`          ${published.markdownPath}`);
}
