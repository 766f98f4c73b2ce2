/**
 * Authority Sync
 *
 * Batch reconciliation of a name-authority activity feed into a knowledge
 * base: walk the feed back to the last processed page, extract each changed
 * record, merge its authority id and heading into the linked entity, and
 * publish a report of every decision.
 */

// Core
export * from './core/types.js';
export * from './core/constants.js';
export * from './core/errors.js';
export { HTTPClient, createHTTPClient, type HTTPClientConfig, type FetchOptions } from './core/http-client.js';
export { logger, createLogger, setLogLevel, type LogLevel } from './core/utils/logger.js';

// Ledger
export {
  SqliteLedger,
  openLedgerDatabase,
  initializeLedgerSchema,
  type Ledger,
  type LedgerStats,
} from './persistence/ledger.js';
export { RunLock, type RunLockOptions } from './persistence/run-lock.js';

// Feed
export {
  ActivityFeedSource,
  parseActivityPage,
  authorityIdFromUri,
  type FeedPage,
  type FeedSource,
} from './acquisition/activity-feed.js';
export { FeedWalker, type FeedBatch, type WalkStopReason } from './acquisition/feed-walker.js';

// Records
export { parseMarcXml, MarcRecord, type FieldAccess } from './extraction/marc-fields.js';
export { findCandidateIds, entityIdsInText } from './extraction/candidate-ids.js';
export {
  RecordExtractor,
  MarcXmlRecordSource,
  extractBibliographicRecord,
  extractHeadingType,
  type RecordSource,
} from './extraction/record-extractor.js';

// Reconciliation
export type { KnowledgeBaseGateway } from './reconciliation/knowledge-base.js';
export { EntityMerger, type EntityMergerOptions } from './reconciliation/entity-merger.js';
export { WikibaseGateway, type WikibaseGatewayConfig } from './reconciliation/wikibase-gateway.js';

// Runs and reports
export { RunCoordinator, type RunCoordinatorConfig } from './services/run-coordinator.js';
export { RunReportAccumulator, REPORT_OUTCOME_KINDS } from './services/run-report.js';
export { renderXmlReport, renderMarkdownReport } from './reporting/report-builder.js';
export { ReportPublisher, reportBaseName, type PublishedReport } from './reporting/report-publisher.js';
export {
  annotateReport,
  type ReviewSources,
  type EntityReviewSource,
  type AuthorityReviewSource,
} from './reporting/review-annotations.js';
export { listRecentActions, parseReportLog, type ArchivedAction } from './reporting/report-archive.js';
