/**
 * Authority Sync Error Types
 *
 * One class per failure kind of the reconciliation engine. Each carries a
 * stable `code`, used in reports and logs.
 *
 * PROPAGATION:
 * - FeedFetchError aborts the walk; the ledger is untouched, the next run retries
 * - RecordUnavailable / MalformedRecord / EntityUnavailable / EntityWrite are
 *   per-tuple: reported, not ledger-marked, retried next run
 * - LedgerWriteError is fatal to the whole run
 * - RunLockedError aborts before any work is done
 *
 * A detected conflict is NOT an error; see ConflictFlagged in core/types.ts.
 */

export type SyncErrorCode =
  | 'feed_fetch'
  | 'record_unavailable'
  | 'malformed_record'
  | 'entity_unavailable'
  | 'entity_write'
  | 'ledger_write'
  | 'run_locked'
  | 'config';

/**
 * Base class for all engine errors
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A feed page was unreachable or did not match the activity-stream shape
 */
export class FeedFetchError extends SyncError {
  constructor(
    public readonly pageNumber: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('feed_fetch', `Feed page ${pageNumber}: ${message}`, options);
    this.name = 'FeedFetchError';
  }
}

/**
 * The bibliographic record could not be fetched
 */
export class RecordUnavailableError extends SyncError {
  constructor(
    public readonly recordRef: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('record_unavailable', `Record ${recordRef} unavailable: ${message}`, options);
    this.name = 'RecordUnavailableError';
  }
}

/**
 * The record was fetched but a required field could not be located
 */
export class MalformedRecordError extends SyncError {
  constructor(
    public readonly recordRef: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('malformed_record', `Record ${recordRef} malformed: ${message}`, options);
    this.name = 'MalformedRecordError';
  }
}

/**
 * The knowledge-base entity could not be fetched
 */
export class EntityUnavailableError extends SyncError {
  constructor(
    public readonly entityId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('entity_unavailable', `Entity ${entityId} unavailable: ${message}`, options);
    this.name = 'EntityUnavailableError';
  }
}

/**
 * The knowledge base rejected a claim mutation
 */
export class EntityWriteError extends SyncError {
  constructor(
    public readonly entityId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('entity_write', `Write to ${entityId} failed: ${message}`, options);
    this.name = 'EntityWriteError';
  }
}

/**
 * A completion marker could not be persisted. Fatal to the run.
 */
export class LedgerWriteError extends SyncError {
  constructor(
    public readonly uniqueId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('ledger_write', `Ledger write for ${uniqueId} failed: ${message}`, options);
    this.name = 'LedgerWriteError';
  }
}

/**
 * Another run holds exclusive access to the ledger
 */
export class RunLockedError extends SyncError {
  constructor(
    public readonly holder: string,
    public readonly acquiredAt: string
  ) {
    super('run_locked', `Ledger locked by run ${holder} since ${acquiredAt}`);
    this.name = 'RunLockedError';
  }
}

/**
 * Configuration could not be loaded or failed validation
 */
export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
