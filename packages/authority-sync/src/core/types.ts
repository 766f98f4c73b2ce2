/**
 * Core Types for Authority Sync
 *
 * Data model shared by the reconciliation engine: feed activity, extracted
 * bibliographic facts, knowledge-base entity snapshots, merge decisions and
 * the per-run report.
 *
 * TYPE SAFETY: Every value crossing a collaborator boundary is readonly.
 * Decisions and outcomes are discriminated unions keyed by `kind`.
 */

// ============================================================================
// Feed Activity
// ============================================================================

/**
 * One unit of feed-reported change
 *
 * Created when a feed page is parsed, never mutated, discarded after the run.
 * Its processed state survives only through the ledger.
 */
export interface ActivityTuple {
  /** Stable external identifier of the authority record (e.g. "no2022065764") */
  readonly authorityId: string;

  /** Date the authority record was updated, as reported by the feed */
  readonly updateDate: string;

  /** Date the feed published the activity */
  readonly publishedDate: string;

  /** Locator of the bibliographic record (MARCXML document URL) */
  readonly recordRef: string;

  /** Ledger primary key: `${authorityId}-${updateDate}-${publishedDate}` */
  readonly uniqueId: string;
}

/**
 * Derive the ledger key for an activity tuple
 */
export function activityUniqueId(
  authorityId: string,
  updateDate: string,
  publishedDate: string
): string {
  return `${authorityId}-${updateDate}-${publishedDate}`;
}

/**
 * Build an activity tuple with its derived unique id
 */
export function createActivityTuple(fields: Omit<ActivityTuple, 'uniqueId'>): ActivityTuple {
  return Object.freeze({
    ...fields,
    uniqueId: activityUniqueId(fields.authorityId, fields.updateDate, fields.publishedDate),
  });
}

// ============================================================================
// Ledger
// ============================================================================

/**
 * Persisted completion marker
 */
export interface LedgerEntry {
  readonly uniqueId: string;
  readonly completedAt: string;
}

// ============================================================================
// Bibliographic Records
// ============================================================================

/**
 * Facts extracted from one fetched authority record
 */
export interface BibliographicRecord {
  readonly authorityId: string;

  /** Primary name heading, verbatim */
  readonly authorizedHeading: string;

  /**
   * Knowledge-base entity ids found in the record.
   * More than one is a conflict signal, not an error.
   */
  readonly candidateIds: ReadonlySet<string>;
}

// ============================================================================
// Knowledge-Base Entities
// ============================================================================

/**
 * One authority-id claim on an entity
 */
export interface AuthorityClaim {
  /** Statement id assigned by the knowledge base */
  readonly id: string;

  /** Authority id string carried by the claim */
  readonly value: string;

  /** "Subject named as" qualifier texts, in snak order (value snaks only) */
  readonly namedAs: readonly string[];

  /**
   * Hash of the qualifier snak a new heading replaces: the first value snak,
   * else the first "unknown value" or "no value" snak
   */
  readonly qualifierHash?: string;

  readonly hasReference: boolean;
}

/**
 * The subset of an entity's state relevant to merging
 */
export interface EntitySnapshot {
  readonly entityId: string;
  readonly authorityClaims: readonly AuthorityClaim[];
}

/**
 * Provenance attached to a newly added claim
 */
export interface ClaimReference {
  /** Item id of the "stated in" source */
  readonly statedIn: string;

  /** Retrieval date (YYYY-MM-DD) */
  readonly retrieved: string;
}

/**
 * A claim the merger asks the knowledge base to add
 */
export interface NewAuthorityClaim {
  readonly value: string;
  readonly qualifierHeading: string;
  readonly reference: ClaimReference;
}

// ============================================================================
// Merge Decisions
// ============================================================================

export interface NoAction {
  readonly kind: 'no_action';
  readonly reason: string;
}

export interface QualifierUpdated {
  readonly kind: 'qualifier_updated';
  /** Previous qualifier text; undefined when the claim had none */
  readonly old?: string;
  readonly new: string;
}

export interface ClaimAdded {
  readonly kind: 'claim_added';
  readonly qualifier: string;
  readonly reference: ClaimReference;
}

export interface ConflictFlagged {
  readonly kind: 'conflict_flagged';
  readonly reason: string;
  readonly existingValues: readonly string[];
}

export type MergeDecision = NoAction | QualifierUpdated | ClaimAdded | ConflictFlagged;

export type MergeDecisionKind = MergeDecision['kind'];

export const MERGE_DECISION_KINDS: readonly MergeDecisionKind[] = [
  'no_action',
  'qualifier_updated',
  'claim_added',
  'conflict_flagged',
] as const;

// ============================================================================
// Run Report
// ============================================================================

/**
 * Per-tuple soft failure recorded in the report
 */
export interface FetchError {
  readonly kind: 'fetch_error';
  /** Error code of the failing collaborator (record_unavailable, entity_unavailable, ...) */
  readonly errorCode: string;
  readonly message: string;
}

export type ReportOutcome = MergeDecision | FetchError;

export type ReportOutcomeKind = ReportOutcome['kind'];

// ============================================================================
// Review Annotations
// ============================================================================

/**
 * Constraint status of an entity after the run:
 * `p244` when an authority-id statement violates a constraint, `yes` for
 * violations elsewhere, `no` when clean
 */
export type ConstraintFlag = 'no' | 'yes' | 'p244';

export interface EntityDescription {
  readonly label: string;
  /** Labels of the entity's "instance of" classes */
  readonly instanceOf: readonly string[];
}

export interface AuthorityDescription {
  /** Authorized heading */
  readonly label: string;
  /** MADS authority type of the heading field, e.g. PersonalName */
  readonly type: string;
}

/**
 * Context attached to a report entry for human review; a lookup that
 * failed leaves its field out
 */
export interface ReviewAnnotations {
  readonly entity?: EntityDescription;
  readonly authority?: AuthorityDescription;
  readonly constraint?: ConstraintFlag;
}

/**
 * One line of the run report
 */
export interface ReportEntry {
  readonly tuple: ActivityTuple;

  /** Entity the decision applies to, when one was identified */
  readonly entityId?: string;

  readonly outcome: ReportOutcome;

  readonly review?: ReviewAnnotations;
}

/**
 * Why the run stopped before processing its whole batch
 */
export interface RunAbort {
  readonly errorCode: string;
  readonly message: string;
  /** True when the abort came from the ledger and the run must be treated as failed */
  readonly fatal: boolean;
}

/**
 * Finalized report for one run
 *
 * Built incrementally by the Run Coordinator, frozen once finalized.
 */
export interface RunReport {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly dryRun: boolean;
  readonly pagesWalked: number;
  readonly entries: readonly ReportEntry[];
  readonly counts: Readonly<Record<ReportOutcomeKind, number>>;
  readonly abort?: RunAbort;
}
