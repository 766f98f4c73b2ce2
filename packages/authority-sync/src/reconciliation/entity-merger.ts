/**
 * Entity Merger - Claim Merge Decisions
 *
 * Given an authority id, its authorized heading and a knowledge-base entity,
 * decides how the entity's authority-id claims must change and performs at
 * most one non-destructive write.
 *
 * DECISION ALGORITHM (in order):
 * 1. Fetch the entity snapshot
 * 2. Partition authority-id claims into MATCHING (value == authority id) and OTHER
 * 3. More than one MATCHING claim: pre-existing duplicate -> ConflictFlagged, no write
 * 4. Exactly one MATCHING claim:
 *    - any qualifier value equals heading -> NoAction
 *    - qualifiers differ or absent -> replace the first -> QualifierUpdated
 * 5. No MATCHING claim:
 *    - OTHER non-empty: adding would leave two distinct authority ids -> ConflictFlagged, no write
 *    - OTHER empty -> add claim (qualifier + "stated in" / "retrieved" reference) -> ClaimAdded
 *
 * Values compare trimmed and case-insensitively; qualifiers compare trimmed.
 *
 * IDEMPOTENCE: re-running with the same inputs after a write yields NoAction,
 * so at-least-once delivery from the coordinator is harmless.
 */

import {
  AUTHORITY_SOURCE_ITEM,
  CONFLICT_REASONS,
  EDIT_SUMMARIES,
  NO_ACTION_REASONS,
} from '../core/constants.js';
import type { AuthorityClaim, ClaimReference, MergeDecision } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { KnowledgeBaseGateway } from './knowledge-base.js';

const log = createLogger({ module: 'entity-merger' });

export interface EntityMergerOptions {
  /** Compute decisions without writing (default: false) */
  readonly dryRun?: boolean;

  /** Item id for the "stated in" reference (default: the LC authority file item) */
  readonly statedIn?: string;

  /** Clock for the "retrieved" date */
  readonly now?: () => Date;
}

export function normalizeAuthorityValue(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Calendar date (UTC) used for "retrieved" references
 */
export function retrievalDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export class EntityMerger {
  private readonly dryRun: boolean;
  private readonly statedIn: string;
  private readonly now: () => Date;

  constructor(
    private readonly gateway: KnowledgeBaseGateway,
    options: EntityMergerOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
    this.statedIn = options.statedIn ?? AUTHORITY_SOURCE_ITEM;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Decide and apply the merge for one (authority id, entity) pair
   *
   * @throws {EntityUnavailableError} If the entity cannot be fetched
   * @throws {EntityWriteError} If the knowledge base rejects the write
   */
  async merge(authorityId: string, authorizedHeading: string, entityId: string): Promise<MergeDecision> {
    const snapshot = await this.gateway.fetchEntity(entityId);
    const target = normalizeAuthorityValue(authorityId);

    const matching: AuthorityClaim[] = [];
    const other: AuthorityClaim[] = [];
    for (const claim of snapshot.authorityClaims) {
      (normalizeAuthorityValue(claim.value) === target ? matching : other).push(claim);
    }

    const decision = await this.decide(
      snapshot.entityId,
      authorityId,
      authorizedHeading,
      matching,
      other
    );

    log.info('Merge decision', {
      authorityId,
      entityId: snapshot.entityId,
      decision: decision.kind,
      dryRun: this.dryRun,
    });

    return decision;
  }

  private async decide(
    entityId: string,
    authorityId: string,
    heading: string,
    matching: readonly AuthorityClaim[],
    other: readonly AuthorityClaim[]
  ): Promise<MergeDecision> {
    if (matching.length > 1) {
      return {
        kind: 'conflict_flagged',
        reason: CONFLICT_REASONS.duplicateClaim,
        existingValues: matching.map((claim) => claim.value),
      };
    }

    const [existing] = matching;
    if (existing !== undefined) {
      return this.reconcileQualifier(entityId, existing, heading);
    }

    if (other.length > 0) {
      return {
        kind: 'conflict_flagged',
        reason: CONFLICT_REASONS.multipleAuthorityIds,
        existingValues: other.map((claim) => claim.value),
      };
    }

    const reference: ClaimReference = {
      statedIn: this.statedIn,
      retrieved: retrievalDate(this.now()),
    };

    if (!this.dryRun) {
      await this.gateway.addAuthorityClaim(
        entityId,
        { value: authorityId, qualifierHeading: heading, reference },
        EDIT_SUMMARIES.claimAdded
      );
    }

    return { kind: 'claim_added', qualifier: heading, reference };
  }

  private async reconcileQualifier(
    entityId: string,
    claim: AuthorityClaim,
    heading: string
  ): Promise<MergeDecision> {
    const wanted = heading.trim();
    if (claim.namedAs.some((namedAs) => namedAs.trim() === wanted)) {
      return { kind: 'no_action', reason: NO_ACTION_REASONS.upToDate };
    }

    const [current] = claim.namedAs;

    if (!this.dryRun) {
      await this.gateway.setNamedAsQualifier(
        entityId,
        claim,
        heading,
        current === undefined ? EDIT_SUMMARIES.qualifierAdded : EDIT_SUMMARIES.qualifierUpdated
      );
    }

    return current === undefined
      ? { kind: 'qualifier_updated', new: heading }
      : { kind: 'qualifier_updated', old: current, new: heading };
  }
}
