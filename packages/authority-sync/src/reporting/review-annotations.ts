/**
 * Review Annotations
 *
 * Attaches reviewer context to the entries of a finalized report before it is
 * published: the entity's label and classes, the authority heading and its
 * type, and the entity's constraint status after the run.
 *
 * Entries with outcome `no_action` are left as they are. A lookup that fails
 * is logged and its field left out; annotation never fails a run.
 */

import { errorMessage } from '../core/errors.js';
import type {
  AuthorityDescription,
  ConstraintFlag,
  EntityDescription,
  ReportEntry,
  ReviewAnnotations,
  RunReport,
} from '../core/types.js';
import { createLogger, type LogMetadata } from '../core/utils/logger.js';

const log = createLogger({ module: 'review-annotations' });

export interface EntityReviewSource {
  describeEntity(entityId: string): Promise<EntityDescription>;
  constraintFlag(entityId: string): Promise<ConstraintFlag>;
}

export interface AuthorityReviewSource {
  /** @param recordRef - URL of the authority record */
  describe(recordRef: string): Promise<AuthorityDescription>;
}

export interface ReviewSources {
  readonly entities: EntityReviewSource;
  readonly authorities: AuthorityReviewSource;
}

export function needsReview(entry: ReportEntry): boolean {
  return entry.outcome.kind !== 'no_action';
}

async function lookup<T>(
  name: string,
  context: LogMetadata,
  run: () => Promise<T>
): Promise<T | undefined> {
  try {
    return await run();
  } catch (error) {
    log.warn('Review lookup failed', { lookup: name, ...context, error: errorMessage(error) });
    return undefined;
  }
}

/**
 * Review annotations for one entry
 */
export async function annotateEntry(
  entry: ReportEntry,
  sources: ReviewSources
): Promise<ReviewAnnotations> {
  const { entityId } = entry;
  const context = { authorityId: entry.tuple.authorityId, entityId };

  const authority = await lookup('authority', context, () =>
    sources.authorities.describe(entry.tuple.recordRef)
  );
  if (entityId === undefined) {
    return authority ? { authority } : {};
  }

  const entity = await lookup('entity', context, () => sources.entities.describeEntity(entityId));
  const constraint = await lookup('constraint', context, () =>
    sources.entities.constraintFlag(entityId)
  );

  return {
    ...(entity ? { entity } : {}),
    ...(authority ? { authority } : {}),
    ...(constraint ? { constraint } : {}),
  };
}

/**
 * Copy of `report` with review annotations on every entry that needs review
 */
export async function annotateReport(report: RunReport, sources: ReviewSources): Promise<RunReport> {
  const entries: ReportEntry[] = [];
  for (const entry of report.entries) {
    entries.push(needsReview(entry) ? { ...entry, review: await annotateEntry(entry, sources) } : entry);
  }

  log.info('Report annotated', {
    runId: report.runId,
    annotated: entries.filter(needsReview).length,
  });

  return Object.freeze({ ...report, entries: Object.freeze(entries) });
}
