/**
 * Knowledge-base and authority-feed constants
 *
 * Property and item ids of the deployment this engine writes to.
 */

/** Authority-id claim property (Library of Congress authority ID) */
export const AUTHORITY_ID_PROPERTY = 'P244';

/** "Subject named as" qualifier property */
export const NAMED_AS_QUALIFIER = 'P1810';

/** "Instance of" property, read for review annotations */
export const INSTANCE_OF_PROPERTY = 'P31';

/** "Stated in" reference property */
export const STATED_IN_PROPERTY = 'P248';

/** "Retrieved" reference property */
export const RETRIEVED_PROPERTY = 'P813';

/** Item identifying the authority-feed source (LC name authority file) */
export const AUTHORITY_SOURCE_ITEM = 'Q18912790';

/** Gregorian calendar model for time values */
export const GREGORIAN_CALENDAR = 'http://www.wikidata.org/entity/Q1985727';

/** Day precision for time values */
export const DAY_PRECISION = 11;

/** Domain whose entity URLs carry knowledge-base ids in authority records */
export const KNOWLEDGE_BASE_DOMAIN = 'wikidata.org';

export const EDIT_SUMMARIES = {
  claimAdded: 'Add P244 Library of Congress authority ID with subject named as',
  qualifierAdded: 'Add authorized heading for P244 Library of Congress authority ID subject named as',
  qualifierUpdated: 'Updating the subject named as to the LC authorized heading value',
} as const;

export const NO_ACTION_REASONS = {
  upToDate: 'qualifier already matches authorized heading',
  noReference: 'no knowledge-base reference found',
} as const;

export const CONFLICT_REASONS = {
  multipleAuthorityIds: 'multiple distinct authority ids',
  duplicateClaim: 'duplicate claim for same authority id',
  multipleCandidates: 'multiple knowledge-base ids in record',
} as const;
