/**
 * Knowledge-base identifier matching
 *
 * Pure functions: text in, entity ids out. An entity id is "Q" followed by
 * one or more digits, found either as a bare token or inside a URL under the
 * knowledge-base domain. Existence in the knowledge base is not checked here.
 */

import { KNOWLEDGE_BASE_DOMAIN } from '../core/constants.js';
import type { FieldAccess } from './marc-fields.js';

/** Cross-reference field carrying identifier-scheme entries */
export const CROSS_REFERENCE_TAG = '024';

/** Source-of-information field and its URL subfield */
export const SOURCE_TAG = '670';
export const SOURCE_URL_CODE = 'u';

const BARE_ENTITY_ID = /^Q\d+$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * URL form: `<scheme>://<sub>.<domain>/<any path>/Q<digits>`, id at the end
 * of a path segment
 */
function entityUrlPattern(domain: string): RegExp {
  return new RegExp(
    `(?:^|[^\\w.-])(?:[\\w-]+\\.)*${escapeRegExp(domain)}/(?:[^\\s?#]*/)?(Q\\d+)(?![\\w])`,
    'g'
  );
}

/**
 * Entity ids in one text value, in order of appearance (duplicates kept)
 *
 * @example
 * ```typescript
 * entityIdsInText('https://www.wikidata.org/wiki/Q42');   // ['Q42']
 * entityIdsInText('Q42');                                  // ['Q42']
 * entityIdsInText('https://example.org/wiki/Q42');         // []
 * ```
 */
export function entityIdsInText(text: string, domain: string = KNOWLEDGE_BASE_DOMAIN): string[] {
  const ids: string[] = [];

  for (const match of text.matchAll(entityUrlPattern(domain))) {
    const id = match[1];
    if (id !== undefined) ids.push(id);
  }

  for (const token of text.split(/\s+/)) {
    if (BARE_ENTITY_ID.test(token)) ids.push(token);
  }

  return ids;
}

/**
 * Every candidate entity id in a record
 *
 * Scans every subfield of the cross-reference field and the URL subfield of
 * the source-of-information field. Order is irrelevant; duplicates collapse.
 */
export function findCandidateIds(
  fields: FieldAccess,
  domain: string = KNOWLEDGE_BASE_DOMAIN
): ReadonlySet<string> {
  const values = [
    ...fields.subfieldValues(CROSS_REFERENCE_TAG),
    ...fields.subfieldValues(SOURCE_TAG, SOURCE_URL_CODE),
  ];

  return new Set(values.flatMap((value) => entityIdsInText(value, domain)));
}
