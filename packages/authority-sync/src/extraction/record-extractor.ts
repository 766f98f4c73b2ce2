/**
 * Record Extractor
 *
 * Fetches one authority record and extracts the facts the merger needs:
 * - authority id: `010 $a` (whitespace removed), falling back to control field `001`
 * - authorized heading: the first 1XX heading field, its text subfields joined
 *   by single spaces (numeric control subfields such as $0 and $6 are skipped)
 * - candidate ids: knowledge-base ids in `024` (any subfield) and `670 $u`
 *
 * Fetching is delegated to a RecordSource; extraction itself is a pure
 * function over FieldAccess.
 */

import { KNOWLEDGE_BASE_DOMAIN } from '../core/constants.js';
import { MalformedRecordError, RecordUnavailableError, errorMessage } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import type { AuthorityDescription, BibliographicRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { findCandidateIds } from './candidate-ids.js';
import { MarcXmlParseError, parseMarcXml } from './marc-fields.js';
import type { FieldAccess } from './marc-fields.js';

const log = createLogger({ module: 'record-extractor' });

/** Heading fields of a name/subject authority record, in MARC order */
export const HEADING_TAGS: ReadonlySet<string> = new Set([
  '100',
  '110',
  '111',
  '130',
  '150',
  '151',
  '155',
]);

/** MADS authority type of each heading field */
const HEADING_TYPES: Readonly<Record<string, string>> = {
  '100': 'PersonalName',
  '110': 'CorporateName',
  '111': 'ConferenceName',
  '130': 'Title',
  '150': 'Topic',
  '151': 'Geographic',
  '155': 'GenreForm',
};

/** Name headings that carry a title ($t) are name/title headings */
const NAME_TAGS: ReadonlySet<string> = new Set(['100', '110', '111']);

// ============================================================================
// Record Source
// ============================================================================

/**
 * Fetch collaborator for bibliographic records
 */
export interface RecordSource {
  /**
   * @returns The MARCXML document text
   * @throws {RecordUnavailableError} If the record cannot be fetched
   */
  fetchRecord(recordRef: string): Promise<string>;
}

/**
 * MARCXML documents served over HTTP
 */
export class MarcXmlRecordSource implements RecordSource {
  constructor(private readonly httpClient: HTTPClient) {}

  async fetchRecord(recordRef: string): Promise<string> {
    try {
      return await this.httpClient.fetchText(recordRef, {
        headers: { Accept: 'application/marcxml+xml, application/xml;q=0.9' },
      });
    } catch (error) {
      throw new RecordUnavailableError(recordRef, errorMessage(error), { cause: error });
    }
  }
}

// ============================================================================
// Extraction Rules
// ============================================================================

export interface ExtractionOptions {
  /** Domain of knowledge-base entity URLs (default: wikidata.org) */
  readonly knowledgeBaseDomain?: string;
}

function normalizeAuthorityId(raw: string): string {
  return raw.replace(/\s+/g, '');
}

/**
 * Authority id from `010 $a`, else `001`
 */
export function extractAuthorityId(fields: FieldAccess): string | undefined {
  const lccn = fields.subfieldValues('010', 'a').map(normalizeAuthorityId).find((v) => v !== '');
  if (lccn !== undefined) return lccn;

  const control = fields.controlField('001');
  const normalized = control === undefined ? '' : normalizeAuthorityId(control);
  return normalized === '' ? undefined : normalized;
}

/**
 * Authorized heading from the first 1XX field
 */
export function extractAuthorizedHeading(fields: FieldAccess): string | undefined {
  const heading = fields.allDataFields().find((field) => HEADING_TAGS.has(field.tag));
  if (!heading) return undefined;

  const text = heading.subfields
    .filter((subfield) => !/^\d$/.test(subfield.code))
    .map((subfield) => subfield.value.trim())
    .filter((value) => value !== '')
    .join(' ')
    .trim();

  return text === '' ? undefined : text;
}

/**
 * MADS authority type of the first 1XX field
 */
export function extractHeadingType(fields: FieldAccess): string | undefined {
  const heading = fields.allDataFields().find((field) => HEADING_TAGS.has(field.tag));
  if (!heading) return undefined;

  if (NAME_TAGS.has(heading.tag) && heading.subfields.some((subfield) => subfield.code === 't')) {
    return 'NameTitle';
  }
  return HEADING_TYPES[heading.tag];
}

/**
 * Extract a BibliographicRecord from parsed fields
 *
 * @throws {MalformedRecordError} If the authority id or heading is missing
 */
export function extractBibliographicRecord(
  fields: FieldAccess,
  recordRef: string,
  options: ExtractionOptions = {}
): BibliographicRecord {
  const domain = options.knowledgeBaseDomain ?? KNOWLEDGE_BASE_DOMAIN;

  const authorityId = extractAuthorityId(fields);
  if (authorityId === undefined) {
    throw new MalformedRecordError(recordRef, 'no authority id in 010 $a or 001');
  }

  const authorizedHeading = extractAuthorizedHeading(fields);
  if (authorizedHeading === undefined) {
    throw new MalformedRecordError(recordRef, 'no 1XX heading field');
  }

  const candidateIds = findCandidateIds(fields, domain);

  if (candidateIds.size === 0 && fields.mentions(domain)) {
    // Format drift: the record points at the knowledge base somewhere we do not read
    log.warn('Identifier pattern miss', { recordRef, authorityId, domain });
  }

  return Object.freeze({ authorityId, authorizedHeading, candidateIds });
}

// ============================================================================
// Extractor
// ============================================================================

export class RecordExtractor {
  constructor(
    private readonly source: RecordSource,
    private readonly options: ExtractionOptions = {}
  ) {}

  /**
   * Fetch and extract one record
   *
   * @throws {RecordUnavailableError} If the fetch does not succeed
   * @throws {MalformedRecordError} If the document or its required fields cannot be read
   */
  async extract(recordRef: string): Promise<BibliographicRecord> {
    const fields = await this.fetchFields(recordRef);
    const record = extractBibliographicRecord(fields, recordRef, this.options);

    log.debug('Record extracted', {
      recordRef,
      authorityId: record.authorityId,
      candidates: [...record.candidateIds],
    });

    return record;
  }

  /**
   * Heading and heading type of a record, for review annotations
   *
   * @throws {RecordUnavailableError} If the fetch does not succeed
   * @throws {MalformedRecordError} If the document has no heading field
   */
  async describe(recordRef: string): Promise<AuthorityDescription> {
    const fields = await this.fetchFields(recordRef);

    const label = extractAuthorizedHeading(fields);
    const type = extractHeadingType(fields);
    if (label === undefined || type === undefined) {
      throw new MalformedRecordError(recordRef, 'no 1XX heading field');
    }
    return { label, type };
  }

  private async fetchFields(recordRef: string): Promise<FieldAccess> {
    const xml = await this.source.fetchRecord(recordRef);
    try {
      return parseMarcXml(xml);
    } catch (error) {
      if (error instanceof MarcXmlParseError) {
        throw new MalformedRecordError(recordRef, error.message, { cause: error });
      }
      throw error;
    }
  }
}
