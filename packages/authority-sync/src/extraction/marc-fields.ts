/**
 * MARC field access
 *
 * Normalized read-only view over a MARC 21 authority record: control fields
 * by tag, data fields by tag, and subfield lookup returning the ordered
 * sequence of text values. Extraction rules are written against the
 * `FieldAccess` interface only, so they can be tested without XML.
 */

import { XMLParser } from 'fast-xml-parser';

// ============================================================================
// Types
// ============================================================================

export interface MarcSubfield {
  readonly code: string;
  readonly value: string;
}

export interface MarcDataField {
  readonly tag: string;
  readonly ind1: string;
  readonly ind2: string;
  readonly subfields: readonly MarcSubfield[];
}

/**
 * Field/subfield lookup over one record
 */
export interface FieldAccess {
  /** Text of control field `tag` (001-009), if present */
  controlField(tag: string): string | undefined;

  /** Data fields with tag `tag`, in record order */
  dataFields(tag: string): readonly MarcDataField[];

  /** All data fields, in record order */
  allDataFields(): readonly MarcDataField[];

  /**
   * Values of subfield `code` across every `tag` field, in record order.
   * With no code, every subfield of those fields.
   */
  subfieldValues(tag: string, code?: string): readonly string[];

  /** True when any field value contains `needle` */
  mentions(needle: string): boolean;
}

// ============================================================================
// In-memory Record
// ============================================================================

export class MarcRecord implements FieldAccess {
  constructor(
    private readonly controlFields: ReadonlyMap<string, string>,
    private readonly fields: readonly MarcDataField[]
  ) {}

  controlField(tag: string): string | undefined {
    return this.controlFields.get(tag);
  }

  dataFields(tag: string): readonly MarcDataField[] {
    return this.fields.filter((field) => field.tag === tag);
  }

  allDataFields(): readonly MarcDataField[] {
    return this.fields;
  }

  subfieldValues(tag: string, code?: string): readonly string[] {
    return this.dataFields(tag).flatMap((field) =>
      field.subfields
        .filter((subfield) => code === undefined || subfield.code === code)
        .map((subfield) => subfield.value)
    );
  }

  mentions(needle: string): boolean {
    for (const value of this.controlFields.values()) {
      if (value.includes(needle)) return true;
    }
    return this.fields.some((field) =>
      field.subfields.some((subfield) => subfield.value.includes(needle))
    );
  }
}

// ============================================================================
// MARCXML Parsing
// ============================================================================

export class MarcXmlParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarcXmlParseError';
  }
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // Numeric character references (&#237;, &#xE1;) are only decoded with this on
  htmlEntities: true,
  trimValues: true,
  textNodeName: '#text',
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return '';
}

function attr(node: XmlNode, name: string): string {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : '';
}

function findRecordNode(root: unknown): XmlNode | undefined {
  if (!isNode(root)) return undefined;

  const direct = asArray(root.record).find(isNode);
  if (direct) return direct;

  for (const collection of asArray(root.collection)) {
    if (isNode(collection)) {
      const nested = asArray(collection.record).find(isNode);
      if (nested) return nested;
    }
  }

  return undefined;
}

/**
 * Parse a MARCXML document (bare `<record>` or `<collection>`) into a record
 *
 * @throws {MarcXmlParseError} If the document is not XML or holds no record
 */
export function parseMarcXml(xml: string): MarcRecord {
  let root: unknown;
  try {
    root = parser.parse(xml, true);
  } catch (error) {
    throw new MarcXmlParseError(
      `invalid XML: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const record = findRecordNode(root);
  if (!record) {
    throw new MarcXmlParseError('no <record> element found');
  }

  const controlFields = new Map<string, string>();
  for (const node of asArray(record.controlfield)) {
    if (!isNode(node)) continue;
    const tag = attr(node, 'tag');
    if (tag !== '' && !controlFields.has(tag)) {
      controlFields.set(tag, textOf(node));
    }
  }

  const fields: MarcDataField[] = [];
  for (const node of asArray(record.datafield)) {
    if (!isNode(node)) continue;
    fields.push({
      tag: attr(node, 'tag'),
      ind1: attr(node, 'ind1'),
      ind2: attr(node, 'ind2'),
      subfields: asArray(node.subfield)
        .filter(isNode)
        .map((subfield) => ({ code: attr(subfield, 'code'), value: textOf(subfield) })),
    });
  }

  return new MarcRecord(controlFields, fields);
}
