/**
 * Wikibase Gateway
 *
 * Knowledge-base collaborator over HTTP:
 * - reads entities from `Special:EntityData/<id>.json`
 * - writes through the action API (`wbsetclaim`, `wbsetqualifier`) with a
 *   CSRF token, an OAuth2 bearer token and the bot flag
 *
 * Writes are sent once (no transport retry): a retried write after a lost
 * response could apply twice, and the next run re-derives the decision anyway.
 *
 * Review lookups (`describeEntity`, `constraintFlag`) are read-only action API
 * queries (`wbgetentities`, `wbcheckconstraints`) used to annotate reports.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  AUTHORITY_ID_PROPERTY,
  DAY_PRECISION,
  GREGORIAN_CALENDAR,
  INSTANCE_OF_PROPERTY,
  NAMED_AS_QUALIFIER,
  RETRIEVED_PROPERTY,
  STATED_IN_PROPERTY,
} from '../core/constants.js';
import { EntityUnavailableError, EntityWriteError, errorMessage } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import type {
  AuthorityClaim,
  ConstraintFlag,
  EntityDescription,
  EntitySnapshot,
  NewAuthorityClaim,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { KnowledgeBaseGateway } from './knowledge-base.js';

const log = createLogger({ module: 'wikibase-gateway' });

// ============================================================================
// Wire Format
// ============================================================================

const SnakSchema = z.object({
  snaktype: z.string(),
  property: z.string(),
  hash: z.string().optional(),
  datavalue: z
    .object({
      value: z.unknown(),
      type: z.string().optional(),
    })
    .optional(),
});

const StatementSchema = z.object({
  id: z.string(),
  mainsnak: SnakSchema,
  qualifiers: z.record(z.array(SnakSchema)).optional(),
  references: z.array(z.unknown()).optional(),
});

const EntitySchema = z.object({
  id: z.string(),
  claims: z.record(z.array(StatementSchema)).optional(),
});

const EntityDataSchema = z.object({
  entities: z.record(EntitySchema),
});

const TokenResponseSchema = z.object({
  query: z.object({
    tokens: z.object({ csrftoken: z.string().min(1) }),
  }),
});

const ApiErrorSchema = z.object({
  error: z
    .object({
      code: z.string(),
      info: z.string().optional(),
    })
    .optional(),
});

/**
 * Action API maps serialize as `[]` when empty
 */
function mapOrEmptyList<T extends z.ZodTypeAny>(schema: T) {
  return z.union([
    z.record(schema),
    z.array(z.unknown()).max(0).transform((): Record<string, z.infer<T>> => ({})),
  ]);
}

const LabelledEntitySchema = z.object({
  id: z.string(),
  missing: z.string().optional(),
  labels: mapOrEmptyList(z.object({ value: z.string() })).optional(),
  claims: mapOrEmptyList(z.array(StatementSchema)).optional(),
});

const GetEntitiesSchema = z.object({
  entities: z.record(LabelledEntitySchema),
});

const EntityIdValueSchema = z.object({ id: z.string() });

const CheckedSnakSchema = z.object({
  results: z.array(z.object({ status: z.string() })).optional(),
});

const CheckedStatementSchema = z.object({
  mainsnak: CheckedSnakSchema,
  qualifiers: mapOrEmptyList(z.array(CheckedSnakSchema)).optional(),
});

const ConstraintCheckSchema = z.object({
  wbcheckconstraints: z.record(
    z.object({
      claims: mapOrEmptyList(z.array(CheckedStatementSchema)).optional(),
    })
  ),
});

/** Constraint check statuses that count as a problem */
const PROBLEM_STATUSES: ReadonlySet<string> = new Set(['violation', 'warning']);

type Snak = z.infer<typeof SnakSchema>;
type Statement = z.infer<typeof StatementSchema>;
type CheckedSnak = z.infer<typeof CheckedSnakSchema>;

function stringValue(snak: Snak | undefined): string | undefined {
  if (snak?.snaktype !== 'value') return undefined;
  const value = snak.datavalue?.value;
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map one authority-id statement, skipping novalue/somevalue statements
 *
 * Every "subject named as" value snak is kept; a claim may carry more than one.
 */
export function toAuthorityClaim(statement: Statement): AuthorityClaim | null {
  const value = stringValue(statement.mainsnak);
  if (value === undefined) return null;

  const snaks = statement.qualifiers?.[NAMED_AS_QUALIFIER] ?? [];
  const namedAs: string[] = [];
  let replaced: Snak | undefined;
  for (const snak of snaks) {
    const heading = stringValue(snak);
    if (heading === undefined) continue;
    namedAs.push(heading);
    if (replaced === undefined) replaced = snak;
  }
  if (replaced === undefined) replaced = snaks[0];

  return {
    id: statement.id,
    value,
    namedAs,
    ...(replaced?.hash !== undefined ? { qualifierHash: replaced.hash } : {}),
    hasReference: (statement.references?.length ?? 0) > 0,
  };
}

/**
 * Parse an entity-data document into a snapshot
 *
 * A redirected entity comes back keyed by its target id; the snapshot carries
 * the target so writes land on the live entity.
 */
export function parseEntityData(entityId: string, body: unknown): EntitySnapshot {
  const parsed = EntityDataSchema.safeParse(body);
  if (!parsed.success) {
    throw new EntityUnavailableError(entityId, 'unexpected entity-data shape');
  }

  const entity = parsed.data.entities[entityId] ?? Object.values(parsed.data.entities)[0];
  if (!entity) {
    throw new EntityUnavailableError(entityId, 'entity missing from response');
  }

  const statements = entity.claims?.[AUTHORITY_ID_PROPERTY] ?? [];
  const authorityClaims = statements
    .map(toAuthorityClaim)
    .filter((claim): claim is AuthorityClaim => claim !== null);

  return { entityId: entity.id, authorityClaims };
}

/**
 * Label and "instance of" class ids of an entity from a `wbgetentities` response
 */
export function parseEntityFacts(
  entityId: string,
  body: unknown,
  language: string
): { label: string; classIds: string[] } {
  const parsed = GetEntitiesSchema.safeParse(body);
  if (!parsed.success) {
    throw new EntityUnavailableError(entityId, 'unexpected wbgetentities shape');
  }

  const entity = parsed.data.entities[entityId] ?? Object.values(parsed.data.entities)[0];
  if (!entity || entity.missing !== undefined) {
    throw new EntityUnavailableError(entityId, 'entity missing from response');
  }

  const classIds: string[] = [];
  for (const statement of entity.claims?.[INSTANCE_OF_PROPERTY] ?? []) {
    const value = EntityIdValueSchema.safeParse(statement.mainsnak.datavalue?.value);
    if (statement.mainsnak.snaktype === 'value' && value.success && !classIds.includes(value.data.id)) {
      classIds.push(value.data.id);
    }
  }

  return { label: entity.labels?.[language]?.value ?? '', classIds };
}

/**
 * Labels by entity id from a `wbgetentities` response; entities without a
 * label in `language` are left out
 */
export function parseEntityLabels(body: unknown, language: string): Map<string, string> {
  const labels = new Map<string, string>();
  const parsed = GetEntitiesSchema.safeParse(body);
  if (!parsed.success) return labels;

  for (const [id, entity] of Object.entries(parsed.data.entities)) {
    const label = entity.labels?.[language]?.value;
    if (label !== undefined) labels.set(id, label);
  }
  return labels;
}

function hasProblem(snak: CheckedSnak): boolean {
  return (snak.results ?? []).some((result) => PROBLEM_STATUSES.has(result.status));
}

/**
 * Constraint flag of an entity from a `wbcheckconstraints` response
 */
export function parseConstraintFlag(entityId: string, body: unknown): ConstraintFlag {
  const parsed = ConstraintCheckSchema.safeParse(body);
  if (!parsed.success) {
    throw new EntityUnavailableError(entityId, 'unexpected wbcheckconstraints shape');
  }

  const checked =
    parsed.data.wbcheckconstraints[entityId] ?? Object.values(parsed.data.wbcheckconstraints)[0];
  let flag: ConstraintFlag = 'no';

  for (const [property, statements] of Object.entries(checked?.claims ?? {})) {
    for (const statement of statements) {
      const qualifierSnaks = Object.values(statement.qualifiers ?? {}).flat();
      if (!hasProblem(statement.mainsnak) && !qualifierSnaks.some(hasProblem)) continue;
      if (property === AUTHORITY_ID_PROPERTY) return 'p244';
      flag = 'yes';
    }
  }

  return flag;
}

/**
 * Statement JSON for a new authority-id claim
 */
export function buildClaimJson(entityId: string, claim: NewAuthorityClaim, guid: string): unknown {
  const statedInNumeric = Number.parseInt(claim.reference.statedIn.replace(/^Q/, ''), 10);

  return {
    id: `${entityId}$${guid}`,
    type: 'statement',
    rank: 'normal',
    mainsnak: {
      snaktype: 'value',
      property: AUTHORITY_ID_PROPERTY,
      datavalue: { value: claim.value, type: 'string' },
    },
    qualifiers: {
      [NAMED_AS_QUALIFIER]: [
        {
          snaktype: 'value',
          property: NAMED_AS_QUALIFIER,
          datavalue: { value: claim.qualifierHeading, type: 'string' },
        },
      ],
    },
    'qualifiers-order': [NAMED_AS_QUALIFIER],
    references: [
      {
        snaks: {
          [STATED_IN_PROPERTY]: [
            {
              snaktype: 'value',
              property: STATED_IN_PROPERTY,
              datavalue: {
                value: {
                  'entity-type': 'item',
                  'numeric-id': statedInNumeric,
                  id: claim.reference.statedIn,
                },
                type: 'wikibase-entityid',
              },
            },
          ],
          [RETRIEVED_PROPERTY]: [
            {
              snaktype: 'value',
              property: RETRIEVED_PROPERTY,
              datavalue: {
                value: {
                  time: `+${claim.reference.retrieved}T00:00:00Z`,
                  timezone: 0,
                  before: 0,
                  after: 0,
                  precision: DAY_PRECISION,
                  calendarmodel: GREGORIAN_CALENDAR,
                },
                type: 'time',
              },
            },
          ],
        },
        'snaks-order': [STATED_IN_PROPERTY, RETRIEVED_PROPERTY],
      },
    ],
  };
}

// ============================================================================
// Gateway
// ============================================================================

export interface WikibaseGatewayConfig {
  readonly httpClient: HTTPClient;

  /** e.g. https://www.wikidata.org/wiki/Special:EntityData */
  readonly entityDataBaseUrl: string;

  /** e.g. https://www.wikidata.org/w/api.php */
  readonly apiUrl: string;

  /** OAuth2 access token; required for writes */
  readonly accessToken?: string;

  /** Statement GUID source (default: uuid v4) */
  readonly generateGuid?: () => string;

  /** Label language for review lookups (default: en) */
  readonly labelLanguage?: string;
}

export class WikibaseGateway implements KnowledgeBaseGateway {
  private csrfToken: string | null = null;
  private readonly generateGuid: () => string;

  constructor(private readonly config: WikibaseGatewayConfig) {
    this.generateGuid = config.generateGuid ?? (() => uuidv4());
  }

  entityUrl(entityId: string): string {
    return `${this.config.entityDataBaseUrl.replace(/\/+$/, '')}/${entityId}.json`;
  }

  async fetchEntity(entityId: string): Promise<EntitySnapshot> {
    let body: unknown;
    try {
      body = await this.config.httpClient.fetchJSON(this.entityUrl(entityId));
    } catch (error) {
      throw new EntityUnavailableError(entityId, errorMessage(error), { cause: error });
    }
    return parseEntityData(entityId, body);
  }

  /**
   * Label and class labels of an entity; a class without a label is shown by id
   *
   * @throws {EntityUnavailableError} If either query fails
   */
  async describeEntity(entityId: string): Promise<EntityDescription> {
    const language = this.config.labelLanguage ?? 'en';
    const entityBody = await this.query(entityId, {
      action: 'wbgetentities',
      ids: entityId,
      props: 'labels|claims',
      languages: language,
    });
    const facts = parseEntityFacts(entityId, entityBody, language);
    if (facts.classIds.length === 0) {
      return { label: facts.label, instanceOf: [] };
    }

    const classBody = await this.query(entityId, {
      action: 'wbgetentities',
      ids: facts.classIds.join('|'),
      props: 'labels',
      languages: language,
    });
    const labels = parseEntityLabels(classBody, language);
    return { label: facts.label, instanceOf: facts.classIds.map((id) => labels.get(id) ?? id) };
  }

  /**
   * @throws {EntityUnavailableError} If the constraint check fails
   */
  async constraintFlag(entityId: string): Promise<ConstraintFlag> {
    const body = await this.query(entityId, { action: 'wbcheckconstraints', id: entityId });
    return parseConstraintFlag(entityId, body);
  }

  async addAuthorityClaim(entityId: string, claim: NewAuthorityClaim, summary: string): Promise<void> {
    const claimJson = buildClaimJson(entityId, claim, this.generateGuid());

    await this.post(entityId, {
      action: 'wbsetclaim',
      claim: JSON.stringify(claimJson),
      summary,
    });

    log.info('Authority claim added', { entityId, value: claim.value });
  }

  async setNamedAsQualifier(
    entityId: string,
    claim: AuthorityClaim,
    heading: string,
    summary: string
  ): Promise<void> {
    await this.post(entityId, {
      action: 'wbsetqualifier',
      claim: claim.id,
      property: NAMED_AS_QUALIFIER,
      snaktype: 'value',
      value: JSON.stringify(heading),
      ...(claim.qualifierHash !== undefined ? { snakhash: claim.qualifierHash } : {}),
      summary,
    });

    log.info('Named-as qualifier set', { entityId, claimId: claim.id });
  }

  private async query(entityId: string, params: Record<string, string>): Promise<unknown> {
    const url = `${this.config.apiUrl}?${new URLSearchParams({ ...params, format: 'json' }).toString()}`;
    try {
      return await this.config.httpClient.fetchJSON(url);
    } catch (error) {
      throw new EntityUnavailableError(entityId, errorMessage(error), { cause: error });
    }
  }

  private authHeaders(entityId: string): Record<string, string> {
    if (this.config.accessToken === undefined || this.config.accessToken === '') {
      throw new EntityWriteError(entityId, 'no knowledge-base access token configured');
    }
    return { Authorization: `Bearer ${this.config.accessToken}` };
  }

  private async getCsrfToken(entityId: string): Promise<string> {
    if (this.csrfToken !== null) return this.csrfToken;

    const url = `${this.config.apiUrl}?action=query&meta=tokens&type=csrf&format=json`;
    let body: unknown;
    try {
      body = await this.config.httpClient.fetchJSON(url, { headers: this.authHeaders(entityId) });
    } catch (error) {
      if (error instanceof EntityWriteError) throw error;
      throw new EntityWriteError(entityId, `CSRF token request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EntityWriteError(entityId, 'CSRF token missing from response');
    }

    this.csrfToken = parsed.data.query.tokens.csrftoken;
    return this.csrfToken;
  }

  private async post(entityId: string, params: Record<string, string>): Promise<void> {
    const headers = this.authHeaders(entityId);
    const token = await this.getCsrfToken(entityId);

    const form = new URLSearchParams({ ...params, format: 'json', bot: '1', token });

    let body: unknown;
    try {
      body = await this.config.httpClient.fetchJSON(this.config.apiUrl, {
        method: 'POST',
        headers,
        body: form,
        retries: 0,
      });
    } catch (error) {
      throw new EntityWriteError(entityId, errorMessage(error), { cause: error });
    }

    const parsed = ApiErrorSchema.safeParse(body);
    if (parsed.success && parsed.data.error) {
      if (parsed.data.error.code === 'badtoken') {
        this.csrfToken = null;
      }
      throw new EntityWriteError(
        entityId,
        `${parsed.data.error.code}: ${parsed.data.error.info ?? 'no detail'}`
      );
    }
  }
}
