/**
 * Knowledge-base gateway contract
 *
 * The only two mutations the engine ever performs: add a wholly new
 * authority-id claim, or set the "subject named as" qualifier of one existing
 * claim. Nothing here removes or rewrites claim values or references.
 */

import type { AuthorityClaim, EntitySnapshot, NewAuthorityClaim } from '../core/types.js';

export interface KnowledgeBaseGateway {
  /**
   * Read the authority-id claims of an entity
   *
   * @throws {EntityUnavailableError} If the entity cannot be fetched
   */
  fetchEntity(entityId: string): Promise<EntitySnapshot>;

  /**
   * Add a new authority-id claim with its qualifier and reference
   *
   * @throws {EntityWriteError} If the knowledge base rejects the write
   */
  addAuthorityClaim(entityId: string, claim: NewAuthorityClaim, summary: string): Promise<void>;

  /**
   * Set (or replace) the "subject named as" qualifier of `claim`, leaving its
   * value and references as they are
   *
   * @throws {EntityWriteError} If the knowledge base rejects the write
   */
  setNamedAsQualifier(
    entityId: string,
    claim: AuthorityClaim,
    heading: string,
    summary: string
  ): Promise<void>;
}
