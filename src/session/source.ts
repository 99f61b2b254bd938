/**
 * Capability interfaces for the operational event store and the field
 * decryption authority.
 *
 * The event store is shared between jobs and is strictly read-only: this
 * interface has no method that can write or delete, and implementations
 * must not acquire write access to the underlying store.
 */

import type {
  Annotation,
  ConfigChange,
  DeviationEvent,
  SessionTurn,
} from "../contracts/schemas.js";

export interface EventQuery {
  /** Only events for this agent version, when the store records versions. */
  agentVersion?: string;
  /** Inclusive lower bound, ISO 8601 UTC. */
  since?: string;
}

export interface SessionSource {
  /** Raw risk/refusal/error/intervention events, oldest first. */
  listEvents(query: EventQuery): Promise<DeviationEvent[]>;
  /** Raw turns for one session in any order; empty when unknown. */
  fetchSession(sessionId: string): Promise<SessionTurn[]>;
  listAnnotations(sessionId: string): Promise<Annotation[]>;
  /** Configuration audit trail, any order. */
  listConfigChanges(): Promise<ConfigChange[]>;
}

/** Decrypts protected turn fields when the caller is authorized. */
export interface Decryptor {
  decrypt(field: string): Promise<string>;
}
