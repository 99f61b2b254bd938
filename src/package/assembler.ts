/**
 * Package Assembler: composes the pipeline outputs into one unsealed
 * AuditPackage and its canonical bytes.
 *
 * The package takes a deep copy of every part it is given, so nothing the
 * caller still holds can alter the record after assembly.
 */

import type { ConfigChange, JsonValue } from "../contracts/schemas.js";
import type { TraceabilityMatrix } from "../coverage/coverage-mapper.js";
import type { DeviationReport } from "../deviations/deviation-filter.js";
import { normalizeInventory, type InventoryComponent } from "../inventory/inventory.js";
import type { ReplayWarning, SessionNarrative } from "../session/reconstruct.js";
import { canonicalPackageBytes } from "./canonical.js";
import { AUDIT_PACKAGE_SCHEMA_VERSION, type AuditPackage } from "./types.js";

export interface PackageParts {
  id: string;
  agentVersion: string;
  generatedAt: Date | string;
  generatedBy: string;
  modelIdentity: string;
  inventory: ReadonlyArray<InventoryComponent>;
  matrix: TraceabilityMatrix;
  deviationReport: DeviationReport;
  sessions?: ReadonlyArray<SessionNarrative>;
  configChanges?: ReadonlyArray<ConfigChange>;
  replayWarnings?: ReadonlyArray<ReplayWarning>;
}

export interface AssembledPackage {
  pkg: AuditPackage;
  canonicalBytes: Buffer;
}

function toIsoUtc(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (isNaN(date.getTime())) {
    throw new TypeError(`Invalid generation timestamp: ${String(value)}`);
  }
  return date.toISOString();
}

/**
 * Turn metadata is free-form JSON, but the hashed form carries integers
 * only: any other number is recorded as its decimal string.
 */
export function encodeMetadataValue(value: JsonValue): JsonValue {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : String(value);
  }
  if (Array.isArray(value)) {
    return value.map(encodeMetadataValue);
  }
  if (value !== null && typeof value === "object") {
    const encoded: Record<string, JsonValue> = {};
    for (const [key, v] of Object.entries(value)) {
      encoded[key] = encodeMetadataValue(v);
    }
    return encoded;
  }
  return value;
}

function encodeSessions(sessions: ReadonlyArray<SessionNarrative>): SessionNarrative[] {
  return sessions.map((session) => ({
    sessionId: session.sessionId,
    turns: session.turns.map((turn) => {
      const metadata: Record<string, JsonValue> = {};
      for (const [key, value] of Object.entries(turn.metadata)) {
        metadata[key] = encodeMetadataValue(value);
      }
      return { ...structuredClone(turn), metadata };
    }),
  }));
}

export function assemblePackage(parts: PackageParts): AssembledPackage {
  const pkg: AuditPackage = {
    schemaVersion: AUDIT_PACKAGE_SCHEMA_VERSION,
    id: parts.id,
    agentVersion: parts.agentVersion,
    generatedAt: toIsoUtc(parts.generatedAt),
    generatedBy: parts.generatedBy,
    modelIdentity: parts.modelIdentity,
    // Idempotent on already-normalized input; guarantees the hashed order.
    inventory: normalizeInventory(parts.inventory),
    matrix: structuredClone(parts.matrix),
    deviations: structuredClone([...parts.deviationReport.deviations]),
    humanInterventionCount: parts.deviationReport.humanInterventionCount,
    sessions: encodeSessions(parts.sessions ?? []),
    configChanges: structuredClone([...(parts.configChanges ?? [])]),
    replayWarnings: structuredClone([...(parts.replayWarnings ?? [])]),
    documentHash: null,
    signature: null,
  };

  return { pkg, canonicalBytes: canonicalPackageBytes(pkg) };
}
