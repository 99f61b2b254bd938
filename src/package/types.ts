import type { ConfigChange, DeviationEvent } from "../contracts/schemas.js";
import type { TraceabilityMatrix } from "../coverage/coverage-mapper.js";
import type { InventoryComponent } from "../inventory/inventory.js";
import type { ReplayWarning, SessionNarrative } from "../session/reconstruct.js";

export const AUDIT_PACKAGE_SCHEMA_VERSION = "1.0.0";

export interface AuditPackage {
  schemaVersion: string;
  id: string;
  agentVersion: string;
  /** ISO 8601 UTC, millisecond precision. */
  generatedAt: string;
  generatedBy: string;
  modelIdentity: string;
  inventory: InventoryComponent[];
  matrix: TraceabilityMatrix;
  deviations: DeviationEvent[];
  humanInterventionCount: number;
  sessions: SessionNarrative[];
  configChanges: ConfigChange[];
  replayWarnings: ReplayWarning[];
  /** SHA-256 hex of the canonical bytes. null until sealed. */
  documentHash: string | null;
  /** Signature over `documentHash`. null until sealed. */
  signature: string | null;
}

export type DeepReadonly<T> = T extends (infer E)[]
  ? ReadonlyArray<DeepReadonly<E>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** A sealed package. Frozen at runtime as well as in the type system. */
export type SealedAuditPackage = DeepReadonly<
  Omit<AuditPackage, "documentHash" | "signature"> & {
    documentHash: string;
    signature: string;
  }
>;
