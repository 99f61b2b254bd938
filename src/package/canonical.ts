/**
 * Canonical byte form of an audit package: the only input ever hashed.
 *
 * Layout:
 *   - Top-level fields in the order of CANONICAL_FIELD_ORDER, nothing else.
 *     `documentHash` and `signature` are never part of the hashed form.
 *   - Nested objects use canonical JSON (sorted keys, no undefined).
 *   - Timestamps are ISO 8601 UTC strings with millisecond precision.
 *   - Numbers are integers; anything else is rejected.
 *   - Collections keep the order established upstream (coverage, inventory,
 *     deviation and session ordering), never map iteration order.
 *
 * Display and export formats are separate transforms of the same record
 * and never feed the hash.
 */

import { canonicalJson } from "../audit/canonical.js";
import { sha256Bytes } from "../audit/hashing.js";
import type { AuditPackage, DeepReadonly } from "./types.js";

export const CANONICAL_FIELD_ORDER = [
  "schemaVersion",
  "id",
  "agentVersion",
  "generatedAt",
  "generatedBy",
  "modelIdentity",
  "inventory",
  "matrix",
  "deviations",
  "humanInterventionCount",
  "sessions",
  "configChanges",
  "replayWarnings",
] as const satisfies ReadonlyArray<keyof AuditPackage>;

export type CanonicalField = (typeof CANONICAL_FIELD_ORDER)[number];

function assertIntegers(value: unknown, path: string): void {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Non-integer number at ${path}: ${value}`);
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((v, i) => assertIntegers(v, `${path}[${i}]`));
    return;
  }
  if (value !== null && typeof value === "object") {
    for (const [k, v] of Object.entries(value)) {
      assertIntegers(v, `${path}.${k}`);
    }
  }
}

/** Canonical JSON text of the hashable part of `pkg`. */
export function canonicalPackageJson(pkg: DeepReadonly<AuditPackage> | AuditPackage): string {
  const members: string[] = [];
  for (const field of CANONICAL_FIELD_ORDER) {
    const value: unknown = pkg[field];
    assertIntegers(value, field);
    members.push(`${JSON.stringify(field)}:${canonicalJson(value)}`);
  }
  return `{${members.join(",")}}`;
}

export function canonicalPackageBytes(pkg: DeepReadonly<AuditPackage> | AuditPackage): Buffer {
  return Buffer.from(canonicalPackageJson(pkg), "utf8");
}

/** SHA-256 hex of the canonical bytes. */
export function computeDocumentHash(pkg: DeepReadonly<AuditPackage> | AuditPackage): string {
  return sha256Bytes(canonicalPackageBytes(pkg));
}
