/**
 * SHA-256 hashing for canonical documents.
 *
 * Pure functions: no I/O, no side effects.
 */

import { createHash } from "node:crypto";

/** Length of a lowercase hex SHA-256 digest. */
export const SHA256_HEX_LENGTH = 64;

export const SHA256_HEX_RE = /^[0-9a-f]{64}$/;

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 hex digest of raw bytes. */
export function sha256Bytes(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}
