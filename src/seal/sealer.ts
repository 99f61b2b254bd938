/**
 * Sealer: digest the canonical bytes, obtain a signature from the
 * external identity authority, embed both and freeze the record.
 *
 * Invariants:
 *   1. The digest is always computed here from bytes; a caller-provided
 *      hash is never trusted.
 *   2. After embedding the seal, the digest is recomputed from the sealed
 *      record. A mismatch is an IntegrityError and is never retried.
 *   3. A sealed package is frozen. Changes go through `reseal`, which
 *      produces a new package with a new id and a new seal.
 */

import type { Logger } from "pino";
import { sha256Bytes } from "../audit/hashing.js";
import {
  AuditError,
  ExternalServiceError,
  IntegrityError,
  PackageSealedError,
} from "../errors.js";
import { canonicalPackageBytes, computeDocumentHash } from "../package/canonical.js";
import { AuditPackageSchema } from "../package/schema.js";
import type { AuditPackage, DeepReadonly, SealedAuditPackage } from "../package/types.js";
import { withRetry, type RetryPolicy } from "../retry.js";

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export interface SignatureRequest {
  packageId: string;
  documentHash: string;
}

/** External signing authority, bound to one authenticated identity. */
export interface SigningCapability {
  readonly signerId: string;
  sign(request: SignatureRequest, signal?: AbortSignal): Promise<string>;
}

export interface SignatureVerifier {
  verify(documentHash: string, signature: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export interface SealVerification {
  valid: boolean;
  expected: string;
  actual: string | null;
}

/** Recompute the digest of `pkg` and compare it to the embedded hash. */
export function verifySeal(pkg: DeepReadonly<AuditPackage>): SealVerification {
  const expected = computeDocumentHash(pkg);
  return {
    valid: pkg.documentHash === expected,
    expected,
    actual: pkg.documentHash,
  };
}

export function isSealed(pkg: DeepReadonly<AuditPackage>): boolean {
  return pkg.documentHash !== null || pkg.signature !== null;
}

function freezeDeep(value: unknown): void {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    freezeDeep(child);
  }
}

function freezeSealed(
  pkg: AuditPackage & { documentHash: string; signature: string },
): SealedAuditPackage {
  freezeDeep(pkg);
  return pkg;
}

/** Mutable, validated copy of a (possibly sealed) package. */
export function thawPackage(pkg: DeepReadonly<AuditPackage>): AuditPackage {
  return AuditPackageSchema.parse(structuredClone(pkg));
}

// ---------------------------------------------------------------------------
// Sealer
// ---------------------------------------------------------------------------

export interface SealerOptions {
  retry: RetryPolicy;
  logger: Logger;
}

export type PackageRevision = Partial<
  Omit<AuditPackage, "schemaVersion" | "id" | "documentHash" | "signature">
>;

export class Sealer {
  constructor(
    private readonly signer: SigningCapability,
    private readonly options: SealerOptions,
  ) {}

  get signerId(): string {
    return this.signer.signerId;
  }

  async seal(
    pkg: AuditPackage,
    canonicalBytes: Uint8Array,
    signal?: AbortSignal,
  ): Promise<SealedAuditPackage> {
    if (isSealed(pkg)) {
      throw new PackageSealedError(pkg.id);
    }

    const documentHash = sha256Bytes(canonicalBytes);
    const signature = await this.requestSignature(pkg.id, documentHash, signal);

    const sealed = { ...structuredClone(pkg), documentHash, signature };

    const recomputed = computeDocumentHash(sealed);
    if (recomputed !== documentHash) {
      throw new IntegrityError(documentHash, recomputed, pkg.id);
    }

    this.options.logger.info(
      { packageId: pkg.id, documentHash, signerId: this.signer.signerId },
      "package sealed",
    );
    return freezeSealed(sealed);
  }

  /**
   * Apply `revision` to a copy of `sealed` under a new id and seal the
   * result. The original package is left untouched.
   */
  async reseal(
    sealed: SealedAuditPackage,
    revision: PackageRevision,
    newId: string,
    signal?: AbortSignal,
  ): Promise<SealedAuditPackage> {
    const draft: AuditPackage = {
      ...thawPackage(sealed),
      ...structuredClone(revision),
      id: newId,
      documentHash: null,
      signature: null,
    };
    return this.seal(draft, canonicalPackageBytes(draft), signal);
  }

  private requestSignature(
    packageId: string,
    documentHash: string,
    signal?: AbortSignal,
  ): Promise<string> {
    return withRetry(
      async () => {
        let signature: string;
        try {
          signature = await this.signer.sign({ packageId, documentHash }, signal);
        } catch (err: unknown) {
          if (err instanceof AuditError) throw err;
          throw new ExternalServiceError(
            `Signing authority ${this.signer.signerId} failed to sign package ${packageId}`,
            "signing",
            this.signer.signerId,
            err,
          );
        }
        if (signature.length === 0) {
          throw new ExternalServiceError(
            `Signing authority ${this.signer.signerId} returned an empty signature`,
            "signing",
            this.signer.signerId,
          );
        }
        return signature;
      },
      this.options.retry,
      {
        signal,
        onRetry: (err, attempt, delayMs) =>
          this.options.logger.warn(
            { packageId, attempt, delayMs, err: err.message },
            "retrying signature request",
          ),
      },
    );
  }
}
