/**
 * Local HMAC-SHA-256 signer for development and offline CLI use.
 *
 * Production deployments inject a SigningCapability backed by the identity
 * authority instead; this signer proves integrity only to holders of the
 * same key.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { SignatureRequest, SignatureVerifier, SigningCapability } from "./sealer.js";

const SIGNATURE_PREFIX = "hmac-sha256";

export class HmacSigner implements SigningCapability, SignatureVerifier {
  private readonly key: Buffer;

  constructor(
    public readonly signerId: string,
    key: string,
  ) {
    if (key.length === 0) {
      throw new Error("HmacSigner requires a non-empty key");
    }
    if (signerId.length === 0 || signerId.includes(":")) {
      throw new Error(`Invalid signer id: "${signerId}"`);
    }
    this.key = Buffer.from(key, "utf8");
  }

  private mac(signerId: string, documentHash: string): string {
    return createHmac("sha256", this.key).update(`${signerId}\n${documentHash}`, "utf8").digest("hex");
  }

  /** `hmac-sha256:<signerId>:<hex mac>` */
  async sign(request: SignatureRequest): Promise<string> {
    return `${SIGNATURE_PREFIX}:${this.signerId}:${this.mac(this.signerId, request.documentHash)}`;
  }

  async verify(documentHash: string, signature: string): Promise<boolean> {
    const parts = signature.split(":");
    if (parts.length !== 3 || parts[0] !== SIGNATURE_PREFIX) return false;
    const signerId = parts[1] ?? "";
    const mac = Buffer.from(parts[2] ?? "", "utf8");
    const expected = Buffer.from(this.mac(signerId, documentHash), "utf8");
    return mac.length === expected.length && timingSafeEqual(mac, expected);
  }
}
