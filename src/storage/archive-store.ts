/**
 * Content-addressed archive of exported audit packages.
 *
 * Layout:  <root>/sha256/<first 2 hex>/<digest>
 *
 * Invariants:
 *   - Paths derive only from the SHA-256 of the stored bytes.
 *   - An entry is never overwritten or deleted.
 *   - Writes go to a temp file first and are renamed into place.
 *   - Every resolved path stays under the archive root.
 */

import {
  existsSync,
  lstatSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { randomBytes } from "node:crypto";
import { join, resolve, sep } from "node:path";
import { SHA256_HEX_RE, sha256Bytes } from "../audit/hashing.js";
import type { RenderedArtifact } from "../export/renderers.js";

const DEFAULT_MAX_ENTRY_BYTES = 104_857_600;

export type ArchiveStoreErrorCode =
  | "ENTRY_EMPTY"
  | "ENTRY_TOO_LARGE"
  | "ENTRY_NOT_FOUND"
  | "INVALID_DIGEST"
  | "PATH_TRAVERSAL"
  | "CONTENT_MISMATCH";

export class ArchiveStoreError extends Error {
  public readonly code: ArchiveStoreErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: ArchiveStoreErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "ArchiveStoreError";
    this.code = code;
    this.details = details ?? {};
  }
}

export interface ArchiveRecord {
  digest: string;
  size: number;
  mediaType: string;
  path: string;
  /** False when identical bytes were already archived. */
  created: boolean;
}

export class ArchiveStore {
  private readonly root: string;

  constructor(
    rootDir: string,
    private readonly maxBytes: number = DEFAULT_MAX_ENTRY_BYTES,
  ) {
    this.root = resolve(rootDir);
    mkdirSync(this.root, { recursive: true });
  }

  get rootDir(): string {
    return this.root;
  }

  put(content: Uint8Array, mediaType: string): ArchiveRecord {
    if (content.length === 0) {
      throw new ArchiveStoreError("Archive entry must not be empty", "ENTRY_EMPTY");
    }
    if (content.length > this.maxBytes) {
      throw new ArchiveStoreError(
        `Archive entry exceeds max size: ${content.length} > ${this.maxBytes}`,
        "ENTRY_TOO_LARGE",
        { size: content.length, maxBytes: this.maxBytes },
      );
    }

    const digest = sha256Bytes(content);
    const path = this.pathFor(digest);
    const record = { digest, size: content.length, mediaType, path };

    if (existsSync(path)) {
      this.assertRegularFile(path);
      if (sha256Bytes(readFileSync(path)) !== digest) {
        throw new ArchiveStoreError(`Archived content at ${path} does not match its name`, "CONTENT_MISMATCH", {
          digest,
        });
      }
      return { ...record, created: false };
    }

    const dir = this.dirFor(digest);
    mkdirSync(dir, { recursive: true });
    const tmpPath = join(dir, `.tmp-${randomBytes(8).toString("hex")}`);
    this.assertInsideRoot(tmpPath);
    writeFileSync(tmpPath, content, { mode: 0o444 });
    renameSync(tmpPath, path);

    return { ...record, created: true };
  }

  /** Archive a rendered package under the digest of its bytes. */
  putArtifact(artifact: RenderedArtifact): ArchiveRecord {
    return this.put(artifact.bytes, artifact.mediaType);
  }

  get(digest: string): Buffer {
    const path = this.pathFor(digest);
    if (!existsSync(path)) {
      throw new ArchiveStoreError(`Archive entry not found: ${digest}`, "ENTRY_NOT_FOUND", { digest });
    }
    this.assertRegularFile(path);
    return readFileSync(path);
  }

  has(digest: string): boolean {
    return existsSync(this.pathFor(digest));
  }

  /** True when the entry exists and its bytes still hash to `digest`. */
  verify(digest: string): boolean {
    const path = this.pathFor(digest);
    if (!existsSync(path)) return false;
    this.assertRegularFile(path);
    return sha256Bytes(readFileSync(path)) === digest;
  }

  // -----------------------------------------------------------------------
  // Paths
  // -----------------------------------------------------------------------

  private dirFor(digest: string): string {
    const dir = resolve(join(this.root, "sha256", digest.slice(0, 2)));
    this.assertInsideRoot(dir);
    return dir;
  }

  private pathFor(digest: string): string {
    if (!SHA256_HEX_RE.test(digest)) {
      throw new ArchiveStoreError(
        `Invalid archive digest (expected 64 lowercase hex chars): ${digest}`,
        "INVALID_DIGEST",
        { digest },
      );
    }
    const path = join(this.dirFor(digest), digest);
    this.assertInsideRoot(path);
    return path;
  }

  private assertInsideRoot(path: string): void {
    const normalized = resolve(path);
    if (normalized !== this.root && !normalized.startsWith(this.root + sep)) {
      throw new ArchiveStoreError(`Path ${path} is outside the archive root`, "PATH_TRAVERSAL", {
        path,
        root: this.root,
      });
    }
  }

  private assertRegularFile(path: string): void {
    if (lstatSync(path).isSymbolicLink()) {
      throw new ArchiveStoreError(`Symlink at archive path: ${path}`, "PATH_TRAVERSAL", { path });
    }
  }
}
