/**
 * Export renderers.
 *
 * A renderer turns a sealed package into bytes for one export format. The
 * package handed to a renderer is frozen; a renderer that needs a different
 * shape builds its own copy. Rendering never feeds the document hash.
 *
 * Only the canonical `json` renderer ships here. PDF, CSV and inventory
 * encodings (e.g. CycloneDX) are supplied by the embedding application.
 */

import { canonicalJson } from "../audit/canonical.js";
import { UnsupportedFormatError } from "../errors.js";
import type { SealedAuditPackage } from "../package/types.js";

export interface RenderedArtifact {
  format: string;
  mediaType: string;
  bytes: Buffer;
}

export interface ArtifactRenderer {
  readonly format: string;
  readonly mediaType: string;
  render(pkg: SealedAuditPackage): Promise<Uint8Array> | Uint8Array;
}

/** Sealed package, seal included, as canonical JSON. */
export const jsonRenderer: ArtifactRenderer = {
  format: "json",
  mediaType: "application/json",
  render: (pkg) => Buffer.from(canonicalJson(pkg), "utf8"),
};

const FORMAT_RE = /^[a-z0-9][a-z0-9._-]{0,31}$/;

export class RendererRegistry {
  private readonly renderers = new Map<string, ArtifactRenderer>();

  constructor(renderers: ReadonlyArray<ArtifactRenderer> = [jsonRenderer]) {
    for (const renderer of renderers) {
      this.register(renderer);
    }
  }

  register(renderer: ArtifactRenderer): void {
    if (!FORMAT_RE.test(renderer.format)) {
      throw new Error(`Invalid export format name: "${renderer.format}"`);
    }
    if (this.renderers.has(renderer.format)) {
      throw new Error(`Renderer already registered for format "${renderer.format}"`);
    }
    this.renderers.set(renderer.format, renderer);
  }

  formats(): string[] {
    return [...this.renderers.keys()].sort();
  }

  has(format: string): boolean {
    return this.renderers.has(format);
  }

  async render(pkg: SealedAuditPackage, format: string): Promise<RenderedArtifact> {
    const renderer = this.renderers.get(format);
    if (!renderer) {
      throw new UnsupportedFormatError(format, this.formats());
    }
    const bytes = await renderer.render(pkg);
    return { format, mediaType: renderer.mediaType, bytes: Buffer.from(bytes) };
  }
}
