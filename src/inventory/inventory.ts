/**
 * Inventory Assembler: model, adapter, data lineage and dependency
 * components merged into one deduplicated, ordered record.
 *
 * The (kind, identifier) ordering feeds the canonical serialization; it is
 * required for hash stability, not for display.
 *
 * Pure functions: no I/O, no external calls.
 */

import { compareStrings } from "../audit/canonical.js";
import type { BomSeed } from "../contracts/schemas.js";

export type InventoryKind = "adapter" | "dataset" | "dependency" | "model";

export interface InventoryComponent {
  kind: InventoryKind;
  identifier: string;
  version: string | null;
  contentHash: string | null;
}

export interface ParsedDependency {
  name: string;
  version: string;
}

export const UNKNOWN_VERSION = "unknown";

/**
 * Split a pinned requirement on its first `==`.
 *
 *   "numpy==1.26.0"        → numpy / 1.26.0
 *   "weird==1.0==build"    → weird / 1.0==build
 *   "complex>=2.0", "name" → kept whole / unknown
 */
export function parseDependency(spec: string): ParsedDependency {
  const trimmed = spec.trim();
  const idx = trimmed.indexOf("==");
  if (idx <= 0) {
    return { name: trimmed, version: UNKNOWN_VERSION };
  }
  const version = trimmed.slice(idx + 2);
  return {
    name: trimmed.slice(0, idx),
    version: version.length > 0 ? version : UNKNOWN_VERSION,
  };
}

/** "<model>@<sha>" followed by " + <adapter>@<sha>" per adapter. */
export function describeModelIdentity(seed: BomSeed): string {
  const parts = [`${seed.modelName}@${seed.modelSha}`];
  for (const adapter of seed.adapters) {
    parts.push(`${adapter.name}@${adapter.sha}`);
  }
  return parts.join(" + ");
}

export function compareComponents(
  a: InventoryComponent,
  b: InventoryComponent,
): number {
  return compareStrings(a.kind, b.kind) || compareStrings(a.identifier, b.identifier);
}

/**
 * Deduplicate by (kind, identifier), keeping the first occurrence, then
 * sort ascending by (kind, identifier).
 */
export function normalizeInventory(
  components: ReadonlyArray<InventoryComponent>,
): InventoryComponent[] {
  const seen = new Set<string>();
  const unique: InventoryComponent[] = [];
  for (const component of components) {
    const key = JSON.stringify([component.kind, component.identifier]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push({ ...component });
  }
  return unique.sort(compareComponents);
}

export function assembleInventory(seed: BomSeed): InventoryComponent[] {
  const components: InventoryComponent[] = [
    {
      kind: "model",
      identifier: seed.modelName,
      version: seed.modelVersion,
      contentHash: seed.modelSha,
    },
  ];

  for (const adapter of seed.adapters) {
    components.push({
      kind: "adapter",
      identifier: adapter.name,
      version: null,
      contentHash: adapter.sha,
    });
  }

  for (const lineageId of seed.dataLineage) {
    components.push({
      kind: "dataset",
      identifier: lineageId,
      version: null,
      contentHash: null,
    });
  }

  for (const spec of seed.softwareDependencies) {
    const dep = parseDependency(spec);
    components.push({
      kind: "dependency",
      identifier: dep.name,
      version: dep.version,
      contentHash: null,
    });
  }

  return normalizeInventory(components);
}
