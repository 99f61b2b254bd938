/**
 * Canonical JSON serialization.
 *
 * Guarantees:
 *   1. Keys sorted by UTF-16 code unit at every nesting level.
 *   2. No `undefined` values (omitted, never serialized as null).
 *   3. Dates serialized as ISO 8601 UTC strings.
 *   4. null preserved as null.
 *   5. Arrays preserve element order.
 *   6. Output is deterministic: identical logical input → byte-identical output.
 *
 * Pure function: no side effects.
 */

export function canonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value));
}

/**
 * Locale-independent string ordering. `localeCompare` depends on the ICU
 * build of the host, which would make sort order (and hashes) host-specific.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Recursively prepare `value` for JSON.stringify by sorting object keys
 * and converting Dates to ISO strings.
 */
export function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    // undefined will be dropped by JSON.stringify; null is preserved.
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
  }

  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const keys = Object.keys(value).sort(compareStrings);
    for (const key of keys) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  // string | boolean | finite number: pass through as-is.
  return value;
}
