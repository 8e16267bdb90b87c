/**
 * Deterministic fingerprints for cache keys and wave-plan memoization.
 *
 * Object keys are sorted before hashing so that two structurally equal
 * argument lists always produce the same fingerprint, regardless of the
 * order in which their properties were assigned.
 */

import { createHash } from "node:crypto";

/** Number of hex characters kept from the SHA-256 digest. */
const FINGERPRINT_LENGTH = 16;

/**
 * JSON encoding with sorted object keys. `undefined` array slots and
 * non-finite numbers become `null`; functions and symbols are rejected
 * because they have no stable identity across processes.
 */
export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return "null";
  }

  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? JSON.stringify(value) : "null";
    case "bigint":
      return JSON.stringify(value.toString());
    case "function":
    case "symbol":
      throw new TypeError(`Cannot fingerprint a ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => stableStringify(item)).join(",")}]`;
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  if (value instanceof Set) {
    return stableStringify([...value].map((item: unknown) => stableStringify(item)).sort());
  }

  if (value instanceof Map) {
    return stableStringify(Object.fromEntries(value));
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return `{${entries
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
    .join(",")}}`;
}

/**
 * SHA-256 of arbitrary text, truncated to a short hex prefix.
 */
export function hashText(text: string, length = FINGERPRINT_LENGTH): string {
  return createHash("sha256").update(text, "utf-8").digest("hex").slice(0, length);
}

/**
 * Fingerprint a named computation and its arguments.
 *
 * @example
 *   fingerprint("rules", "ESS")  // "rules:3f1c…" (16 hex chars)
 */
export function fingerprint(name: string, ...args: readonly unknown[]): string {
  return `${name}:${hashText(stableStringify(args))}`;
}
