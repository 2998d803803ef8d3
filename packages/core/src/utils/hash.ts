/**
 * Canonical JSON and content hashing.
 *
 * Canonical form: object keys sorted at every level, arrays kept in
 * order, no whitespace. Two values with the same content always render
 * the same string.
 */

export type JsonObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is JsonObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Drops `null` and `undefined` entries from objects, recursively.
 * Array elements are kept in place; objects inside arrays are cleaned too.
 */
export function stripNullish<T extends JsonObject>(value: T): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null || entry === undefined) {
      continue;
    }
    result[key] = cleanValue(entry);
  }
  return result;
}

function cleanValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cleanValue);
  }
  if (isPlainObject(value)) {
    return stripNullish(value);
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

export async function sha256Hex(payload: string | Uint8Array) {
  const crypto = globalThis.crypto;
  if (!crypto?.subtle) {
    throw new Error("SHA-256 hashing requires Web Crypto API support.");
  }
  const bytes =
    typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
  const digest = await crypto.subtle.digest("SHA-256", bytes);
  return Array.from(new Uint8Array(digest))
    .map((byte) => byte.toString(16).padStart(2, "0"))
    .join("");
}

/** SHA-256 of the canonical JSON form. */
export function contentHash(value: unknown) {
  return sha256Hex(canonicalJson(value));
}
