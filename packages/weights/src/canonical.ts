/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats: numbers must be safe integers, bigints travel as decimal strings
 *   3. Maps encode as objects keyed by their stringified keys
 *   4. Same value → identical bytes, always
 */

import { Encoder } from "cbor-x";
import { invalidInput } from "./errors.js";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Normalize a value into its canonical shape (recursive, depth-first).
 * Object keys come out sorted, bigints become strings.
 */
export function canonicalize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) throw invalidInput("non_integer_number", String(value));
    return value;
  }
  if (typeof value !== "object") return value;
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value instanceof Map) {
    const sorted: Record<string, unknown> = {};
    const entries = [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v]);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) sorted[k] = canonicalize(v);
    return sorted;
  }
  if (!isPlainRecord(value)) throw invalidInput("non_canonical_value", value.constructor.name);
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const entry = value[key];
    if (entry !== undefined) sorted[key] = canonicalize(entry);
  }
  return sorted;
}

/**
 * Canonical encode: normalize, then CBOR encode.
 * This is the ONLY way to serialize values for hashing in this protocol.
 */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(canonicalize(value));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
