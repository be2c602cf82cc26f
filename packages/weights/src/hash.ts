/**
 * Content hashing. All ids are 32-byte SHA-256 digests as hex strings.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

export type HexDigest = string;

/** 64-char zero hex, the predecessor of the first event in a chain. */
export const ZERO_DIGEST: HexDigest = "0".repeat(64);

export function hashBytes(bytes: Uint8Array): HexDigest {
  return bytesToHex(sha256(bytes));
}

/** SHA256 of the canonically-encoded value → hex. */
export function digestOf(value: unknown): HexDigest {
  return hashBytes(canonicalEncode(value));
}
