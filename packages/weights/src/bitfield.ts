/**
 * Sparse epoch bitfield — one bit per epoch, stored as 32-bit words.
 *
 * Used as the index of an unlock schedule so that scans over upcoming unlocks
 * cost O(active epochs + words touched) instead of O(max lock duration).
 * Words equal to zero are not stored.
 */

import { BITFIELD_WIDTH, BITFIELD_WORD_BITS } from "./constants.js";
import { overflow } from "./errors.js";

export type BitfieldWords = Map<number, number>;

function checkIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= BITFIELD_WIDTH) {
    throw overflow("bitfield_index_out_of_range", String(index));
  }
}

export function hasBit(words: BitfieldWords, index: number): boolean {
  checkIndex(index);
  const word = words.get(Math.floor(index / BITFIELD_WORD_BITS)) ?? 0;
  return ((word >>> (index % BITFIELD_WORD_BITS)) & 1) === 1;
}

export function setBit(words: BitfieldWords, index: number): void {
  checkIndex(index);
  const w = Math.floor(index / BITFIELD_WORD_BITS);
  const word = words.get(w) ?? 0;
  words.set(w, (word | (1 << index % BITFIELD_WORD_BITS)) >>> 0);
}

export function clearBit(words: BitfieldWords, index: number): void {
  checkIndex(index);
  const w = Math.floor(index / BITFIELD_WORD_BITS);
  const word = words.get(w);
  if (word === undefined) return;
  const next = (word & ~(1 << index % BITFIELD_WORD_BITS)) >>> 0;
  if (next === 0) words.delete(w);
  else words.set(w, next);
}

/** Lowest set bit in [from, until], or undefined. */
export function nextSetBit(
  words: BitfieldWords,
  from: number,
  until: number,
): number | undefined {
  let i = Math.max(from, 0);
  const last = Math.min(until, BITFIELD_WIDTH - 1);
  while (i <= last) {
    const w = Math.floor(i / BITFIELD_WORD_BITS);
    const masked = (words.get(w) ?? 0) >>> (i % BITFIELD_WORD_BITS);
    if (masked !== 0) {
      const bit = i + (31 - Math.clz32(masked & -masked));
      return bit <= last ? bit : undefined;
    }
    i = (w + 1) * BITFIELD_WORD_BITS;
  }
  return undefined;
}

/** Highest set bit in [downTo, from], or undefined. */
export function prevSetBit(
  words: BitfieldWords,
  from: number,
  downTo: number,
): number | undefined {
  let i = Math.min(from, BITFIELD_WIDTH - 1);
  const first = Math.max(downTo, 0);
  while (i >= first) {
    const w = Math.floor(i / BITFIELD_WORD_BITS);
    const shift = BITFIELD_WORD_BITS - 1 - (i % BITFIELD_WORD_BITS);
    const masked = ((words.get(w) ?? 0) << shift) >>> 0;
    if (masked !== 0) {
      const bit = i - Math.clz32(masked);
      return bit >= first ? bit : undefined;
    }
    i = w * BITFIELD_WORD_BITS - 1;
  }
  return undefined;
}
