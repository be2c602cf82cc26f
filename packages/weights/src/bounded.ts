/**
 * Bounded-width integers.
 *
 * Ledger values live in fixed storage widths (u16 epochs, u32 balances and
 * decay rates, u40 weights, u128 token amounts). Nothing widens silently:
 * every write goes through one of these checks and throws an overflow
 * ProtocolError when the value leaves its range.
 */

import {
  BITFIELD_WIDTH,
  MAX_EPOCHS,
  MAX_LOCK_EPOCHS,
  U16_MAX,
  U32_MAX,
  U40_MAX,
  U128_MAX,
} from "./constants.js";
import { invalidInput, overflow } from "./errors.js";

function checkWidth(value: number, max: number, width: string, label: string): number {
  if (!Number.isSafeInteger(value)) {
    throw overflow(`${width}_not_integer`, `${label}=${value}`);
  }
  if (value < 0) throw overflow(`${width}_underflow`, `${label}=${value}`);
  if (value > max) throw overflow(`${width}_overflow`, `${label}=${value}`);
  return value;
}

export function u16(value: number, label = "value"): number {
  return checkWidth(value, U16_MAX, "u16", label);
}

export function u32(value: number, label = "value"): number {
  return checkWidth(value, U32_MAX, "u32", label);
}

export function u40(value: number, label = "value"): number {
  return checkWidth(value, U40_MAX, "u40", label);
}

export function u128(value: bigint, label = "value"): bigint {
  if (value < 0n) throw overflow("u128_underflow", `${label}=${value}`);
  if (value > U128_MAX) throw overflow("u128_overflow", `${label}=${value}`);
  return value;
}

/** Epoch index inside the protocol horizon. */
export function epochIndex(value: number, label = "epoch"): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw overflow("epoch_underflow", `${label}=${value}`);
  }
  if (value >= MAX_EPOCHS) throw overflow("epoch_out_of_range", `${label}=${value}`);
  return value;
}

/** Validate a caller-supplied positive u32 amount (lock units, points). */
export function positiveU32(value: number, code: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) throw invalidInput(code, String(value));
  if (value > U32_MAX) throw invalidInput(code, `${value} exceeds u32`);
  return value;
}

/**
 * Setup-time assertions on the storage layout. A failure here means the
 * configured widths cannot hold the values the algorithms produce.
 */
export function assertStorageLayout(): void {
  // Largest possible lock weight: a full u32 balance locked for the max duration.
  if (U32_MAX * MAX_LOCK_EPOCHS > U40_MAX) {
    throw overflow("weight_width_too_small", "u32 balance × MAX_LOCK_EPOCHS exceeds u40");
  }
  if (MAX_EPOCHS > BITFIELD_WIDTH) {
    throw overflow("bitfield_too_small", `${MAX_EPOCHS} epochs > ${BITFIELD_WIDTH} bits`);
  }
  if (MAX_EPOCHS - 1 > U16_MAX) {
    throw overflow("epoch_width_too_small", `${MAX_EPOCHS} epochs exceed u16`);
  }
}

/** Total supply expressed in lock units must fit a u32 balance. */
export function assertSupplyFitsLocks(totalSupply: bigint, lockToTokenRatio: bigint): void {
  if (lockToTokenRatio <= 0n) throw invalidInput("invalid_lock_ratio", String(lockToTokenRatio));
  if (totalSupply / lockToTokenRatio > BigInt(U32_MAX)) {
    throw overflow(
      "supply_exceeds_lock_ceiling",
      `${totalSupply} / ${lockToTokenRatio} > ${U32_MAX}`,
    );
  }
}
