/**
 * Early-exit penalty math.
 *
 * Penalty on a lock bucket is linear in the time left:
 *   penalty = amount × epochsToUnlock / MAX_LOCK_EPOCHS
 * so a bucket at maturity pays nothing and a bucket at full duration pays
 * everything. Withdrawals draw on the unlocked balance first, then on buckets
 * soonest-maturing first. The bucket at MAX_LOCK_EPOCHS is never drawn on.
 *
 * Lock balances are in lock units; everything this module returns as bigint
 * is in raw tokens (lock units × lockToTokenRatio).
 */

import { MAX_LOCK_EPOCHS, U128_MAX } from "./constants.js";
import { invalidInput } from "./errors.js";

/** Withdrawal request in lock units, or the sentinel for "as much as possible". */
export type PenaltyRequest = number | "max";

export interface LockBucket {
  epochsToUnlock: number;
  /** Lock units. */
  amount: number;
}

export interface PenaltyPlan {
  /** Raw tokens paid out to the account. */
  withdrawn: bigint;
  /** Raw tokens paid to the fee receiver. */
  penalty: bigint;
  /** Lock units taken from the unlocked balance. */
  unlockedUsed: number;
  /** Lock units removed from each bucket, soonest first. */
  reductions: LockBucket[];
  /** Sum of reduction × epochsToUnlock, the lock weight given up. */
  decreasedWeight: number;
  /** Raw tokens of the request left unsatisfied (0 for "max"). */
  shortfall: bigint;
}

export function penaltyOnLock(amount: bigint, epochsToUnlock: number): bigint {
  if (epochsToUnlock <= 0) return 0n;
  return (amount * BigInt(Math.min(epochsToUnlock, MAX_LOCK_EPOCHS))) / BigInt(MAX_LOCK_EPOCHS);
}

/**
 * Plan a penalty withdrawal. `buckets` must be the account's active locks;
 * order does not matter. Pure: the caller applies the plan.
 */
export function planPenaltyWithdrawal(
  request: PenaltyRequest,
  unlocked: number,
  buckets: readonly LockBucket[],
  lockToTokenRatio: bigint,
): PenaltyPlan {
  if (request !== "max" && (!Number.isSafeInteger(request) || request <= 0)) {
    throw invalidInput("invalid_withdraw_amount", String(request));
  }
  const ratio = lockToTokenRatio;
  const target = request === "max" ? U128_MAX : BigInt(request) * ratio;
  const unlockedRaw = BigInt(unlocked) * ratio;

  if (unlockedRaw >= target) {
    return {
      withdrawn: target,
      penalty: 0n,
      unlockedUsed: request === "max" ? unlocked : Number(target / ratio),
      reductions: [],
      decreasedWeight: 0,
      shortfall: 0n,
    };
  }

  let remaining = target - unlockedRaw;
  let penaltyTotal = 0n;
  let decreasedWeight = 0;
  const reductions: LockBucket[] = [];
  const ordered = [...buckets]
    .filter((b) => b.amount > 0 && b.epochsToUnlock > 0 && b.epochsToUnlock < MAX_LOCK_EPOCHS)
    .sort((a, b) => a.epochsToUnlock - b.epochsToUnlock);

  for (const bucket of ordered) {
    const w = bucket.epochsToUnlock;
    const lockAmount = BigInt(bucket.amount) * ratio;
    let penaltyOnAmount = penaltyOnLock(lockAmount, w);

    if (lockAmount - penaltyOnAmount > remaining) {
      // Partial bucket: solve (remaining + penalty) × (MAX - w) / MAX = remaining.
      const max = BigInt(MAX_LOCK_EPOCHS);
      penaltyOnAmount = (remaining * max) / (max - BigInt(w)) - remaining;
      const dust = (penaltyOnAmount + remaining) % ratio;
      if (dust > 0n) penaltyOnAmount += ratio - dust;
      penaltyTotal += penaltyOnAmount;
      const reduce = Number((penaltyOnAmount + remaining) / ratio);
      reductions.push({ epochsToUnlock: w, amount: reduce });
      decreasedWeight += reduce * w;
      remaining = 0n;
      break;
    }

    penaltyTotal += penaltyOnAmount;
    reductions.push({ epochsToUnlock: w, amount: bucket.amount });
    decreasedWeight += bucket.amount * w;
    remaining -= lockAmount - penaltyOnAmount;
    if (remaining === 0n) break;
  }

  return {
    withdrawn: target - remaining,
    penalty: penaltyTotal,
    unlockedUsed: unlocked,
    reductions,
    decreasedWeight,
    shortfall: request === "max" ? 0n : remaining,
  };
}
