/**
 * Boost math — how much of an emission claim an account actually receives.
 *
 * With lock-weight share `pct` of the previous epoch and epoch emissions E:
 *   maxBoostable = E × pct × maxBoostablePct / 100   (paid in full)
 *   fullDecay    = maxBoostable + E × pct × decayBoostPct / 100
 * Between the two the payout per unit falls linearly from 1 to 1/M, beyond
 * fullDecay it stays at 1/M (M = max boost multiplier). Claims are measured
 * cumulatively within the epoch, starting at `previousAmount`.
 *
 * For a span [a, b] inside the decay region of width D the payout is the
 * span times the mean of the two end factors:
 *   (b − a) × (2·M·D − (M − 1)·(a + b − 2·maxBoostable)) / (2·M·D)
 */

import { BOOST_PCT_PRECISION } from "./constants.js";
import { invalidInput } from "./errors.js";

export interface BoostParams {
  /** Max boost multiplier M (2 = claims at full boost pay twice the floor). */
  maxBoostMultiplier: bigint;
  /** Percent of the pro-rata share claimable at max boost (100 = 100%). */
  maxBoostablePct: bigint;
  /** Percent of the pro-rata share over which boost decays to the floor. */
  decayBoostPct: bigint;
}

export interface BoostBounds {
  maxBoostable: bigint;
  fullDecay: bigint;
}

export interface ClaimableWithBoost {
  /** Amount still claimable this epoch at max boost. */
  maxBoosted: bigint;
  /** Amount still claimable before boost reaches its floor. */
  boosted: bigint;
}

export function validateBoostParams(params: BoostParams): BoostParams {
  if (params.maxBoostMultiplier < 1n) {
    throw invalidInput("invalid_max_boost_multiplier", String(params.maxBoostMultiplier));
  }
  if (params.maxBoostablePct < 0n || params.decayBoostPct < 0n) {
    throw invalidInput("invalid_boost_pct");
  }
  return params;
}

/** Account share of total lock weight at BOOST_PCT_PRECISION scale. */
export function lockWeightPct(accountWeight: bigint, totalWeight: bigint): bigint {
  if (totalWeight === 0n) return 0n;
  return (BOOST_PCT_PRECISION * accountWeight) / totalWeight;
}

export function boostBounds(
  totalEpochEmissions: bigint,
  pct: bigint,
  params: BoostParams,
): BoostBounds {
  const scale = BOOST_PCT_PRECISION * 100n;
  const maxBoostable = (totalEpochEmissions * pct * params.maxBoostablePct) / scale;
  const fullDecay = maxBoostable + (totalEpochEmissions * pct * params.decayBoostPct) / scale;
  return { maxBoostable, fullDecay };
}

/**
 * Payout for claiming `amount` after `previousAmount` was already claimed
 * this epoch. A zero share always pays the floor, amount / M.
 */
export function boostedAmount(
  amount: bigint,
  previousAmount: bigint,
  totalEpochEmissions: bigint,
  pct: bigint,
  params: BoostParams,
): bigint {
  const m = params.maxBoostMultiplier;
  if (amount === 0n) return 0n;
  if (pct === 0n) return amount / m;

  const { maxBoostable, fullDecay } = boostBounds(totalEpochEmissions, pct, params);
  const total = previousAmount + amount;

  if (total <= maxBoostable) return amount;
  if (previousAmount >= fullDecay) return amount / m;

  let start = previousAmount;
  let fullBoost = 0n;
  if (start < maxBoostable) {
    fullBoost = maxBoostable - start;
    start = maxBoostable;
  }

  let end = total;
  let floorPart = 0n;
  if (end > fullDecay) {
    floorPart = (end - fullDecay) / m;
    end = fullDecay;
  }

  let decayPart = 0n;
  const span = end - start;
  const width = fullDecay - maxBoostable;
  if (span > 0n && width > 0n) {
    const denominator = 2n * m * width;
    decayPart =
      (span * (denominator - (m - 1n) * (start + end - 2n * maxBoostable))) / denominator;
  }

  return fullBoost + decayPart + floorPart;
}

/** Remaining max-boost and decaying-boost headroom for this epoch. */
export function claimableWithBoost(
  previousAmount: bigint,
  totalEpochEmissions: bigint,
  pct: bigint,
  params: BoostParams,
): ClaimableWithBoost {
  const { maxBoostable, fullDecay } = boostBounds(totalEpochEmissions, pct, params);
  return {
    maxBoosted: maxBoostable > previousAmount ? maxBoostable - previousAmount : 0n,
    boosted: fullDecay > previousAmount ? fullDecay - previousAmount : 0n,
  };
}
