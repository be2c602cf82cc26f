/**
 * Boost calculator — applies an account's share of the previous epoch's
 * lock weight to its emission claims.
 *
 * During the grace window after deployment every claim pays in full.
 * Afterwards the share is read at `epoch - 1`, so it cannot be inflated by
 * locking in the same epoch as the claim.
 */

import {
  boostedAmount,
  claimableWithBoost,
  lockWeightPct,
  validateBoostParams,
  type BoostParams,
  type ClaimableWithBoost,
} from "@epochlock/weights";
import type { Transactor } from "../runtime/transactor.js";
import type { CoreOwner } from "./core-owner.js";
import type { TokenLocker } from "./token-locker.js";
import type { Account } from "./types.js";

export interface BoostCalculatorOptions extends BoostParams {
  /** Epochs after deployment in which claims are not boost-adjusted. */
  graceEpochs: number;
}

interface BoostCacheState {
  /** `${epoch}:${account}` → lock weight pct */
  accountPct: Map<string, bigint>;
  /** epoch → total lock weight, with 0 stored as 1 */
  totalWeight: Map<number, bigint>;
}

export class BoostCalculator {
  readonly params: BoostParams;
  /** First epoch in which boost applies. */
  readonly graceEndEpoch: number;
  private readonly state: BoostCacheState = { accountPct: new Map(), totalWeight: new Map() };

  constructor(
    private readonly core: CoreOwner,
    private readonly locker: TokenLocker,
    options: BoostCalculatorOptions,
    private readonly tx: Transactor,
  ) {
    this.params = validateBoostParams({
      maxBoostMultiplier: options.maxBoostMultiplier,
      maxBoostablePct: options.maxBoostablePct,
      decayBoostPct: options.decayBoostPct,
    });
    this.graceEndEpoch = core.getEpoch() + options.graceEpochs;
  }

  inGracePeriod(): boolean {
    return this.core.getEpoch() < this.graceEndEpoch;
  }

  getBoostedAmount(
    account: Account,
    amount: bigint,
    previousAmount: bigint,
    totalEpochEmissions: bigint,
  ): bigint {
    if (this.inGracePeriod()) return amount;
    const pct = this.viewPct(account, this.core.getEpoch() - 1);
    return boostedAmount(amount, previousAmount, totalEpochEmissions, pct, this.params);
  }

  /** Same result as getBoostedAmount; caches the share it reads. */
  getBoostedAmountWrite(
    account: Account,
    amount: bigint,
    previousAmount: bigint,
    totalEpochEmissions: bigint,
  ): bigint {
    return this.tx.run(() => {
      if (this.inGracePeriod()) return amount;
      const epoch = this.core.getEpoch() - 1;
      const key = `${epoch}:${account}`;
      let pct = this.state.accountPct.get(key);
      if (pct === undefined) {
        let total = this.state.totalWeight.get(epoch);
        if (total === undefined) {
          total = this.totalWeightAt(epoch);
          this.tx.touchEntry(this, "total", this.state.totalWeight, epoch);
          this.state.totalWeight.set(epoch, total);
        }
        pct = lockWeightPct(BigInt(this.locker.getAccountWeightAt(account, epoch)), total);
        this.tx.touchEntry(this, "pct", this.state.accountPct, key);
        this.state.accountPct.set(key, pct);
      }
      return boostedAmount(amount, previousAmount, totalEpochEmissions, pct, this.params);
    });
  }

  getClaimableWithBoost(
    account: Account,
    previousAmount: bigint,
    totalEpochEmissions: bigint,
  ): ClaimableWithBoost {
    if (this.inGracePeriod()) {
      const remaining = totalEpochEmissions > previousAmount ? totalEpochEmissions - previousAmount : 0n;
      return { maxBoosted: remaining, boosted: remaining };
    }
    const pct = this.viewPct(account, this.core.getEpoch() - 1);
    return claimableWithBoost(previousAmount, totalEpochEmissions, pct, this.params);
  }

  private viewPct(account: Account, epoch: number): bigint {
    const cached = this.state.accountPct.get(`${epoch}:${account}`);
    if (cached !== undefined) return cached;
    const total = this.state.totalWeight.get(epoch) ?? this.totalWeightAt(epoch);
    return lockWeightPct(BigInt(this.locker.getAccountWeightAt(account, epoch)), total);
  }

  private totalWeightAt(epoch: number): bigint {
    const total = this.locker.getTotalWeightAt(epoch);
    return total === 0 ? 1n : BigInt(total);
  }
}
