/**
 * Weighted decay ledger — lazily materialized, epoch-decaying weight.
 *
 * One subject (an account, a receiver, or a total) holds:
 *   - weights[e]    materialized weight at each visited epoch e <= updatedEpoch
 *   - decayRate     amount subtracted per epoch after updatedEpoch
 *   - unlocks[e]    amount by which decayRate drops once epoch e is reached
 *
 * A contribution (amount, n) added at epoch E weighs amount × n at E, decays
 * by `amount` per epoch and leaves the rate at E + n. Replay from
 * updatedEpoch to a target is `weight -= rate; rate -= unlocks[step]` per step.
 *
 * Catch up before you mutate: every mutation requires updatedEpoch === epoch
 * and throws otherwise, so no write can rewrite unmaterialized history.
 * History at or below updatedEpoch is never modified again.
 */

import { epochIndex, u32, u40 } from "./bounded.js";
import { MAX_LOCK_EPOCHS } from "./constants.js";
import { invariant } from "./errors.js";
import {
  emptyUnlockSchedule,
  UnlockSchedule,
  type UnlockScheduleState,
} from "./unlock-schedule.js";

export interface DecayLedgerState {
  updatedEpoch: number;
  decayRate: number;
  weights: Map<number, number>;
  unlocks: UnlockScheduleState;
}

export interface LedgerPoint {
  weight: number;
  decayRate: number;
}

export function emptyDecayLedger(epoch = 0): DecayLedgerState {
  return {
    updatedEpoch: epochIndex(epoch),
    decayRate: 0,
    weights: new Map(),
    unlocks: emptyUnlockSchedule(),
  };
}

export class DecayLedger {
  readonly unlocks: UnlockSchedule;

  constructor(
    private readonly state: DecayLedgerState,
    readonly label = "ledger",
  ) {
    this.unlocks = new UnlockSchedule(state.unlocks);
  }

  get updatedEpoch(): number {
    return this.state.updatedEpoch;
  }

  /** Rate valid for epochs after updatedEpoch. */
  get decayRate(): number {
    return this.state.decayRate;
  }

  /** Stored weight; only meaningful for epoch <= updatedEpoch. */
  storedWeightAt(epoch: number): number {
    return this.state.weights.get(epoch) ?? 0;
  }

  /**
   * Read-only projection of weight and rate at `epoch`. Never persists.
   * Rates of epochs before updatedEpoch are not kept and report as 0.
   */
  peekAt(epoch: number): LedgerPoint {
    epochIndex(epoch);
    let updated = this.state.updatedEpoch;
    if (epoch < updated) return { weight: this.storedWeightAt(epoch), decayRate: 0 };
    if (epoch === updated) {
      return { weight: this.storedWeightAt(epoch), decayRate: this.state.decayRate };
    }
    let weight = this.storedWeightAt(updated);
    let rate = this.state.decayRate;
    if (weight === 0) return { weight: 0, decayRate: 0 };
    while (updated < epoch) {
      updated++;
      weight = this.decayed(weight, rate, updated);
      rate = this.steppedRate(rate, updated);
    }
    return { weight, decayRate: rate };
  }

  peekWeightAt(epoch: number): number {
    return this.peekAt(epoch).weight;
  }

  /**
   * Replay forward to `epoch`, persisting each intermediate weight.
   * Targets at or below updatedEpoch return the stored weight untouched.
   */
  materializeTo(epoch: number): number {
    epochIndex(epoch);
    let updated = this.state.updatedEpoch;
    if (epoch <= updated) return this.storedWeightAt(epoch);

    let weight = this.storedWeightAt(updated);
    if (weight === 0) {
      if (this.state.decayRate !== 0) {
        throw invariant("decay_without_weight", `${this.label} rate=${this.state.decayRate}`);
      }
      this.state.updatedEpoch = epoch;
      return 0;
    }

    let rate = this.state.decayRate;
    while (updated < epoch) {
      updated++;
      weight = this.decayed(weight, rate, updated);
      this.writeWeight(updated, weight);
      rate = this.steppedRate(rate, updated);
    }
    this.state.decayRate = rate;
    this.state.updatedEpoch = epoch;
    return weight;
  }

  /** Add `amount` decaying over `epochsRemaining` epochs, starting at `epoch`. */
  addContribution(epoch: number, amount: number, epochsRemaining: number): void {
    this.requireMaterialized(epoch);
    if (amount === 0 || epochsRemaining === 0) return;
    const weight = u40(this.storedWeightAt(epoch) + amount * epochsRemaining, this.label);
    const rate = u32(this.state.decayRate + amount, `${this.label}.decayRate`);
    this.unlocks.add(epoch + epochsRemaining, amount);
    this.writeWeight(epoch, weight);
    this.state.decayRate = rate;
  }

  /** Exact inverse of an earlier addContribution, as seen from `epoch`. */
  removeContribution(epoch: number, amount: number, epochsRemaining: number): void {
    this.requireMaterialized(epoch);
    if (amount === 0 || epochsRemaining === 0) return;
    const weight = u40(this.storedWeightAt(epoch) - amount * epochsRemaining, this.label);
    const rate = u32(this.state.decayRate - amount, `${this.label}.decayRate`);
    this.unlocks.subtract(epoch + epochsRemaining, amount);
    this.writeWeight(epoch, weight);
    this.state.decayRate = rate;
  }

  /**
   * Move `amount` from the bucket maturing in `fromEpochs` to the one maturing
   * in `toEpochs`. The rate is unchanged: the amount stays decaying.
   */
  extendContribution(epoch: number, amount: number, fromEpochs: number, toEpochs: number): void {
    this.requireMaterialized(epoch);
    if (amount === 0) return;
    const weight = u40(this.storedWeightAt(epoch) + amount * (toEpochs - fromEpochs), this.label);
    this.unlocks.subtract(epoch + fromEpochs, amount);
    this.unlocks.add(epoch + toEpochs, amount);
    this.writeWeight(epoch, weight);
  }

  /** Non-decaying weight (frozen locks). `delta` may be negative. */
  adjustWeight(epoch: number, delta: number): void {
    this.requireMaterialized(epoch);
    if (delta === 0) return;
    this.writeWeight(epoch, u40(this.storedWeightAt(epoch) + delta, this.label));
  }

  /**
   * Undo point for every later write through this ledger. Only the head
   * moves: weights below updatedEpoch are fixed and unlocks lie at most
   * MAX_LOCK_EPOCHS past it, so the copy does not grow with history.
   */
  savePoint(): () => void {
    const state = this.state;
    const head = state.updatedEpoch;
    const decayRate = state.decayRate;
    const weight = state.weights.get(head);
    const unlocks = [...this.unlocks.ascending(head + 1, head + MAX_LOCK_EPOCHS)];
    return () => {
      const reached = state.updatedEpoch;
      for (let epoch = head + 1; epoch <= reached; epoch++) state.weights.delete(epoch);
      if (weight === undefined) state.weights.delete(head);
      else state.weights.set(head, weight);
      for (const unlock of [...this.unlocks.ascending(head + 1, reached + MAX_LOCK_EPOCHS)]) {
        this.unlocks.subtract(unlock.epoch, unlock.amount);
      }
      for (const unlock of unlocks) this.unlocks.add(unlock.epoch, unlock.amount);
      state.updatedEpoch = head;
      state.decayRate = decayRate;
    };
  }

  private requireMaterialized(epoch: number): void {
    if (this.state.updatedEpoch !== epoch) {
      throw invariant(
        "ledger_not_materialized",
        `${this.label} updated=${this.state.updatedEpoch} epoch=${epoch}`,
      );
    }
  }

  private decayed(weight: number, rate: number, epoch: number): number {
    if (rate > weight) {
      throw invariant("weight_underflow", `${this.label} epoch=${epoch}`);
    }
    return weight - rate;
  }

  private steppedRate(rate: number, epoch: number): number {
    const unlock = this.unlocks.amountAt(epoch);
    if (unlock > rate) {
      throw invariant("decay_rate_underflow", `${this.label} epoch=${epoch}`);
    }
    return rate - unlock;
  }

  private writeWeight(epoch: number, weight: number): void {
    if (weight === 0) this.state.weights.delete(epoch);
    else this.state.weights.set(epoch, weight);
  }
}
