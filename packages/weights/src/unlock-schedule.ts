/**
 * Unlock schedule — sparse map of absolute epoch → amount unlocking, indexed
 * by an epoch bitfield. A bit is set exactly when the stored amount is > 0.
 */

import { type BitfieldWords, clearBit, nextSetBit, prevSetBit, setBit } from "./bitfield.js";
import { epochIndex, u32 } from "./bounded.js";

export interface UnlockScheduleState {
  amounts: Map<number, number>;
  index: BitfieldWords;
}

export interface ScheduledUnlock {
  epoch: number;
  amount: number;
}

export function emptyUnlockSchedule(): UnlockScheduleState {
  return { amounts: new Map(), index: new Map() };
}

export class UnlockSchedule {
  constructor(private readonly state: UnlockScheduleState) {}

  amountAt(epoch: number): number {
    return this.state.amounts.get(epoch) ?? 0;
  }

  add(epoch: number, amount: number): void {
    epochIndex(epoch, "unlock_epoch");
    if (amount === 0) return;
    const previous = this.amountAt(epoch);
    this.state.amounts.set(epoch, u32(previous + amount, "unlock"));
    if (previous === 0) setBit(this.state.index, epoch);
  }

  subtract(epoch: number, amount: number): void {
    epochIndex(epoch, "unlock_epoch");
    if (amount === 0) return;
    const next = u32(this.amountAt(epoch) - amount, "unlock");
    if (next === 0) {
      this.state.amounts.delete(epoch);
      clearBit(this.state.index, epoch);
    } else {
      this.state.amounts.set(epoch, next);
    }
  }

  /** Scheduled unlocks with from <= epoch <= to, soonest first. */
  *ascending(from: number, to: number): Generator<ScheduledUnlock> {
    let cursor = nextSetBit(this.state.index, from, to);
    while (cursor !== undefined) {
      yield { epoch: cursor, amount: this.amountAt(cursor) };
      cursor = nextSetBit(this.state.index, cursor + 1, to);
    }
  }

  /** Scheduled unlocks with from >= epoch >= downTo, latest first. */
  *descending(from: number, downTo: number): Generator<ScheduledUnlock> {
    let cursor = prevSetBit(this.state.index, from, downTo);
    while (cursor !== undefined) {
      yield { epoch: cursor, amount: this.amountAt(cursor) };
      cursor = cursor === 0 ? undefined : prevSetBit(this.state.index, cursor - 1, downTo);
    }
  }

  /** Sum of amounts unlocking in [from, to]. */
  sum(from: number, to: number): number {
    let total = 0;
    for (const entry of this.ascending(from, to)) total += entry.amount;
    return total;
  }
}
