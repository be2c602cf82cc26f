/**
 * Emission schedule — how much of the unallocated supply each epoch
 * releases, how it splits across receivers, and how long claims stay locked.
 */

import {
  invalidInput,
  MAX_LOCK_EPOCHS,
  MAX_PCT,
  unauthorized,
  VOTE_PCT_PRECISION,
} from "@epochlock/weights";
import type { Journaled, Rollback, Transactor } from "../runtime/transactor.js";
import { CONFIG_EVENT } from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import type { CoreOwner } from "./core-owner.js";
import type { IncentiveVoting } from "./incentive-voting.js";
import type { Account } from "./types.js";

/** [epoch, pct in MAX_PCT units] */
export type PctScheduleEntry = readonly [number, number];

export interface EmissionScheduleOptions {
  initialEpochPct: number;
  schedule: readonly PctScheduleEntry[];
  lockEpochs: number;
  lockDecayEpochs: number;
}

export interface EpochEmissions {
  amount: bigint;
  lockEpochs: number;
}

interface EmissionScheduleState {
  epochPct: number;
  /** Ascending by epoch; the head is the next change. */
  schedule: Array<[number, number]>;
  lockEpochs: number;
  lockDecayEpochs: number;
}

export class EmissionSchedule implements Journaled {
  private state: EmissionScheduleState;

  constructor(
    private readonly core: CoreOwner,
    private readonly voter: IncentiveVoting,
    private readonly vault: Account,
    options: EmissionScheduleOptions,
    private readonly tx: Transactor,
    private readonly events: EventLog,
  ) {
    checkPct(options.initialEpochPct);
    checkLockParameters(options.lockEpochs, options.lockDecayEpochs);
    this.state = {
      epochPct: options.initialEpochPct,
      schedule: validSchedule(options.schedule, core.getEpoch()),
      lockEpochs: options.lockEpochs,
      lockDecayEpochs: options.lockDecayEpochs,
    };
    tx.enlist(this);
  }

  checkpoint(): Rollback {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  get epochPct(): number {
    return this.state.epochPct;
  }

  get lockEpochs(): number {
    return this.state.lockEpochs;
  }

  get lockDecayEpochs(): number {
    return this.state.lockDecayEpochs;
  }

  getEpochPctSchedule(): Array<[number, number]> {
    return this.state.schedule.map(([e, p]): [number, number] => [e, p]);
  }

  /**
   * Vault only, once per epoch in ascending order. Steps the lock duration
   * and the scheduled pct, then releases `unallocated × pct / MAX_PCT`.
   */
  getTotalEpochEmissions(caller: Account, epoch: number, unallocated: bigint): EpochEmissions {
    return this.tx.run(() => {
      if (caller !== this.vault) throw unauthorized("only_vault", caller);

      let lock = this.state.lockEpochs;
      if (lock > 0 && epoch % this.state.lockDecayEpochs === 0) {
        lock -= 1;
        this.state.lockEpochs = lock;
      }

      const next = this.state.schedule[0];
      if (next && next[0] === epoch) {
        this.state.schedule.shift();
        this.state.epochPct = next[1];
      }

      return { amount: (unallocated * BigInt(this.state.epochPct)) / BigInt(MAX_PCT), lockEpochs: lock };
    });
  }

  /**
   * What getTotalEpochEmissions would release for `toEpoch` if the vault
   * allocated every epoch from `fromEpoch` on, starting with `unallocated`.
   * Nothing is persisted.
   */
  previewTotalEpochEmissions(fromEpoch: number, toEpoch: number, unallocated: bigint): EpochEmissions {
    let { epochPct: pct, lockEpochs: lock } = this.state;
    let next = 0;
    let released: EpochEmissions = { amount: 0n, lockEpochs: lock };
    for (let epoch = fromEpoch; epoch <= toEpoch; epoch++) {
      if (lock > 0 && epoch % this.state.lockDecayEpochs === 0) lock -= 1;
      const entry = this.state.schedule[next];
      if (entry && entry[0] === epoch) {
        pct = entry[1];
        next++;
      }
      released = { amount: (unallocated * BigInt(pct)) / BigInt(MAX_PCT), lockEpochs: lock };
      unallocated -= released.amount;
    }
    return released;
  }

  getReceiverEpochEmissions(
    caller: Account,
    id: number,
    epoch: number,
    totalEpochEmissions: bigint,
  ): bigint {
    if (caller !== this.vault) throw unauthorized("only_vault", caller);
    const pct = this.voter.getReceiverVotePct(id, epoch);
    return (totalEpochEmissions * pct) / VOTE_PCT_PRECISION;
  }

  setEpochPctSchedule(caller: Account, schedule: readonly PctScheduleEntry[]): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      this.state.schedule = validSchedule(schedule, this.core.getEpoch());
      this.events.append(CONFIG_EVENT, {
        key: "epoch_pct_schedule",
        value: schedule.map(([e, p]) => [e, p]),
      });
    });
  }

  setLockParameters(caller: Account, lockEpochs: number, lockDecayEpochs: number): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      checkLockParameters(lockEpochs, lockDecayEpochs);
      this.state.lockEpochs = lockEpochs;
      this.state.lockDecayEpochs = lockDecayEpochs;
      this.events.append(CONFIG_EVENT, {
        key: "lock_parameters",
        value: { lock_epochs: lockEpochs, lock_decay_epochs: lockDecayEpochs },
      });
    });
  }
}

function checkPct(pct: number): void {
  if (!Number.isInteger(pct) || pct < 0 || pct > MAX_PCT) throw invalidInput("invalid_epoch_pct", String(pct));
}

function checkLockParameters(lockEpochs: number, lockDecayEpochs: number): void {
  if (!Number.isInteger(lockEpochs) || lockEpochs < 0 || lockEpochs > MAX_LOCK_EPOCHS) {
    throw invalidInput("invalid_lock_epochs", String(lockEpochs));
  }
  if (!Number.isInteger(lockDecayEpochs) || lockDecayEpochs < 1) {
    throw invalidInput("invalid_lock_decay_epochs", String(lockDecayEpochs));
  }
}

/** Strictly ascending epochs, all in the future. */
function validSchedule(schedule: readonly PctScheduleEntry[], currentEpoch: number): Array<[number, number]> {
  let last = currentEpoch;
  return schedule.map(([epoch, pct]): [number, number] => {
    if (!Number.isInteger(epoch) || epoch <= last) {
      throw invalidInput("invalid_pct_schedule", `epoch ${epoch} after ${last}`);
    }
    checkPct(pct);
    last = epoch;
    return [epoch, pct];
  });
}
