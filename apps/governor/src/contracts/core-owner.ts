/**
 * Core configuration authority.
 *
 * Single source of truth for ownership, the fee receiver and epoch math.
 * Ownership moves in two steps: the owner commits a successor, who may
 * accept once the transfer delay has passed.
 */

import {
  computeStartTime,
  EpochClock,
  invalidInput,
  precondition,
  systemClock,
  unauthorized,
  type Clock,
} from "@epochlock/weights";
import type { Journaled, Rollback, Transactor } from "../runtime/transactor.js";
import { CONFIG_EVENT } from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import type { Account } from "./types.js";

export interface CoreOwnerOptions {
  owner: Account;
  feeReceiver: Account;
  epochLength: number;
  startOffset: number;
  ownershipTransferDelay: number;
  clock?: Clock;
}

interface CoreOwnerState {
  owner: Account;
  pendingOwner: Account | null;
  ownershipTransferDeadline: number;
  feeReceiver: Account;
}

export class CoreOwner implements Journaled {
  readonly epochClock: EpochClock;
  readonly ownershipTransferDelay: number;
  private state: CoreOwnerState;
  private events: EventLog | null = null;

  constructor(options: CoreOwnerOptions, private readonly tx: Transactor) {
    const clock = options.clock ?? systemClock;
    const startTime = computeStartTime(clock(), options.epochLength, options.startOffset);
    this.epochClock = new EpochClock(startTime, options.epochLength, clock);
    this.ownershipTransferDelay = options.ownershipTransferDelay;
    this.state = {
      owner: options.owner,
      pendingOwner: null,
      ownershipTransferDeadline: 0,
      feeReceiver: options.feeReceiver,
    };
    tx.enlist(this);
  }

  /** The event log needs the clock first, so it is attached after construction. */
  attachEventLog(events: EventLog): void {
    if (this.events) throw precondition("event_log_already_attached");
    this.events = events;
  }

  checkpoint(): Rollback {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  get owner(): Account {
    return this.state.owner;
  }

  get pendingOwner(): Account | null {
    return this.state.pendingOwner;
  }

  get ownershipTransferDeadline(): number {
    return this.state.ownershipTransferDeadline;
  }

  get feeReceiver(): Account {
    return this.state.feeReceiver;
  }

  get startTime(): number {
    return this.epochClock.startTime;
  }

  get epochLength(): number {
    return this.epochClock.epochLength;
  }

  now(): number {
    return this.epochClock.now();
  }

  getEpoch(): number {
    return this.epochClock.currentEpoch();
  }

  requireOwner(caller: Account): void {
    if (caller !== this.state.owner) throw unauthorized("only_owner", caller);
  }

  commitTransferOwnership(caller: Account, newOwner: Account): void {
    this.tx.run(() => {
      this.requireOwner(caller);
      if (newOwner.length === 0) throw invalidInput("invalid_owner");
      this.state.pendingOwner = newOwner;
      this.state.ownershipTransferDeadline = this.now() + this.ownershipTransferDelay;
      this.events?.append(CONFIG_EVENT, {
        key: "pending_owner",
        value: newOwner,
        deadline: this.state.ownershipTransferDeadline,
      });
    });
  }

  acceptTransferOwnership(caller: Account): void {
    this.tx.run(() => {
      if (caller !== this.state.pendingOwner) throw unauthorized("only_pending_owner", caller);
      if (this.now() < this.state.ownershipTransferDeadline) {
        throw precondition("transfer_delay_not_passed", String(this.state.ownershipTransferDeadline));
      }
      this.state.owner = caller;
      this.state.pendingOwner = null;
      this.state.ownershipTransferDeadline = 0;
      this.events?.append(CONFIG_EVENT, { key: "owner", value: caller });
    });
  }

  revokeTransferOwnership(caller: Account): void {
    this.tx.run(() => {
      this.requireOwner(caller);
      this.state.pendingOwner = null;
      this.state.ownershipTransferDeadline = 0;
      this.events?.append(CONFIG_EVENT, { key: "pending_owner", value: null });
    });
  }

  setFeeReceiver(caller: Account, feeReceiver: Account): void {
    this.tx.run(() => {
      this.requireOwner(caller);
      if (feeReceiver.length === 0) throw invalidInput("invalid_fee_receiver");
      this.state.feeReceiver = feeReceiver;
      this.events?.append(CONFIG_EVENT, { key: "fee_receiver", value: feeReceiver });
    });
  }
}
