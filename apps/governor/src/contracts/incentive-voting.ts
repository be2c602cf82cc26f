/**
 * Incentive vote accounting.
 *
 * Accounts register a snapshot of their active locks (or their frozen
 * weight) and split it across emission receivers in MAX_PCT points. Each
 * receiver and the total carry a decay ledger fed with
 *   floor(lock amount × points / MAX_PCT) decaying until the lock's unlock epoch,
 * so receiver weights fall exactly as the underlying locks mature.
 *
 * Contributions are never patched in place: any change to a registration
 * or a vote removes the old contribution in full and adds the new one.
 * Snapshots store absolute unlock epochs and every add or remove happens
 * at the current epoch, skipping locks that have already matured.
 */

import {
  DecayLedger,
  emptyDecayLedger,
  invalidInput,
  MAX_LOCK_EPOCHS,
  MAX_PCT,
  precondition,
  unauthorized,
  VOTE_PCT_PRECISION,
  type DecayLedgerState,
} from "@epochlock/weights";
import type { Transactor } from "../runtime/transactor.js";
import {
  VOTE_CAST_EVENT,
  VOTE_CLEARED_EVENT,
  VOTE_WEIGHT_REGISTERED_EVENT,
  type EventValue,
} from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import type { CoreOwner } from "./core-owner.js";
import type { DelegatedOps } from "./delegated-ops.js";
import type { TokenLocker } from "./token-locker.js";
import type { Account, ActiveLock, LockVoteHooks, Vote } from "./types.js";

export interface RegisteredLocks {
  frozenWeight: number;
  /** Locks still decaying, longest remaining first. */
  locks: ActiveLock[];
}

interface RegisteredLock {
  amount: number;
  unlockEpoch: number;
}

interface AccountVoteState {
  registeredEpoch: number;
  frozenWeight: number;
  locks: RegisteredLock[];
  votes: Vote[];
  points: number;
}

interface IncentiveVotingState {
  accounts: Map<Account, AccountVoteState>;
  receivers: Map<number, DecayLedgerState>;
  total: DecayLedgerState;
  receiverCount: number;
}

type Direction = 1 | -1;

function votesPayload(votes: readonly Vote[]): EventValue[] {
  return votes.map((v) => ({ receiver_id: v.receiverId, points: v.points }));
}

export class IncentiveVoting implements LockVoteHooks {
  private readonly state: IncentiveVotingState;

  constructor(
    private readonly core: CoreOwner,
    private readonly locker: TokenLocker,
    private readonly delegates: DelegatedOps,
    private readonly vault: Account,
    private readonly tx: Transactor,
    private readonly events: EventLog,
  ) {
    this.state = {
      accounts: new Map(),
      receivers: new Map(),
      total: emptyDecayLedger(core.getEpoch()),
      receiverCount: 0,
    };
  }

  get receiverCount(): number {
    return this.state.receiverCount;
  }

  // ── Registration ─────────────────────────────────────────────────

  /**
   * Snapshot the account's active locks with at least `minEpochs` left, or
   * its frozen balance. An existing vote is carried over onto the new weight.
   */
  registerAccountWeight(caller: Account, account: Account, minEpochs = 0): void {
    this.tx.run(() => {
      this.delegates.requireCallerOrDelegated(caller, account);
      const epoch = this.core.getEpoch();
      this.saveAccount(account);
      const previous = this.state.accounts.get(account);
      const votes = previous?.votes ?? [];
      if (previous && votes.length > 0) this.applyVoteWeights(previous, votes, -1, epoch);

      const { locks, frozen } = this.locker.getAccountActiveLocks(account, minEpochs);
      if (frozen === 0 && locks.length === 0) throw precondition("no_active_locks", account);

      const data: AccountVoteState = {
        registeredEpoch: epoch,
        frozenWeight: frozen * MAX_LOCK_EPOCHS,
        locks: locks.map((l) => ({ amount: l.amount, unlockEpoch: epoch + l.epochsToUnlock })),
        votes,
        points: previous?.points ?? 0,
      };
      this.state.accounts.set(account, data);
      if (votes.length > 0) this.applyVoteWeights(data, votes, 1, epoch);

      this.events.append(VOTE_WEIGHT_REGISTERED_EVENT, {
        account,
        frozen_weight: data.frozenWeight,
        locks: locks.map((l) => ({ amount: l.amount, epochs_to_unlock: l.epochsToUnlock })),
      });
    });
  }

  /** Register, then replace the current vote with `votes`. */
  registerAccountWeightAndVote(
    caller: Account,
    account: Account,
    minEpochs: number,
    votes: readonly Vote[],
  ): void {
    this.tx.run(() => {
      this.registerAccountWeight(caller, account, minEpochs);
      this.vote(caller, account, votes, true);
    });
  }

  // ── Voting ───────────────────────────────────────────────────────

  vote(caller: Account, account: Account, votes: readonly Vote[], clearPrevious: boolean): void {
    this.tx.run(() => {
      this.delegates.requireCallerOrDelegated(caller, account);
      this.saveAccount(account);
      const data = this.state.accounts.get(account);
      if (!data || (data.frozenWeight === 0 && data.locks.length === 0)) {
        throw precondition("no_registered_weight", account);
      }

      let added = 0;
      for (const { receiverId, points } of votes) {
        this.requireReceiver(receiverId);
        if (!Number.isInteger(points) || points < 1 || points > MAX_PCT) {
          throw invalidInput("invalid_vote_points", String(points));
        }
        added += points;
      }
      const base = clearPrevious ? 0 : data.points;
      if (base + added > MAX_PCT) throw invalidInput("exceeded_max_vote_points", String(base + added));

      const epoch = this.core.getEpoch();
      if (clearPrevious) this.clearVoteOf(account, data, epoch);
      this.applyVoteWeights(data, votes, 1, epoch);
      data.votes = [...data.votes, ...votes.map((v) => ({ receiverId: v.receiverId, points: v.points }))];
      data.points += added;

      this.events.append(VOTE_CAST_EVENT, {
        account,
        votes: votesPayload(votes),
        clear_previous: clearPrevious,
        points: data.points,
      });
    });
  }

  /** Remove the account's vote. Returns false if it had none. */
  clearVote(caller: Account, account: Account): boolean {
    return this.tx.run(() => {
      this.delegates.requireCallerOrDelegated(caller, account);
      this.saveAccount(account);
      const data = this.state.accounts.get(account);
      if (!data) return false;
      return this.clearVoteOf(account, data, this.core.getEpoch());
    });
  }

  /**
   * Remove the vote and forget the registered snapshot. The token locker
   * calls this when an early exit shrinks the account's locks.
   */
  clearRegisteredWeight(caller: Account, account: Account): boolean {
    return this.tx.run(() => {
      if (caller !== this.locker.account) this.delegates.requireCallerOrDelegated(caller, account);
      this.saveAccount(account);
      const data = this.state.accounts.get(account);
      if (!data) return false;
      this.clearVoteOf(account, data, this.core.getEpoch());
      this.state.accounts.delete(account);
      return true;
    });
  }

  /**
   * Token locker only. Convert a frozen registration into one full-length
   * lock; `keepVote` re-applies the vote on the new basis, otherwise the
   * vote is dropped.
   */
  unfreeze(caller: Account, account: Account, keepVote: boolean): void {
    this.tx.run(() => {
      if (caller !== this.locker.account) throw unauthorized("only_locker", caller);
      this.saveAccount(account);
      const data = this.state.accounts.get(account);
      if (!data || data.frozenWeight === 0) return;

      const epoch = this.core.getEpoch();
      const votes = data.votes;
      if (votes.length > 0) this.applyVoteWeights(data, votes, -1, epoch);

      data.registeredEpoch = epoch;
      data.locks = [{ amount: data.frozenWeight / MAX_LOCK_EPOCHS, unlockEpoch: epoch + MAX_LOCK_EPOCHS }];
      data.frozenWeight = 0;

      if (votes.length === 0) return;
      if (keepVote) {
        this.applyVoteWeights(data, votes, 1, epoch);
      } else {
        data.votes = [];
        data.points = 0;
        this.events.append(VOTE_CLEARED_EVENT, { account, votes: votesPayload(votes) });
      }
    });
  }

  // ── Receivers ────────────────────────────────────────────────────

  /** Vault only. Ids start at 1. */
  registerNewReceiver(caller: Account): number {
    return this.tx.run(() => {
      if (caller !== this.vault) throw unauthorized("only_vault", caller);
      const count = this.state.receiverCount;
      this.tx.touch(this, "receiver_count", () => () => {
        this.state.receiverCount = count;
      });
      const id = count + 1;
      this.tx.touchEntry(this, "receiver", this.state.receivers, id);
      this.state.receiverCount = id;
      this.state.receivers.set(id, emptyDecayLedger(this.core.getEpoch()));
      return id;
    });
  }

  /**
   * Receiver share of the total vote weight of `epoch - 1`, scaled to 1e18.
   * Materializes both ledgers, so repeated calls for an epoch agree.
   */
  getReceiverVotePct(id: number, epoch: number): bigint {
    return this.tx.run(() => {
      const current = this.core.getEpoch();
      if (!Number.isInteger(epoch) || epoch < 1 || epoch > current) {
        throw invalidInput("invalid_epoch", String(epoch));
      }
      const receiver = this.receiverWrite(id, current);
      const total = this.totalWrite(current);
      const totalWeight = total.storedWeightAt(epoch - 1);
      if (totalWeight === 0) return 0n;
      return (VOTE_PCT_PRECISION * BigInt(receiver.storedWeightAt(epoch - 1))) / BigInt(totalWeight);
    });
  }

  // ── Views ────────────────────────────────────────────────────────

  getAccountRegisteredLocks(account: Account): RegisteredLocks {
    const data = this.state.accounts.get(account);
    if (!data) return { frozenWeight: 0, locks: [] };
    const epoch = this.core.getEpoch();
    const locks = data.locks
      .filter((l) => l.unlockEpoch > epoch)
      .map((l) => ({ amount: l.amount, epochsToUnlock: l.unlockEpoch - epoch }))
      .sort((a, b) => b.epochsToUnlock - a.epochsToUnlock);
    return { frozenWeight: data.frozenWeight, locks };
  }

  getAccountCurrentVotes(account: Account): Vote[] {
    return (this.state.accounts.get(account)?.votes ?? []).map((v) => ({ ...v }));
  }

  getReceiverWeight(id: number): number {
    return this.getReceiverWeightAt(id, this.core.getEpoch());
  }

  getReceiverWeightAt(id: number, epoch: number): number {
    if (epoch > this.core.getEpoch()) return 0;
    return new DecayLedger(this.requireReceiver(id)).peekWeightAt(epoch);
  }

  getTotalWeight(): number {
    return this.getTotalWeightAt(this.core.getEpoch());
  }

  getTotalWeightAt(epoch: number): number {
    if (epoch > this.core.getEpoch()) return 0;
    return new DecayLedger(this.state.total).peekWeightAt(epoch);
  }

  getReceiverWeightWrite(id: number): number {
    return this.tx.run(() => {
      const epoch = this.core.getEpoch();
      return this.receiverWrite(id, epoch).storedWeightAt(epoch);
    });
  }

  getTotalWeightWrite(): number {
    return this.tx.run(() => {
      const epoch = this.core.getEpoch();
      return this.totalWrite(epoch).storedWeightAt(epoch);
    });
  }

  // ── Internals ────────────────────────────────────────────────────

  private clearVoteOf(account: Account, data: AccountVoteState, epoch: number): boolean {
    if (data.votes.length === 0) return false;
    const votes = data.votes;
    this.applyVoteWeights(data, votes, -1, epoch);
    data.votes = [];
    data.points = 0;
    this.events.append(VOTE_CLEARED_EVENT, { account, votes: votesPayload(votes) });
    return true;
  }

  private applyVoteWeights(
    data: AccountVoteState,
    votes: readonly Vote[],
    direction: Direction,
    epoch: number,
  ): void {
    const total = this.totalWrite(epoch);
    for (const { receiverId, points } of votes) {
      const receiver = this.receiverWrite(receiverId, epoch);
      if (data.frozenWeight > 0) {
        const weight = Math.floor((data.frozenWeight * points) / MAX_PCT);
        receiver.adjustWeight(epoch, direction * weight);
        total.adjustWeight(epoch, direction * weight);
        continue;
      }
      for (const lock of data.locks) {
        if (lock.unlockEpoch <= epoch) continue;
        const amount = Math.floor((lock.amount * points) / MAX_PCT);
        const remaining = lock.unlockEpoch - epoch;
        if (direction === 1) {
          receiver.addContribution(epoch, amount, remaining);
          total.addContribution(epoch, amount, remaining);
        } else {
          receiver.removeContribution(epoch, amount, remaining);
          total.removeContribution(epoch, amount, remaining);
        }
      }
    }
  }

  private requireReceiver(id: number): DecayLedgerState {
    const ledger = this.state.receivers.get(id);
    if (!ledger) throw invalidInput("unknown_receiver", String(id));
    return ledger;
  }

  private saveAccount(account: Account): void {
    this.tx.touchEntry(this, "account", this.state.accounts, account, (data) => ({ ...data }));
  }

  private receiverWrite(id: number, epoch: number): DecayLedger {
    const ledger = new DecayLedger(this.requireReceiver(id), `receiver:${id}`);
    this.tx.touch(this, `receiver:${id}`, () => ledger.savePoint());
    ledger.materializeTo(epoch);
    return ledger;
  }

  private totalWrite(epoch: number): DecayLedger {
    const ledger = new DecayLedger(this.state.total, "votes:total");
    this.tx.touch(this, "total", () => ledger.savePoint());
    ledger.materializeTo(epoch);
    return ledger;
  }
}
