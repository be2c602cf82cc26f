/**
 * Token lock accounting.
 *
 * Accounts lock governance tokens for 1–52 epochs to earn decaying lock
 * weight (amount × epochs remaining). Each account owns a decay ledger and
 * the locker keeps one more for the total. An account's locked balance is
 * its ledger's decay rate; buckets that mature while the ledger catches up
 * roll into `unlocked`.
 *
 * Frozen accounts hold a single non-decaying position weighted as a
 * full-length lock. Balances are in lock units; one lock unit moves
 * `lockToTokenRatio` raw tokens.
 */

import {
  assertStorageLayout,
  assertSupplyFitsLocks,
  DecayLedger,
  emptyDecayLedger,
  invalidInput,
  invariant,
  MAX_LOCK_EPOCHS,
  planPenaltyWithdrawal,
  positiveU32,
  precondition,
  u32,
  type DecayLedgerState,
  type LockBucket,
  type PenaltyRequest,
} from "@epochlock/weights";
import type { Rollback, Transactor } from "../runtime/transactor.js";
import {
  CONFIG_EVENT,
  LOCK_CREATED_EVENT,
  LOCK_EXTENDED_EVENT,
  LOCK_FROZEN_EVENT,
  LOCK_UNFROZEN_EVENT,
  LOCK_WITHDRAWN_EVENT,
} from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import type { CoreOwner } from "./core-owner.js";
import type { GovToken } from "./gov-token.js";
import { LOCKER_ACCOUNT, type Account, type ActiveLock, type LockVoteHooks } from "./types.js";

export interface TokenLockerOptions {
  lockToTokenRatio: bigint;
  penaltyWithdrawalsEnabled: boolean;
}

export interface LockSpec {
  amount: number;
  epochs: number;
}

export interface ExtendSpec {
  amount: number;
  epochs: number;
  newEpochs: number;
}

export interface AccountBalances {
  locked: number;
  unlocked: number;
  frozen: number;
  isFrozen: boolean;
}

export interface AccountActiveLocks {
  /** Longest remaining first. Empty when frozen. */
  locks: ActiveLock[];
  frozen: number;
}

export interface PenaltyWithdrawal {
  withdrawn: bigint;
  penalty: bigint;
}

interface AccountLockState {
  unlocked: number;
  frozen: number;
  isFrozen: boolean;
  ledger: DecayLedgerState;
}

interface TokenLockerState {
  accounts: Map<Account, AccountLockState>;
  total: DecayLedgerState;
  penaltyWithdrawalsEnabled: boolean;
}

interface AccountHandle {
  data: AccountLockState;
  ledger: DecayLedger;
}

export class TokenLocker {
  readonly account: Account = LOCKER_ACCOUNT;
  readonly lockToTokenRatio: bigint;
  private readonly state: TokenLockerState;
  private voter: LockVoteHooks | null = null;

  constructor(
    private readonly core: CoreOwner,
    private readonly token: GovToken,
    options: TokenLockerOptions,
    private readonly tx: Transactor,
    private readonly events: EventLog,
  ) {
    assertStorageLayout();
    assertSupplyFitsLocks(token.totalSupply, options.lockToTokenRatio);
    this.lockToTokenRatio = options.lockToTokenRatio;
    this.state = {
      accounts: new Map(),
      total: emptyDecayLedger(core.getEpoch()),
      penaltyWithdrawalsEnabled: options.penaltyWithdrawalsEnabled,
    };
  }

  /** Incentive voting and the locker reference each other; wire once at deployment. */
  connectVoter(voter: LockVoteHooks): void {
    if (this.voter) throw precondition("voter_already_connected");
    this.voter = voter;
  }

  get penaltyWithdrawalsEnabled(): boolean {
    return this.state.penaltyWithdrawalsEnabled;
  }

  // ── Lock creation ────────────────────────────────────────────────

  /**
   * Lock `amount` lock units for `epochs` epochs on behalf of `account`,
   * paid from `caller`'s token balance. Returns the epochs actually used.
   */
  lock(caller: Account, account: Account, amount: number, epochs: number): number {
    return this.tx.run(() => {
      positiveU32(amount, "invalid_amount");
      this.checkEpochs(epochs);
      this.token.transferToLocker(this.account, caller, BigInt(amount) * this.lockToTokenRatio);
      return this.createLock(account, amount, epochs);
    });
  }

  lockMany(caller: Account, account: Account, locks: readonly LockSpec[]): void {
    this.tx.run(() => {
      if (locks.length === 0) throw invalidInput("empty_lock_list");
      let sum = 0;
      for (const { amount, epochs } of locks) {
        positiveU32(amount, "invalid_amount");
        this.checkEpochs(epochs);
        sum += amount;
      }
      if (this.state.accounts.get(account)?.isFrozen) throw precondition("lock_frozen", account);
      this.token.transferToLocker(this.account, caller, BigInt(sum) * this.lockToTokenRatio);
      for (const { amount, epochs } of locks) this.createLock(account, amount, epochs);
    });
  }

  private createLock(account: Account, amount: number, epochs: number): number {
    const epoch = this.core.getEpoch();
    const { data, ledger } = this.accountWrite(account, epoch);
    const total = this.totalWrite(epoch);

    let effective: number;
    if (data.isFrozen) {
      effective = MAX_LOCK_EPOCHS;
      data.frozen = u32(data.frozen + amount, "frozen");
      ledger.adjustWeight(epoch, amount * MAX_LOCK_EPOCHS);
      total.adjustWeight(epoch, amount * MAX_LOCK_EPOCHS);
    } else {
      effective = this.promote(epochs);
      ledger.addContribution(epoch, amount, effective);
      total.addContribution(epoch, amount, effective);
    }

    this.events.append(LOCK_CREATED_EVENT, {
      account,
      amount,
      epochs: effective,
      frozen: data.isFrozen,
    });
    return effective;
  }

  /** A one-epoch lock made in the second half of an epoch runs for two. */
  private promote(epochs: number): number {
    return epochs === 1 && this.core.epochClock.inSecondHalf() ? 2 : epochs;
  }

  // ── Extension ────────────────────────────────────────────────────

  extendLock(account: Account, amount: number, epochs: number, newEpochs: number): void {
    this.extendMany(account, [{ amount, epochs, newEpochs }]);
  }

  extendMany(account: Account, extensions: readonly ExtendSpec[]): void {
    this.tx.run(() => {
      if (extensions.length === 0) throw invalidInput("empty_lock_list");
      for (const { amount, epochs, newEpochs } of extensions) {
        positiveU32(amount, "invalid_amount");
        this.checkEpochs(epochs);
        this.checkEpochs(newEpochs);
        if (newEpochs <= epochs) throw invalidInput("new_epochs_not_longer", `${epochs} → ${newEpochs}`);
      }

      const epoch = this.core.getEpoch();
      const { data, ledger } = this.accountWrite(account, epoch);
      if (data.isFrozen) throw precondition("lock_frozen", account);
      const total = this.totalWrite(epoch);

      for (const { amount, epochs, newEpochs } of extensions) {
        if (ledger.unlocks.amountAt(epoch + epochs) < amount) {
          throw precondition("insufficient_lock_amount", `epochs=${epochs}`);
        }
        ledger.extendContribution(epoch, amount, epochs, newEpochs);
        total.extendContribution(epoch, amount, epochs, newEpochs);
        this.events.append(LOCK_EXTENDED_EVENT, { account, amount, epochs, new_epochs: newEpochs });
      }
    });
  }

  // ── Freeze / unfreeze ────────────────────────────────────────────

  freeze(account: Account): void {
    this.tx.run(() => {
      const epoch = this.core.getEpoch();
      const { data, ledger } = this.accountWrite(account, epoch);
      const total = this.totalWrite(epoch);
      if (data.isFrozen) throw precondition("lock_frozen", account);

      const locked = ledger.decayRate;
      data.isFrozen = true;
      if (locked > 0) {
        for (const unlock of [...ledger.unlocks.ascending(epoch + 1, epoch + MAX_LOCK_EPOCHS)]) {
          ledger.removeContribution(epoch, unlock.amount, unlock.epoch - epoch);
          total.removeContribution(epoch, unlock.amount, unlock.epoch - epoch);
        }
        if (ledger.decayRate !== 0) throw invariant("freeze_left_decay", `${account} rate=${ledger.decayRate}`);
        data.frozen = u32(data.frozen + locked, "frozen");
        ledger.adjustWeight(epoch, locked * MAX_LOCK_EPOCHS);
        total.adjustWeight(epoch, locked * MAX_LOCK_EPOCHS);
      }
      this.events.append(LOCK_FROZEN_EVENT, { account, amount: locked });
    });
  }

  /**
   * Turn the frozen position back into one full-length lock. Incentive voting
   * migrates the account's registration first; with `keepVote` the current
   * vote is re-applied on the decaying basis, otherwise it is cleared.
   */
  unfreeze(account: Account, keepVote: boolean): void {
    this.tx.run(() => {
      const epoch = this.core.getEpoch();
      const { data, ledger } = this.accountWrite(account, epoch);
      const total = this.totalWrite(epoch);
      if (!data.isFrozen) throw precondition("lock_not_frozen", account);

      this.requireVoter().unfreeze(this.account, account, keepVote);

      const frozen = data.frozen;
      if (frozen > 0) {
        ledger.adjustWeight(epoch, -frozen * MAX_LOCK_EPOCHS);
        total.adjustWeight(epoch, -frozen * MAX_LOCK_EPOCHS);
        ledger.addContribution(epoch, frozen, MAX_LOCK_EPOCHS);
        total.addContribution(epoch, frozen, MAX_LOCK_EPOCHS);
      }
      data.frozen = 0;
      data.isFrozen = false;
      this.events.append(LOCK_UNFROZEN_EVENT, { account, amount: frozen, keep_vote: keepVote });
    });
  }

  // ── Withdrawals ──────────────────────────────────────────────────

  /**
   * Withdraw the unlocked balance, or with `relockEpochs > 0` lock it again
   * for that many epochs. Returns the lock units moved.
   */
  withdrawExpiredLocks(account: Account, relockEpochs: number): number {
    return this.tx.run(() => {
      if (relockEpochs !== 0) this.checkEpochs(relockEpochs);
      const epoch = this.core.getEpoch();
      const { data } = this.accountWrite(account, epoch);
      this.totalWrite(epoch);

      const unlocked = data.unlocked;
      if (unlocked === 0) throw precondition("no_unlocked_tokens", account);
      data.unlocked = 0;

      if (relockEpochs > 0) {
        this.createLock(account, unlocked, relockEpochs);
      } else {
        this.token.transfer(this.account, account, BigInt(unlocked) * this.lockToTokenRatio);
        this.events.append(LOCK_WITHDRAWN_EVENT, {
          account,
          amount: String(BigInt(unlocked) * this.lockToTokenRatio),
          penalty: "0",
        });
      }
      return unlocked;
    });
  }

  /**
   * Early exit. Unlocked tokens go first, then buckets soonest-maturing
   * first at a penalty linear in their remaining epochs. `"max"` withdraws
   * whatever is reachable. Any reduction of locks clears the account's
   * registered vote weight.
   */
  withdrawWithPenalty(account: Account, request: PenaltyRequest): PenaltyWithdrawal {
    return this.tx.run(() => {
      if (!this.state.penaltyWithdrawalsEnabled) throw precondition("penalty_withdrawals_disabled");
      const epoch = this.core.getEpoch();
      const { data, ledger } = this.accountWrite(account, epoch);
      const total = this.totalWrite(epoch);
      if (data.isFrozen) throw precondition("lock_frozen", account);

      const plan = planPenaltyWithdrawal(
        request,
        data.unlocked,
        activeBuckets(ledger, epoch),
        this.lockToTokenRatio,
      );
      if (plan.shortfall > 0n) {
        throw precondition("insufficient_balance_after_fees", `short by ${plan.shortfall}`);
      }
      if (plan.withdrawn === 0n) throw precondition("nothing_to_withdraw", account);

      data.unlocked -= plan.unlockedUsed;
      for (const reduction of plan.reductions) {
        ledger.removeContribution(epoch, reduction.amount, reduction.epochsToUnlock);
        total.removeContribution(epoch, reduction.amount, reduction.epochsToUnlock);
      }
      if (plan.reductions.length > 0) {
        this.requireVoter().clearRegisteredWeight(this.account, account);
      }

      this.token.transfer(this.account, account, plan.withdrawn);
      if (plan.penalty > 0n) this.token.transfer(this.account, this.core.feeReceiver, plan.penalty);

      this.events.append(LOCK_WITHDRAWN_EVENT, {
        account,
        amount: String(plan.withdrawn),
        penalty: String(plan.penalty),
      });
      return { withdrawn: plan.withdrawn, penalty: plan.penalty };
    });
  }

  /** Projection of withdrawWithPenalty at the current epoch, no state change. */
  getWithdrawWithPenaltyAmounts(
    account: Account,
    request: PenaltyRequest,
  ): PenaltyWithdrawal & { shortfall: bigint } {
    const data = this.state.accounts.get(account);
    if (!data || data.isFrozen) return { withdrawn: 0n, penalty: 0n, shortfall: 0n };
    const epoch = this.core.getEpoch();
    const { unlocked } = this.getAccountBalances(account);
    const ledger = new DecayLedger(data.ledger);
    const plan = planPenaltyWithdrawal(request, unlocked, activeBuckets(ledger, epoch), this.lockToTokenRatio);
    return { withdrawn: plan.withdrawn, penalty: plan.penalty, shortfall: plan.shortfall };
  }

  setPenaltyWithdrawalsEnabled(caller: Account, enabled: boolean): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      const previous = this.state.penaltyWithdrawalsEnabled;
      this.tx.touch(this, "penalty_withdrawals", () => () => {
        this.state.penaltyWithdrawalsEnabled = previous;
      });
      this.state.penaltyWithdrawalsEnabled = enabled;
      this.events.append(CONFIG_EVENT, { key: "penalty_withdrawals_enabled", value: enabled });
    });
  }

  // ── Views ────────────────────────────────────────────────────────

  getAccountBalances(account: Account): AccountBalances {
    const data = this.state.accounts.get(account);
    if (!data) return { locked: 0, unlocked: 0, frozen: 0, isFrozen: false };
    const ledger = new DecayLedger(data.ledger);
    const locked = ledger.peekAt(this.core.getEpoch()).decayRate;
    return {
      locked,
      unlocked: data.unlocked + (ledger.decayRate - locked),
      frozen: data.frozen,
      isFrozen: data.isFrozen,
    };
  }

  /** Active buckets with at least `minEpochs` to go (and at least one). */
  getAccountActiveLocks(account: Account, minEpochs = 0): AccountActiveLocks {
    const data = this.state.accounts.get(account);
    if (!data) return { locks: [], frozen: 0 };
    if (data.isFrozen) return { locks: [], frozen: data.frozen };
    const epoch = this.core.getEpoch();
    const ledger = new DecayLedger(data.ledger);
    const locks = [
      ...ledger.unlocks.descending(epoch + MAX_LOCK_EPOCHS, epoch + Math.max(minEpochs, 1)),
    ].map((u) => ({ amount: u.amount, epochsToUnlock: u.epoch - epoch }));
    return { locks, frozen: 0 };
  }

  getAccountWeight(account: Account): number {
    return this.getAccountWeightAt(account, this.core.getEpoch());
  }

  getAccountWeightAt(account: Account, epoch: number): number {
    if (epoch > this.core.getEpoch()) return 0;
    const data = this.state.accounts.get(account);
    if (!data) return 0;
    return new DecayLedger(data.ledger).peekWeightAt(epoch);
  }

  getTotalWeight(): number {
    return this.getTotalWeightAt(this.core.getEpoch());
  }

  getTotalWeightAt(epoch: number): number {
    if (epoch > this.core.getEpoch()) return 0;
    return new DecayLedger(this.state.total).peekWeightAt(epoch);
  }

  // ── Write-through views ──────────────────────────────────────────

  getAccountWeightWrite(account: Account): number {
    return this.tx.run(() => {
      if (!this.state.accounts.has(account)) return 0;
      const epoch = this.core.getEpoch();
      return this.accountWrite(account, epoch).ledger.storedWeightAt(epoch);
    });
  }

  getTotalWeightWrite(): number {
    return this.tx.run(() => {
      const epoch = this.core.getEpoch();
      return this.totalWrite(epoch).storedWeightAt(epoch);
    });
  }

  // ── Internals ────────────────────────────────────────────────────

  private accountWrite(account: Account, epoch: number): AccountHandle {
    this.tx.touch(this, `account:${account}`, () => this.saveAccount(account));
    let data = this.state.accounts.get(account);
    if (!data) {
      data = { unlocked: 0, frozen: 0, isFrozen: false, ledger: emptyDecayLedger(epoch) };
      this.state.accounts.set(account, data);
    }
    const ledger = new DecayLedger(data.ledger, `account:${account}`);
    const lockedBefore = ledger.decayRate;
    ledger.materializeTo(epoch);
    const matured = lockedBefore - ledger.decayRate;
    if (matured > 0) data.unlocked = u32(data.unlocked + matured, "unlocked");
    return { data, ledger };
  }

  private totalWrite(epoch: number): DecayLedger {
    const ledger = new DecayLedger(this.state.total, "total");
    this.tx.touch(this, "total", () => ledger.savePoint());
    ledger.materializeTo(epoch);
    return ledger;
  }

  private saveAccount(account: Account): Rollback {
    const accounts = this.state.accounts;
    const data = accounts.get(account);
    if (!data) return () => accounts.delete(account);
    const { unlocked, frozen, isFrozen } = data;
    const restoreLedger = new DecayLedger(data.ledger).savePoint();
    return () => {
      restoreLedger();
      accounts.set(account, Object.assign(data, { unlocked, frozen, isFrozen }));
    };
  }

  private checkEpochs(epochs: number): void {
    if (!Number.isInteger(epochs) || epochs < 1 || epochs > MAX_LOCK_EPOCHS) {
      throw invalidInput("invalid_lock_epochs", String(epochs));
    }
  }

  private requireVoter(): LockVoteHooks {
    if (!this.voter) throw invariant("voter_not_connected");
    return this.voter;
  }
}

function activeBuckets(ledger: DecayLedger, epoch: number): LockBucket[] {
  return [...ledger.unlocks.ascending(epoch + 1, epoch + MAX_LOCK_EPOCHS)].map((u) => ({
    epochsToUnlock: u.epoch - epoch,
    amount: u.amount,
  }));
}
