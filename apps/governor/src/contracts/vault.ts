/**
 * Vault — holds the unallocated supply and pays out emissions.
 *
 * Each epoch releases a share of the unallocated supply (the emission
 * schedule decides how much). Receivers pull their vote-weighted slice
 * into an allocation, and claims against an allocation are boost-adjusted:
 * the unboosted remainder goes back to the unallocated supply and the
 * payout is locked in the token locker for the current lock duration.
 * Dust below one lock unit waits in the claimant's pending reward.
 *
 * Third-party callbacks (boost delegates, claim receivers) run only after
 * the claim's own state is written. A callback that throws or answers
 * false rejects the whole claim; the same failure on a view yields (0, 0).
 */

import {
  callbackRejected,
  invalidInput,
  isProtocolError,
  MAX_PCT,
  precondition,
  u128,
  unauthorized,
} from "@epochlock/weights";
import type { Transactor } from "../runtime/transactor.js";
import {
  BOOST_DELEGATION_EVENT,
  CONFIG_EVENT,
  EMISSION_ALLOCATED_EVENT,
  EMISSION_CLAIMED_EVENT,
  EMISSION_UNALLOCATED_EVENT,
  RECEIVER_REGISTERED_EVENT,
  RECEIVER_STATUS_EVENT,
} from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import type { BoostCalculator } from "./boost-calculator.js";
import type { CoreOwner } from "./core-owner.js";
import type { EmissionSchedule } from "./emission-schedule.js";
import type { GovToken } from "./gov-token.js";
import type { IncentiveVoting } from "./incentive-voting.js";
import type { TokenLocker } from "./token-locker.js";
import {
  VAULT_ACCOUNT,
  type Account,
  type ClaimCallback,
  type EmissionReceiver,
} from "./types.js";

/** Fixed fee in MAX_PCT units, or ask the delegate's callback per claim. */
export type DelegateFee = number | "callback";

export interface VaultOptions {
  /** Raw token amounts emitted in the epochs right after deployment. */
  fixedInitialAmounts: readonly bigint[];
  /** Spending allowances granted out of the supply at deployment. */
  initialAllowances?: ReadonlyArray<{ receiver: Account; amount: bigint }>;
}

export interface ReceiverInfo {
  account: Account;
  isActive: boolean;
  /** Cap on the receiver's share of an epoch's emissions, MAX_PCT units. */
  maxEmissionPct: number;
  updatedEpoch: number;
}

export interface BoostDelegation {
  isEnabled: boolean;
  feePct: DelegateFee;
}

export interface ClaimQuote {
  adjustedAmount: bigint;
  feeToDelegate: bigint;
}

interface VaultState {
  unallocatedTotal: bigint;
  totalUpdateEpoch: number;
  lockEpochs: number;
  epochEmissions: Map<number, bigint>;
  receivers: Map<number, ReceiverInfo>;
  allocated: Map<Account, bigint>;
  /** `${epoch}:${account}` → amount claimed before boost */
  epochEarned: Map<string, bigint>;
  pendingReward: Map<Account, bigint>;
  delegations: Map<Account, BoostDelegation>;
}

interface VaultHandles {
  /** Receiver objects by id. */
  receivers: Map<number, EmissionReceiver>;
  delegateCallbacks: Map<Account, ClaimCallback>;
  receiverCallbacks: Map<Account, ClaimCallback>;
}

export class Vault {
  readonly account: Account = VAULT_ACCOUNT;
  private readonly state: VaultState;
  private readonly handles: VaultHandles = {
    receivers: new Map(),
    delegateCallbacks: new Map(),
    receiverCallbacks: new Map(),
  };

  constructor(
    private readonly core: CoreOwner,
    private readonly token: GovToken,
    private readonly locker: TokenLocker,
    private readonly voter: IncentiveVoting,
    private readonly schedule: EmissionSchedule,
    private readonly boost: BoostCalculator,
    options: VaultOptions,
    private readonly tx: Transactor,
    private readonly events: EventLog,
  ) {
    const epoch = core.getEpoch();
    const allowances = options.initialAllowances ?? [];
    let reserved = 0n;
    const epochEmissions = new Map<number, bigint>();
    for (const [i, amount] of options.fixedInitialAmounts.entries()) {
      epochEmissions.set(epoch + 1 + i, u128(amount, "fixedInitialAmount"));
      reserved += amount;
    }
    for (const { amount } of allowances) reserved += u128(amount, "allowance");
    if (reserved > token.balanceOf(this.account)) {
      throw invalidInput("initial_amounts_exceed_supply", String(reserved));
    }

    this.state = {
      unallocatedTotal: token.balanceOf(this.account) - reserved,
      totalUpdateEpoch: epoch + options.fixedInitialAmounts.length,
      lockEpochs: schedule.lockEpochs,
      epochEmissions,
      receivers: new Map(),
      allocated: new Map(),
      epochEarned: new Map(),
      pendingReward: new Map(),
      delegations: new Map(),
    };
    for (const { receiver, amount } of allowances) token.increaseAllowance(this.account, receiver, amount);
  }

  // ── Views ────────────────────────────────────────────────────────

  get unallocatedTotal(): bigint {
    return this.state.unallocatedTotal;
  }

  get totalUpdateEpoch(): number {
    return this.state.totalUpdateEpoch;
  }

  /** Lock duration applied to claims, as of the last total allocation. */
  get lockEpochs(): number {
    return this.state.lockEpochs;
  }

  epochEmissions(epoch: number): bigint {
    return this.state.epochEmissions.get(epoch) ?? 0n;
  }

  allocated(account: Account): bigint {
    return this.state.allocated.get(account) ?? 0n;
  }

  accountEpochEarned(account: Account, epoch: number): bigint {
    return this.state.epochEarned.get(`${epoch}:${account}`) ?? 0n;
  }

  pendingReward(account: Account): bigint {
    return this.state.pendingReward.get(account) ?? 0n;
  }

  getReceiver(id: number): ReceiverInfo | undefined {
    const info = this.state.receivers.get(id);
    return info ? { ...info } : undefined;
  }

  getBoostDelegation(account: Account): BoostDelegation | undefined {
    const data = this.state.delegations.get(account);
    return data ? { ...data } : undefined;
  }

  // ── Receivers ────────────────────────────────────────────────────

  /**
   * Owner only. Takes `count` fresh ids from incentive voting for one
   * receiver, which must accept them in notifyRegisteredId.
   */
  registerReceiver(
    caller: Account,
    account: Account,
    receiver: EmissionReceiver,
    count = 1,
    maxEmissionPct = MAX_PCT,
  ): number[] {
    return this.tx.run(() => {
      this.core.requireOwner(caller);
      if (!Number.isInteger(count) || count < 1) throw invalidInput("invalid_receiver_count", String(count));
      checkPct(maxEmissionPct, "invalid_max_emission_pct");

      const epoch = this.core.getEpoch();
      const ids: number[] = [];
      for (let i = 0; i < count; i++) {
        const id = this.voter.registerNewReceiver(this.account);
        this.tx.touchEntry(this, "receiver", this.state.receivers, id);
        this.tx.touchEntry(this, "receiver_handle", this.handles.receivers, id);
        this.state.receivers.set(id, { account, isActive: true, maxEmissionPct, updatedEpoch: epoch });
        this.handles.receivers.set(id, receiver);
        ids.push(id);
      }
      this.events.append(RECEIVER_REGISTERED_EVENT, { account, ids, max_emission_pct: maxEmissionPct });

      if (!callReceiver(() => receiver.notifyRegisteredId(ids))) {
        throw callbackRejected("receiver_rejected_registration", account);
      }
      return ids;
    });
  }

  setReceiverIsActive(caller: Account, id: number, isActive: boolean): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      const info = this.receiverWrite(id);
      info.isActive = isActive;
      this.events.append(RECEIVER_STATUS_EVENT, { id, is_active: isActive, max_emission_pct: info.maxEmissionPct });
    });
  }

  setReceiverMaxEmissionPct(caller: Account, id: number, maxEmissionPct: number): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      checkPct(maxEmissionPct, "invalid_max_emission_pct");
      const info = this.receiverWrite(id);
      info.maxEmissionPct = maxEmissionPct;
      this.events.append(RECEIVER_STATUS_EVENT, { id, is_active: info.isActive, max_emission_pct: maxEmissionPct });
    });
  }

  // ── Emissions ────────────────────────────────────────────────────

  /** Release every epoch's total emissions up to the current epoch. */
  allocateTotalEmissions(): void {
    this.tx.run(() => this.allocateTotal(this.core.getEpoch()));
  }

  /**
   * Receiver only. Adds the receiver's vote-weighted share of every epoch
   * since its last update to its allocation and returns the amount.
   */
  allocateNewEmissions(caller: Account, id: number): bigint {
    return this.tx.run(() => {
      const info = this.receiverWrite(id);
      if (info.account !== caller) throw unauthorized("receiver_not_registered", caller);
      const current = this.core.getEpoch();
      if (info.updatedEpoch >= current) return 0n;
      this.allocateTotal(current);

      let amount = 0n;
      let excess = 0n;
      for (let epoch = info.updatedEpoch + 1; epoch <= current; epoch++) {
        const total = this.epochEmissions(epoch);
        const share = this.schedule.getReceiverEpochEmissions(this.account, id, epoch, total);
        const cap = (total * BigInt(info.maxEmissionPct)) / BigInt(MAX_PCT);
        if (share > cap) {
          excess += share - cap;
          amount += cap;
        } else {
          amount += share;
        }
      }
      info.updatedEpoch = current;

      if (!info.isActive) {
        excess += amount;
        amount = 0n;
      }
      if (excess > 0n) this.returnToUnallocated(excess);
      if (amount > 0n) {
        this.tx.touchEntry(this, "allocated", this.state.allocated, caller);
        this.state.allocated.set(caller, this.allocated(caller) + amount);
        this.events.append(EMISSION_ALLOCATED_EVENT, { receiver: caller, id, amount: String(amount) });
      }
      return amount;
    });
  }

  /** Receiver pays out of its allocation on behalf of `claimant`. */
  transferAllocatedTokens(caller: Account, claimant: Account, receiver: Account, amount: bigint): void {
    this.tx.run(() => {
      if (amount <= 0n) return;
      this.spendAllocation(caller, amount);
      this.transferAllocated(MAX_PCT, claimant, receiver, null, amount);
    });
  }

  /**
   * Claim from several receivers in one payout. With a boost delegate the
   * delegate's boost is used and its fee (at most `maxFeePct`) deducted.
   */
  batchClaimRewards(
    caller: Account,
    receiver: Account,
    boostDelegate: Account | null,
    receiverIds: readonly number[],
    maxFeePct: number,
  ): bigint {
    return this.tx.run(() => {
      checkPct(maxFeePct, "invalid_max_fee_pct");
      if (receiverIds.length === 0) throw invalidInput("empty_receiver_list");
      let total = 0n;
      for (const id of new Set(receiverIds)) {
        const info = this.requireReceiver(id);
        const handle = this.requireReceiverHandle(id);
        const amount = runCallback("receiver_claim_failed", () => handle.vaultClaimReward(caller));
        if (amount < 0n) throw callbackRejected("invalid_claim_amount", String(amount));
        this.spendAllocation(info.account, amount);
        total += amount;
      }
      return this.transferAllocated(maxFeePct, caller, receiver, boostDelegate, total);
    });
  }

  /** Any holder may hand tokens back to the unallocated supply. */
  increaseUnallocatedSupply(caller: Account, amount: bigint): void {
    this.tx.run(() => {
      if (amount <= 0n) throw invalidInput("invalid_amount", String(amount));
      this.token.transfer(caller, this.account, amount);
      this.returnToUnallocated(amount);
    });
  }

  /** Owner only. Pays out of the unallocated supply. */
  transferTokens(caller: Account, to: Account, amount: bigint): void {
    this.tx.run(() => {
      this.core.requireOwner(caller);
      if (amount <= 0n) throw invalidInput("invalid_amount", String(amount));
      if (amount > this.state.unallocatedTotal) {
        throw precondition("insufficient_unallocated", `${this.state.unallocatedTotal} < ${amount}`);
      }
      this.saveTotals();
      this.state.unallocatedTotal -= amount;
      this.token.transfer(this.account, to, amount);
      this.events.append(EMISSION_UNALLOCATED_EVENT, {
        delta: String(-amount),
        unallocated: String(this.state.unallocatedTotal),
      });
    });
  }

  /** Pay out accumulated delegate fees; needs at least one lock unit. */
  claimBoostDelegationFees(caller: Account, receiver: Account): bigint {
    return this.tx.run(() => {
      const amount = this.pendingReward(caller);
      if (amount < this.locker.lockToTokenRatio) throw precondition("fees_below_lock_unit", String(amount));
      this.setPendingReward(caller, 0n);
      this.transferOrLock(caller, receiver, amount);
      return amount;
    });
  }

  // ── Boost delegation ─────────────────────────────────────────────

  setBoostDelegationParams(
    caller: Account,
    isEnabled: boolean,
    feePct: DelegateFee = 0,
    callback: ClaimCallback | null = null,
  ): void {
    this.tx.run(() => {
      this.tx.touchEntry(this, "delegation", this.state.delegations, caller);
      this.tx.touchEntry(this, "delegate_callback", this.handles.delegateCallbacks, caller);
      if (isEnabled) {
        if (feePct !== "callback") checkPct(feePct, "invalid_fee_pct");
        if (feePct === "callback" && !callback?.getFeePct) {
          throw invalidInput("fee_callback_required", caller);
        }
        this.state.delegations.set(caller, { isEnabled: true, feePct });
        if (callback) this.handles.delegateCallbacks.set(caller, callback);
        else this.handles.delegateCallbacks.delete(caller);
      } else {
        this.state.delegations.delete(caller);
        this.handles.delegateCallbacks.delete(caller);
      }
      this.events.append(BOOST_DELEGATION_EVENT, {
        account: caller,
        is_enabled: isEnabled,
        fee_pct: isEnabled ? feePct : null,
        has_callback: isEnabled && callback !== null,
      });
    });
  }

  /** Callback invoked with each claim paid to `caller`. */
  setClaimReceiverCallback(caller: Account, callback: ClaimCallback | null): void {
    this.tx.run(() => {
      this.tx.touchEntry(this, "receiver_callback", this.handles.receiverCallbacks, caller);
      if (callback) {
        if (!callback.receiverCallback) throw invalidInput("receiver_callback_required", caller);
        this.handles.receiverCallbacks.set(caller, callback);
      } else {
        this.handles.receiverCallbacks.delete(caller);
      }
      this.events.append(CONFIG_EVENT, { key: "claim_receiver_callback", account: caller, value: callback !== null });
    });
  }

  /**
   * What a batch claim of `receiverId`'s pending reward would pay now.
   * A throwing receiver or any delegate problem degrades to (0, 0).
   */
  claimableRewardAfterBoost(
    account: Account,
    receiver: Account,
    boostDelegate: Account | null,
    receiverId: number,
  ): ClaimQuote {
    const handle = this.requireReceiverHandle(receiverId);
    let amount: bigint;
    try {
      amount = handle.claimableReward(account);
    } catch {
      return nothingClaimable();
    }
    const epoch = this.core.getEpoch();
    const totalEpoch = this.projectedEpochEmissions(epoch);
    const claimant = boostDelegate ?? account;
    const previous = this.accountEpochEarned(claimant, epoch);

    let feePct = 0;
    if (boostDelegate !== null) {
      const data = this.state.delegations.get(boostDelegate);
      if (!data?.isEnabled) return nothingClaimable();
      if (data.feePct === "callback") {
        const getFeePct = this.handles.delegateCallbacks.get(boostDelegate)?.getFeePct;
        if (!getFeePct) return nothingClaimable();
        try {
          feePct = getFeePct(account, receiver, amount, previous, totalEpoch);
        } catch {
          return nothingClaimable();
        }
      } else {
        feePct = data.feePct;
      }
      if (!Number.isInteger(feePct) || feePct < 0 || feePct >= MAX_PCT) return nothingClaimable();
    }

    const adjustedAmount = this.boost.getBoostedAmount(claimant, amount, previous, totalEpoch);
    return { adjustedAmount, feeToDelegate: (adjustedAmount * BigInt(feePct)) / BigInt(MAX_PCT) };
  }

  getClaimableWithBoost(claimant: Account): { maxBoosted: bigint; boosted: bigint } {
    const epoch = this.core.getEpoch();
    return this.boost.getClaimableWithBoost(
      claimant,
      this.accountEpochEarned(claimant, epoch),
      this.projectedEpochEmissions(epoch),
    );
  }

  /** Stored emissions, or what the next total allocation will release. */
  private projectedEpochEmissions(epoch: number): bigint {
    const updated = this.state.totalUpdateEpoch;
    if (epoch <= updated) return this.epochEmissions(epoch);
    return this.schedule.previewTotalEpochEmissions(updated + 1, epoch, this.state.unallocatedTotal).amount;
  }

  // ── Internals ────────────────────────────────────────────────────

  private allocateTotal(current: number): void {
    let epoch = this.state.totalUpdateEpoch;
    if (epoch >= current) return;
    let unallocated = this.state.unallocatedTotal;
    let lock = this.state.lockEpochs;
    while (epoch < current) {
      epoch++;
      const released = this.schedule.getTotalEpochEmissions(this.account, epoch, unallocated);
      this.tx.touchEntry(this, "emissions", this.state.epochEmissions, epoch);
      this.state.epochEmissions.set(epoch, released.amount);
      unallocated -= released.amount;
      lock = released.lockEpochs;
      this.events.append(EMISSION_UNALLOCATED_EVENT, {
        epoch_emissions: String(released.amount),
        delta: String(-released.amount),
        unallocated: String(unallocated),
      });
    }
    this.saveTotals();
    this.state.unallocatedTotal = unallocated;
    this.state.totalUpdateEpoch = current;
    this.state.lockEpochs = lock;
  }

  private transferAllocated(
    maxFeePct: number,
    account: Account,
    receiver: Account,
    boostDelegate: Account | null,
    amount: bigint,
  ): bigint {
    if (amount === 0n) return 0n;
    const epoch = this.core.getEpoch();
    this.allocateTotal(epoch);
    const totalEpoch = this.epochEmissions(epoch);
    const claimant = boostDelegate ?? account;
    const previous = this.accountEpochEarned(claimant, epoch);

    let feePct = 0;
    let delegateCallback: ClaimCallback | undefined;
    if (boostDelegate !== null) {
      const data = this.state.delegations.get(boostDelegate);
      if (!data?.isEnabled) throw precondition("invalid_delegate", boostDelegate);
      delegateCallback = this.handles.delegateCallbacks.get(boostDelegate);
      if (data.feePct === "callback") {
        const getFeePct = delegateCallback?.getFeePct;
        if (!getFeePct) throw callbackRejected("delegate_fee_unavailable", boostDelegate);
        feePct = runCallback("delegate_fee_rejected", () =>
          getFeePct(account, receiver, amount, previous, totalEpoch),
        );
        if (!Number.isInteger(feePct) || feePct < 0 || feePct > MAX_PCT) {
          throw callbackRejected("invalid_delegate_fee", String(feePct));
        }
      } else {
        feePct = data.feePct;
      }
      if (feePct > maxFeePct) throw precondition("fee_exceeds_max_fee_pct", `${feePct} > ${maxFeePct}`);
    }

    let adjusted = this.boost.getBoostedAmountWrite(claimant, amount, previous, totalEpoch);
    if (amount > adjusted) this.returnToUnallocated(amount - adjusted);
    const earnedKey = `${epoch}:${claimant}`;
    this.tx.touchEntry(this, "earned", this.state.epochEarned, earnedKey);
    this.state.epochEarned.set(earnedKey, previous + amount);

    let fee = 0n;
    if (feePct > 0) {
      fee = (adjusted * BigInt(feePct)) / BigInt(MAX_PCT);
      adjusted -= fee;
    }
    const payout = adjusted + this.pendingReward(account);
    this.transferOrLock(account, receiver, payout);
    if (fee > 0n && boostDelegate !== null) {
      this.setPendingReward(boostDelegate, this.pendingReward(boostDelegate) + fee);
    }

    this.events.append(EMISSION_CLAIMED_EVENT, {
      account,
      receiver,
      boost_delegate: boostDelegate,
      amount: String(amount),
      adjusted_amount: String(adjusted),
      fee: String(fee),
      lock_epochs: this.state.lockEpochs,
    });

    const onDelegate = delegateCallback?.delegateCallback;
    if (onDelegate) {
      const ok = runCallback("delegate_callback_rejected", () =>
        onDelegate(account, receiver, amount, adjusted, fee, previous, totalEpoch),
      );
      if (!ok) throw callbackRejected("delegate_callback_rejected", boostDelegate ?? account);
    }
    const onReceive = this.handles.receiverCallbacks.get(receiver)?.receiverCallback;
    if (onReceive) {
      const ok = runCallback("receiver_callback_rejected", () => onReceive(account, receiver, adjusted));
      if (!ok) throw callbackRejected("receiver_callback_rejected", receiver);
    }
    return adjusted;
  }

  /** Lock `amount` for `receiver`, keeping sub-unit dust as `claimant`'s pending reward. */
  private transferOrLock(claimant: Account, receiver: Account, amount: bigint): void {
    const lockEpochs = this.state.lockEpochs;
    if (lockEpochs === 0) {
      this.setPendingReward(claimant, 0n);
      if (amount > 0n) this.token.transfer(this.account, receiver, amount);
      return;
    }
    const ratio = this.locker.lockToTokenRatio;
    const lockAmount = amount / ratio;
    this.setPendingReward(claimant, amount - lockAmount * ratio);
    if (lockAmount > 0n) this.locker.lock(this.account, receiver, Number(lockAmount), lockEpochs);
  }

  private spendAllocation(account: Account, amount: bigint): void {
    const allocated = this.allocated(account);
    if (amount > allocated) throw precondition("insufficient_allocation", `${account}: ${allocated} < ${amount}`);
    this.tx.touchEntry(this, "allocated", this.state.allocated, account);
    this.state.allocated.set(account, allocated - amount);
  }

  private setPendingReward(account: Account, amount: bigint): void {
    this.tx.touchEntry(this, "pending", this.state.pendingReward, account);
    this.state.pendingReward.set(account, amount);
  }

  private saveTotals(): void {
    this.tx.touch(this, "totals", () => {
      const { unallocatedTotal, totalUpdateEpoch, lockEpochs } = this.state;
      return () => {
        Object.assign(this.state, { unallocatedTotal, totalUpdateEpoch, lockEpochs });
      };
    });
  }

  private returnToUnallocated(amount: bigint): void {
    this.saveTotals();
    this.state.unallocatedTotal += amount;
    this.events.append(EMISSION_UNALLOCATED_EVENT, {
      delta: String(amount),
      unallocated: String(this.state.unallocatedTotal),
    });
  }

  private requireReceiver(id: number): ReceiverInfo {
    const info = this.state.receivers.get(id);
    if (!info) throw invalidInput("unknown_receiver", String(id));
    return info;
  }

  private receiverWrite(id: number): ReceiverInfo {
    this.tx.touchEntry(this, "receiver", this.state.receivers, id, (info) => ({ ...info }));
    return this.requireReceiver(id);
  }

  private requireReceiverHandle(id: number): EmissionReceiver {
    const handle = this.handles.receivers.get(id);
    if (!handle) throw invalidInput("unknown_receiver", String(id));
    return handle;
  }
}

function nothingClaimable(): ClaimQuote {
  return { adjustedAmount: 0n, feeToDelegate: 0n };
}

function checkPct(pct: number, code: string): void {
  if (!Number.isInteger(pct) || pct < 0 || pct > MAX_PCT) throw invalidInput(code, String(pct));
}

/** Third-party code: anything it throws becomes a callback rejection. */
function runCallback<T>(code: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (isProtocolError(err)) throw err;
    throw callbackRejected(code, err instanceof Error ? err.message : String(err));
  }
}

function callReceiver(fn: () => boolean): boolean {
  return runCallback("receiver_rejected_registration", fn);
}
