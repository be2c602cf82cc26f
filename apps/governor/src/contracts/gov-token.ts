/**
 * Governance token custody — the fungible ledger the locker and the vault
 * move tokens through. The whole supply is minted to the vault.
 */

import { invalidInput, precondition, u128, unauthorized } from "@epochlock/weights";
import type { Transactor } from "../runtime/transactor.js";
import type { Account } from "./types.js";

interface GovTokenState {
  balances: Map<Account, bigint>;
  /** Keyed by `${owner}\u0000${spender}`. */
  allowances: Map<string, bigint>;
}

function allowanceKey(owner: Account, spender: Account): string {
  return `${owner}\u0000${spender}`;
}

export class GovToken {
  readonly totalSupply: bigint;
  private readonly state: GovTokenState;

  constructor(
    readonly vault: Account,
    readonly locker: Account,
    totalSupply: bigint,
    private readonly tx: Transactor,
  ) {
    this.totalSupply = u128(totalSupply, "totalSupply");
    this.state = { balances: new Map([[vault, totalSupply]]), allowances: new Map() };
  }

  balanceOf(account: Account): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  allowance(owner: Account, spender: Account): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  transfer(from: Account, to: Account, amount: bigint): void {
    this.tx.run(() => this.move(from, to, amount));
  }

  approve(owner: Account, spender: Account, amount: bigint): void {
    this.tx.run(() => {
      if (amount < 0n) throw invalidInput("invalid_amount", String(amount));
      this.setAllowance(owner, spender, u128(amount, "allowance"));
    });
  }

  increaseAllowance(owner: Account, spender: Account, amount: bigint): void {
    this.approve(owner, spender, this.allowance(owner, spender) + amount);
  }

  transferFrom(spender: Account, from: Account, to: Account, amount: bigint): void {
    this.tx.run(() => {
      const allowed = this.allowance(from, spender);
      if (allowed < amount) throw precondition("insufficient_allowance", `${allowed} < ${amount}`);
      this.setAllowance(from, spender, allowed - amount);
      this.move(from, to, amount);
    });
  }

  /** Locker pulls lock deposits without an allowance. */
  transferToLocker(caller: Account, from: Account, amount: bigint): void {
    this.tx.run(() => {
      if (caller !== this.locker) throw unauthorized("only_locker", caller);
      this.move(from, this.locker, amount);
    });
  }

  private move(from: Account, to: Account, amount: bigint): void {
    if (amount < 0n) throw invalidInput("invalid_amount", String(amount));
    const balance = this.balanceOf(from);
    if (balance < amount) throw precondition("insufficient_balance", `${from}: ${balance} < ${amount}`);
    this.tx.touchEntry(this, "balance", this.state.balances, from);
    this.tx.touchEntry(this, "balance", this.state.balances, to);
    this.state.balances.set(from, balance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
  }

  private setAllowance(owner: Account, spender: Account, amount: bigint): void {
    const key = allowanceKey(owner, spender);
    this.tx.touchEntry(this, "allowance", this.state.allowances, key);
    this.state.allowances.set(key, amount);
  }
}
