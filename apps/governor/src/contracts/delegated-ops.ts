/**
 * Delegated operations — an account may approve delegates to act for it
 * on incentive-voting entry points.
 */

import { unauthorized } from "@epochlock/weights";
import type { Transactor } from "../runtime/transactor.js";
import type { Account } from "./types.js";

interface DelegatedOpsState {
  /** account → approved delegates */
  approvals: Map<Account, Set<Account>>;
}

export class DelegatedOps {
  private readonly state: DelegatedOpsState = { approvals: new Map() };

  constructor(private readonly tx: Transactor) {}

  setDelegateApproval(account: Account, delegate: Account, approved: boolean): void {
    this.tx.run(() => {
      this.tx.touchEntry(this, "approvals", this.state.approvals, account, (set) => new Set(set));
      const delegates = this.state.approvals.get(account) ?? new Set<Account>();
      if (approved) delegates.add(delegate);
      else delegates.delete(delegate);
      if (delegates.size === 0) this.state.approvals.delete(account);
      else this.state.approvals.set(account, delegates);
    });
  }

  isApprovedDelegate(account: Account, delegate: Account): boolean {
    return this.state.approvals.get(account)?.has(delegate) ?? false;
  }

  requireCallerOrDelegated(caller: Account, account: Account): void {
    if (caller === account || this.isApprovedDelegate(account, caller)) return;
    throw unauthorized("delegate_not_approved", `${caller} for ${account}`);
  }
}
