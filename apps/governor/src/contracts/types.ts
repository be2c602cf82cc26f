/**
 * Shared component types and the capability interfaces of external,
 * untrusted collaborators.
 */

/** Account identifier. Components hold their own under the `system:` prefix. */
export type Account = string;

export const SYSTEM_PREFIX = "system:";
export const VAULT_ACCOUNT: Account = "system:vault";
export const LOCKER_ACCOUNT: Account = "system:locker";

export function isSystemAccount(account: Account): boolean {
  return account.startsWith(SYSTEM_PREFIX);
}

export interface Vote {
  receiverId: number;
  points: number;
}

export interface ActiveLock {
  /** Lock units. */
  amount: number;
  epochsToUnlock: number;
}

/**
 * A registered emission receiver. Receivers pull their allocation from the
 * vault and account for their own claimants.
 */
export interface EmissionReceiver {
  /** Called once on registration. Returning false rejects the registration. */
  notifyRegisteredId(ids: readonly number[]): boolean;
  /** Pending reward of `account`, view only. */
  claimableReward(account: Account): bigint;
  /**
   * Settle `claimant`'s reward for a vault batch claim and return the amount
   * the vault should pay out of this receiver's allocation.
   */
  vaultClaimReward(claimant: Account): bigint;
}

/**
 * Boost delegate or claim-receiver hook. Supplied by third parties: any
 * method may throw or answer false.
 */
export interface ClaimCallback {
  /** Fee in MAX_PCT units for a delegated claim. */
  getFeePct?(
    claimant: Account,
    receiver: Account,
    amount: bigint,
    previousAmount: bigint,
    totalEpochEmissions: bigint,
  ): number;
  delegateCallback?(
    claimant: Account,
    receiver: Account,
    amount: bigint,
    adjustedAmount: bigint,
    fee: bigint,
    previousAmount: bigint,
    totalEpochEmissions: bigint,
  ): boolean;
  receiverCallback?(claimant: Account, receiver: Account, adjustedAmount: bigint): boolean;
}

/** The slice of incentive voting the token locker calls back into. */
export interface LockVoteHooks {
  clearRegisteredWeight(caller: Account, account: Account): boolean;
  unfreeze(caller: Account, account: Account, keepVote: boolean): void;
}
