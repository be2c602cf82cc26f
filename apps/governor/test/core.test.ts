import { describe, it, expect, beforeEach } from "vitest";
import { VAULT_ACCOUNT } from "../src/contracts/types.js";
import { DEPLOYED_AT, START_TIME, WEEK } from "./helpers/clock.js";
import { deployTestProtocol, OWNER, SUPPLY, type TestProtocol } from "./helpers/protocol.js";
import { thrownCode } from "./helpers/thrown.js";

let p: TestProtocol;

beforeEach(() => {
  p = deployTestProtocol();
});

describe("CoreOwner", () => {
  it("starts epoch 0 at the offset boundary before deployment", () => {
    expect(p.core.startTime).toBe(START_TIME);
    expect(p.core.getEpoch()).toBe(0);
    expect(p.core.epochClock.inSecondHalf()).toBe(false);
    p.clock.toSecondHalf();
    expect(p.core.epochClock.inSecondHalf()).toBe(true);
    p.clock.set(START_TIME + 3 * WEEK);
    expect(p.core.getEpoch()).toBe(3);
  });

  it("transfers ownership only after the delay", () => {
    p.core.commitTransferOwnership(OWNER, "heir");
    expect(p.core.pendingOwner).toBe("heir");
    expect(p.core.ownershipTransferDeadline).toBe(DEPLOYED_AT + 86_400);

    expect(thrownCode(() => p.core.acceptTransferOwnership("mallory"))).toBe("only_pending_owner");
    p.clock.advance(86_399);
    expect(thrownCode(() => p.core.acceptTransferOwnership("heir"))).toBe("transfer_delay_not_passed");
    p.clock.advance(1);
    p.core.acceptTransferOwnership("heir");

    expect(p.core.owner).toBe("heir");
    expect(p.core.pendingOwner).toBeNull();
    expect(thrownCode(() => p.core.setFeeReceiver(OWNER, "elsewhere"))).toBe("only_owner");
  });

  it("lets the owner revoke a pending transfer", () => {
    p.core.commitTransferOwnership(OWNER, "heir");
    p.core.revokeTransferOwnership(OWNER);
    p.clock.advance(86_400);
    expect(thrownCode(() => p.core.acceptTransferOwnership("heir"))).toBe("only_pending_owner");
  });

  it("changes the fee receiver", () => {
    p.core.setFeeReceiver(OWNER, "treasury");
    expect(p.core.feeReceiver).toBe("treasury");
    expect(thrownCode(() => p.core.setFeeReceiver(OWNER, ""))).toBe("invalid_fee_receiver");
    expect(thrownCode(() => p.core.commitTransferOwnership("alice", "alice"))).toBe("only_owner");
  });
});

describe("GovToken", () => {
  it("mints the whole supply to the vault", () => {
    expect(p.token.totalSupply).toBe(SUPPLY);
    expect(p.token.balanceOf(VAULT_ACCOUNT)).toBe(SUPPLY);
  });

  it("grants initial allowances out of the unallocated supply", () => {
    const q = deployTestProtocol({ initialAllowances: [{ receiver: "treasury", amount: 500n }] });
    expect(q.vault.unallocatedTotal).toBe(SUPPLY - 500n);
    expect(q.token.allowance(VAULT_ACCOUNT, "treasury")).toBe(500n);

    q.token.transferFrom("treasury", VAULT_ACCOUNT, "treasury", 200n);
    expect(q.token.balanceOf("treasury")).toBe(200n);
    expect(q.token.allowance(VAULT_ACCOUNT, "treasury")).toBe(300n);
    expect(thrownCode(() => q.token.transferFrom("treasury", VAULT_ACCOUNT, "treasury", 400n))).toBe(
      "insufficient_allowance",
    );
  });

  it("reserves lock deposits for the locker", () => {
    expect(thrownCode(() => p.token.transferToLocker("alice", VAULT_ACCOUNT, 1n))).toBe("only_locker");
    expect(thrownCode(() => p.token.transfer("alice", "bob", 1n))).toBe("insufficient_balance");
  });

  it("rejects fixed amounts beyond the supply", () => {
    expect(thrownCode(() => deployTestProtocol({ fixedInitialAmounts: [SUPPLY, 1n] }))).toBe(
      "initial_amounts_exceed_supply",
    );
  });
});

describe("DelegatedOps", () => {
  it("tracks approvals per account", () => {
    p.delegates.setDelegateApproval("alice", "bob", true);
    expect(p.delegates.isApprovedDelegate("alice", "bob")).toBe(true);
    expect(p.delegates.isApprovedDelegate("bob", "alice")).toBe(false);
    p.delegates.requireCallerOrDelegated("bob", "alice");
    p.delegates.setDelegateApproval("alice", "bob", false);
    expect(thrownCode(() => p.delegates.requireCallerOrDelegated("bob", "alice"))).toBe("delegate_not_approved");
  });
});
