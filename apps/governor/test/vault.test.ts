/**
 * Vault — epoch emissions, receiver allocations, boosted claims, boost
 * delegation and third-party callbacks.
 *
 * Fixed initial amounts of 1_000_000 for epochs 1–3 keep the numbers
 * readable. alice and bob each lock 100 units for 10 epochs at epoch 0, so
 * from epoch 2 on each holds half of the previous epoch's lock weight:
 * full boost up to 500_000 claimed, decaying to the floor at 1_000_000.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { LOCKER_ACCOUNT } from "../src/contracts/types.js";
import { deployTestProtocol, fund, OWNER, StubReceiver, SUPPLY, type TestProtocol } from "./helpers/protocol.js";
import { thrownCode } from "./helpers/thrown.js";

const FIXED = 1_000_000n;

let p: TestProtocol;
let pool: StubReceiver;

beforeEach(() => {
  p = deployTestProtocol({ fixedInitialAmounts: [FIXED, FIXED, FIXED] });
  pool = new StubReceiver();
  p.vault.registerReceiver(OWNER, "pool", pool);
  fund(p, "alice", 1000);
  fund(p, "bob", 1000);
  p.locker.lock("alice", "alice", 100, 10);
  p.locker.lock("bob", "bob", 100, 10);
  p.voter.registerAccountWeightAndVote("alice", "alice", 0, [{ receiverId: 1, points: 10_000 }]);
  p.voter.registerAccountWeightAndVote("bob", "bob", 0, [{ receiverId: 1, points: 10_000 }]);
});

describe("deployment", () => {
  it("reserves the fixed initial amounts", () => {
    expect(pool.ids).toEqual([1]);
    expect(p.vault.epochEmissions(1)).toBe(FIXED);
    expect(p.vault.epochEmissions(3)).toBe(FIXED);
    expect(p.vault.totalUpdateEpoch).toBe(3);
    expect(p.vault.unallocatedTotal).toBe(SUPPLY - 3n * FIXED - 20_000n);
    expect(p.vault.lockEpochs).toBe(26);
  });
});

describe("allocateNewEmissions", () => {
  it("allocates the receiver's vote share of every elapsed epoch", () => {
    p.clock.advanceEpochs(2);
    expect(p.vault.allocateNewEmissions("pool", 1)).toBe(2n * FIXED);
    expect(p.vault.allocated("pool")).toBe(2n * FIXED);
    expect(p.vault.allocateNewEmissions("pool", 1)).toBe(0n);
  });

  it("only answers the registered receiver", () => {
    p.clock.advanceEpochs(1);
    expect(thrownCode(() => p.vault.allocateNewEmissions("mallory", 1))).toBe("receiver_not_registered");
    expect(thrownCode(() => p.vault.allocateNewEmissions("pool", 9))).toBe("unknown_receiver");
  });

  it("returns an inactive receiver's share to the unallocated supply", () => {
    p.vault.setReceiverIsActive(OWNER, 1, false);
    const before = p.vault.unallocatedTotal;
    p.clock.advanceEpochs(2);
    expect(p.vault.allocateNewEmissions("pool", 1)).toBe(0n);
    expect(p.vault.unallocatedTotal).toBe(before + 2n * FIXED);
  });

  it("caps a receiver at its max emission pct", () => {
    p.vault.setReceiverMaxEmissionPct(OWNER, 1, 2500);
    const before = p.vault.unallocatedTotal;
    p.clock.advanceEpochs(2);
    expect(p.vault.allocateNewEmissions("pool", 1)).toBe(500_000n);
    expect(p.vault.unallocatedTotal).toBe(before + 1_500_000n);
  });

  it("rejects a registration the receiver refuses", () => {
    const refusing = new StubReceiver();
    refusing.accept = false;
    expect(thrownCode(() => p.vault.registerReceiver(OWNER, "pool-b", refusing))).toBe(
      "receiver_rejected_registration",
    );
    expect(p.voter.receiverCount).toBe(1);
    expect(p.vault.getReceiver(2)).toBeUndefined();
  });
});

describe("allocateTotalEmissions", () => {
  it("releases a share of the unallocated supply once the fixed amounts run out", () => {
    const start = p.vault.unallocatedTotal;
    p.clock.advanceEpochs(4);
    p.vault.allocateTotalEmissions();
    expect(p.vault.epochEmissions(4)).toBe(start / 100n);
    expect(p.vault.unallocatedTotal).toBe(start - start / 100n);
    expect(p.vault.lockEpochs).toBe(25);
  });

  it("applies scheduled pct changes when their epoch arrives", () => {
    p.schedule.setEpochPctSchedule(OWNER, [[5, 50]]);
    const start = p.vault.unallocatedTotal;
    p.clock.advanceEpochs(5);
    p.vault.allocateTotalEmissions();
    const e4 = start / 100n;
    const e5 = ((start - e4) * 50n) / 10_000n;
    expect(p.vault.epochEmissions(5)).toBe(e5);
    expect(p.schedule.epochPct).toBe(50);
    expect(p.vault.unallocatedTotal).toBe(start - e4 - e5);
  });
});

describe("batchClaimRewards", () => {
  it("locks a grace-period claim in full for the current lock duration", () => {
    p.clock.advanceEpochs(1);
    p.vault.allocateNewEmissions("pool", 1);
    pool.pending.set("alice", 5005n);

    expect(p.vault.batchClaimRewards("alice", "alice", null, [1], 0)).toBe(5005n);
    expect(p.vault.allocated("pool")).toBe(FIXED - 5005n);
    expect(p.vault.pendingReward("alice")).toBe(5n);
    expect(p.locker.getAccountActiveLocks("alice").locks).toEqual([
      { amount: 500, epochsToUnlock: 26 },
      { amount: 100, epochsToUnlock: 9 },
    ]);
    expect(p.vault.accountEpochEarned("alice", 1)).toBe(5005n);
  });

  it("returns the unboosted part of a claim to the unallocated supply", () => {
    p.clock.advanceEpochs(2);
    p.vault.allocateNewEmissions("pool", 1);
    const before = p.vault.unallocatedTotal;
    pool.pending.set("alice", 600_000n);

    expect(p.vault.batchClaimRewards("alice", "alice", null, [1], 0)).toBe(595_000n);
    expect(p.vault.unallocatedTotal).toBe(before + 5_000n);
    expect(p.locker.getAccountBalances("alice").locked).toBe(100 + 59_500);
    expect(p.token.balanceOf(LOCKER_ACCOUNT)).toBe(2000n + 595_000n);
  });

  it("refuses to pay more than the receiver was allocated", () => {
    p.clock.advanceEpochs(1);
    pool.pending.set("alice", 1n);
    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "alice", null, [1], 0))).toBe(
      "insufficient_allocation",
    );
  });
});

describe("transferAllocatedTokens", () => {
  it("pays a claimant straight out of the receiver's allocation", () => {
    p.clock.advanceEpochs(1);
    p.vault.allocateNewEmissions("pool", 1);
    p.vault.transferAllocatedTokens("pool", "alice", "alice", 1000n);
    expect(p.vault.allocated("pool")).toBe(FIXED - 1000n);
    expect(p.locker.getAccountBalances("alice").locked).toBe(200);
    expect(thrownCode(() => p.vault.transferAllocatedTokens("alice", "alice", "alice", 1n))).toBe(
      "insufficient_allocation",
    );
  });
});

describe("claim views", () => {
  it("projects epoch emissions that have not been released yet", () => {
    p.clock.advanceEpochs(3);
    p.vault.allocateNewEmissions("pool", 1);
    p.clock.advanceEpochs(2);
    pool.pending.set("alice", 600_000n);

    // epoch 4 releases 1% of 996_980_000, epoch 5 1% of the rest
    expect(p.vault.totalUpdateEpoch).toBe(3);
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", null, 1)).toEqual({
      adjustedAmount: 600_000n,
      feeToDelegate: 0n,
    });
    expect(p.vault.getClaimableWithBoost("alice")).toEqual({
      maxBoosted: 4_935_051n,
      boosted: 9_870_102n,
    });

    expect(p.vault.batchClaimRewards("alice", "alice", null, [1], 0)).toBe(600_000n);
    expect(p.vault.epochEmissions(5)).toBe(9_870_102n);
  });

  it("degrades to zero when the receiver cannot report a reward", () => {
    class BrokenReceiver extends StubReceiver {
      claimableReward(): bigint {
        throw new Error("unavailable");
      }
    }
    p.vault.registerReceiver(OWNER, "broken", new BrokenReceiver());
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", null, 2)).toEqual({
      adjustedAmount: 0n,
      feeToDelegate: 0n,
    });
  });
});

describe("boost delegation", () => {
  beforeEach(() => {
    p.clock.advanceEpochs(2);
    p.vault.allocateNewEmissions("pool", 1);
    pool.pending.set("alice", 600_000n);
  });

  it("claims with the delegate's boost and pays it a fee", () => {
    p.vault.setBoostDelegationParams("bob", true, 1000);
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", "bob", 1)).toEqual({
      adjustedAmount: 595_000n,
      feeToDelegate: 59_500n,
    });

    expect(p.vault.batchClaimRewards("alice", "alice", "bob", [1], 1000)).toBe(535_500n);
    expect(p.vault.pendingReward("bob")).toBe(59_500n);
    expect(p.vault.accountEpochEarned("bob", 2)).toBe(600_000n);
    expect(p.vault.accountEpochEarned("alice", 2)).toBe(0n);

    expect(p.vault.claimBoostDelegationFees("bob", "bob")).toBe(59_500n);
    expect(p.vault.pendingReward("bob")).toBe(0n);
    expect(p.locker.getAccountBalances("bob").locked).toBe(100 + 5_950);
  });

  it("enforces the caller's max fee", () => {
    p.vault.setBoostDelegationParams("bob", true, 1000);
    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "alice", "bob", [1], 500))).toBe(
      "fee_exceeds_max_fee_pct",
    );
  });

  it("rejects a disabled delegate", () => {
    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "alice", "bob", [1], 10_000))).toBe(
      "invalid_delegate",
    );
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", "bob", 1)).toEqual({
      adjustedAmount: 0n,
      feeToDelegate: 0n,
    });
  });

  it("quotes the fee the claim will charge when the callback depends on the claimant", () => {
    const asked: string[] = [];
    p.vault.setBoostDelegationParams("bob", true, "callback", {
      getFeePct: (claimant) => {
        asked.push(claimant);
        return claimant === "alice" ? 1000 : 5000;
      },
    });
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", "bob", 1)).toEqual({
      adjustedAmount: 595_000n,
      feeToDelegate: 59_500n,
    });
    expect(p.vault.batchClaimRewards("alice", "alice", "bob", [1], 5000)).toBe(535_500n);
    expect(p.vault.pendingReward("bob")).toBe(59_500n);
    expect(asked).toEqual(["alice", "alice"]);
  });

  it("asks the delegate's callback for the fee", () => {
    p.vault.setBoostDelegationParams("bob", true, "callback", { getFeePct: () => 2000 });
    expect(p.vault.batchClaimRewards("alice", "alice", "bob", [1], 2000)).toBe(476_000n);
    expect(p.vault.pendingReward("bob")).toBe(119_000n);
  });

  it("degrades the view to zero when the fee callback throws", () => {
    p.vault.setBoostDelegationParams("bob", true, "callback", {
      getFeePct: () => {
        throw new Error("unavailable");
      },
    });
    expect(p.vault.claimableRewardAfterBoost("alice", "alice", "bob", 1)).toEqual({
      adjustedAmount: 0n,
      feeToDelegate: 0n,
    });
    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "alice", "bob", [1], 10_000))).toBe(
      "delegate_fee_rejected",
    );
  });

  it("rolls the whole claim back when the delegate callback refuses", () => {
    p.vault.setBoostDelegationParams("bob", true, 0, { delegateCallback: () => false });
    const events = p.events.count();
    const locked = p.token.balanceOf(LOCKER_ACCOUNT);
    const unallocated = p.vault.unallocatedTotal;

    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "alice", "bob", [1], 0))).toBe(
      "delegate_callback_rejected",
    );
    expect(p.vault.allocated("pool")).toBe(2n * FIXED);
    expect(p.vault.accountEpochEarned("bob", 2)).toBe(0n);
    expect(p.token.balanceOf(LOCKER_ACCOUNT)).toBe(locked);
    expect(p.vault.unallocatedTotal).toBe(unallocated);
    expect(p.vault.pendingReward("alice")).toBe(0n);
    expect(p.locker.getAccountBalances("alice").locked).toBe(100);
    expect(p.events.count()).toBe(events);
  });

  it("hands the delegate callback the settled claim", () => {
    const seen: bigint[] = [];
    p.vault.setBoostDelegationParams("bob", true, 0, {
      delegateCallback: (_claimant, _receiver, amount, adjusted, fee, previous) => {
        seen.push(amount, adjusted, fee, previous);
        return true;
      },
    });
    p.vault.batchClaimRewards("alice", "alice", "bob", [1], 0);
    expect(seen).toEqual([600_000n, 595_000n, 0n, 0n]);
  });
});

describe("claim receiver callbacks", () => {
  beforeEach(() => {
    p.clock.advanceEpochs(1);
    p.vault.allocateNewEmissions("pool", 1);
    pool.pending.set("alice", 1000n);
  });

  it("notifies the receiving account after the payout", () => {
    const calls: Array<[string, string, bigint]> = [];
    p.vault.setClaimReceiverCallback("carol", {
      receiverCallback: (claimant, receiver, adjusted) => {
        calls.push([claimant, receiver, adjusted]);
        return true;
      },
    });
    p.vault.batchClaimRewards("alice", "carol", null, [1], 0);
    expect(calls).toEqual([["alice", "carol", 1000n]]);
    expect(p.locker.getAccountBalances("carol").locked).toBe(100);
  });

  it("treats a throwing callback as a rejection", () => {
    p.vault.setClaimReceiverCallback("carol", {
      receiverCallback: () => {
        throw new Error("nope");
      },
    });
    expect(thrownCode(() => p.vault.batchClaimRewards("alice", "carol", null, [1], 0))).toBe(
      "receiver_callback_rejected",
    );
    expect(p.locker.getAccountBalances("carol").locked).toBe(0);
  });
});

describe("supply management", () => {
  it("takes tokens back into the unallocated supply", () => {
    const before = p.vault.unallocatedTotal;
    p.vault.increaseUnallocatedSupply("alice", 5000n);
    expect(p.vault.unallocatedTotal).toBe(before + 5000n);
    expect(p.token.balanceOf("alice")).toBe(4000n);
  });

  it("pays out of the unallocated supply for the owner only", () => {
    expect(thrownCode(() => p.vault.transferTokens("alice", "alice", 1n))).toBe("only_owner");
    expect(thrownCode(() => p.vault.transferTokens(OWNER, "alice", SUPPLY))).toBe("insufficient_unallocated");
  });
});
