import { describe, it, expect, beforeEach } from "vitest";
import { VAULT_ACCOUNT } from "../src/contracts/types.js";
import { deployTestProtocol, fund, OWNER, StubReceiver, SUPPLY, type TestProtocol } from "./helpers/protocol.js";
import { thrownCode } from "./helpers/thrown.js";

let p: TestProtocol;

beforeEach(() => {
  p = deployTestProtocol({ epochPctSchedule: [[2, 50]] });
});

describe("total epoch emissions", () => {
  it("releases the epoch pct of what is left, switching pct on schedule", () => {
    p.clock.advanceEpochs(2);
    p.vault.allocateTotalEmissions();
    expect(p.vault.epochEmissions(1)).toBe(10_000_000n);
    expect(p.vault.epochEmissions(2)).toBe(4_950_000n);
    expect(p.vault.unallocatedTotal).toBe(SUPPLY - 10_000_000n - 4_950_000n);
    expect(p.schedule.epochPct).toBe(50);
    expect(p.schedule.getEpochPctSchedule()).toEqual([]);
  });

  it("shortens the claim lock every lockDecayEpochs", () => {
    p.clock.advanceEpochs(2);
    p.vault.allocateTotalEmissions();
    expect(p.schedule.lockEpochs).toBe(25);
    expect(p.vault.lockEpochs).toBe(25);
    p.clock.advanceEpochs(3);
    p.vault.allocateTotalEmissions();
    expect(p.vault.lockEpochs).toBe(24);
  });

  it("answers the vault only", () => {
    expect(thrownCode(() => p.schedule.getTotalEpochEmissions("alice", 1, 100n))).toBe("only_vault");
    expect(thrownCode(() => p.schedule.getReceiverEpochEmissions("alice", 1, 1, 100n))).toBe("only_vault");
  });
});

describe("receiver epoch emissions", () => {
  it("splits the epoch total by the previous epoch's votes", () => {
    p.vault.registerReceiver(OWNER, "pool", new StubReceiver(), 2);
    fund(p, "alice", 1000);
    p.locker.lock("alice", "alice", 100, 10);
    p.voter.registerAccountWeightAndVote("alice", "alice", 0, [
      { receiverId: 1, points: 7500 },
      { receiverId: 2, points: 2500 },
    ]);
    p.clock.advanceEpochs(1);
    expect(p.schedule.getReceiverEpochEmissions(VAULT_ACCOUNT, 1, 1, 1000n)).toBe(750n);
    expect(p.schedule.getReceiverEpochEmissions(VAULT_ACCOUNT, 2, 1, 1000n)).toBe(250n);
  });
});

describe("configuration", () => {
  it("takes strictly ascending future epochs", () => {
    p.schedule.setEpochPctSchedule(OWNER, [
      [3, 80],
      [6, 40],
    ]);
    expect(p.schedule.getEpochPctSchedule()).toEqual([
      [3, 80],
      [6, 40],
    ]);
    expect(thrownCode(() => p.schedule.setEpochPctSchedule(OWNER, [[0, 80]]))).toBe("invalid_pct_schedule");
    expect(
      thrownCode(() =>
        p.schedule.setEpochPctSchedule(OWNER, [
          [6, 40],
          [3, 80],
        ]),
      ),
    ).toBe("invalid_pct_schedule");
    expect(thrownCode(() => p.schedule.setEpochPctSchedule(OWNER, [[4, 10_001]]))).toBe("invalid_epoch_pct");
    expect(thrownCode(() => p.schedule.setEpochPctSchedule("alice", [[4, 1]]))).toBe("only_owner");
  });

  it("sets the lock parameters for the owner only", () => {
    p.schedule.setLockParameters(OWNER, 4, 1);
    expect(p.schedule.lockEpochs).toBe(4);
    expect(p.schedule.lockDecayEpochs).toBe(1);
    expect(thrownCode(() => p.schedule.setLockParameters("alice", 4, 1))).toBe("only_owner");
    expect(thrownCode(() => p.schedule.setLockParameters(OWNER, 53, 1))).toBe("invalid_lock_epochs");
    expect(thrownCode(() => p.schedule.setLockParameters(OWNER, 4, 0))).toBe("invalid_lock_decay_epochs");
  });
});
