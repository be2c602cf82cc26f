import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger } from "../src/logger.js";
import { createEpochKeeper, type KeeperResult } from "../src/scheduler.js";
import { START_TIME, WEEK } from "./helpers/clock.js";
import { deployTestProtocol, fund, type TestProtocol } from "./helpers/protocol.js";

const silent = createLogger("silent");

let p: TestProtocol;

beforeEach(() => {
  p = deployTestProtocol();
});

describe("epoch keeper", () => {
  it("processes each epoch once", () => {
    const keeper = createEpochKeeper(p, { logger: silent });
    expect(keeper.lastProcessedEpoch()).toBe(-1);

    const first = keeper.tick();
    expect(first?.epoch).toBe(0);
    expect(first?.epochEmissions).toBe(0n);
    expect(keeper.tick()).toBeNull();
    expect(keeper.lastProcessedEpoch()).toBe(0);
  });

  it("releases the new epoch's emissions and materializes totals", () => {
    fund(p, "alice", 1000);
    p.locker.lock("alice", "alice", 100, 10);
    const keeper = createEpochKeeper(p, { logger: silent });
    keeper.tick();
    p.clock.advanceEpochs(1);

    const result = keeper.tick();
    expect(result).toEqual({
      epoch: 1,
      totalLockWeight: 900,
      totalVoteWeight: 0,
      epochEmissions: 10_000_000n - 100n,
      unallocated: 1_000_000_000n - 10_000n - (10_000_000n - 100n),
    });
    expect(p.vault.totalUpdateEpoch).toBe(1);
  });

  it("reports clock overflow through onError", () => {
    const errors: unknown[] = [];
    const keeper = createEpochKeeper(p, { logger: silent, onError: (err) => errors.push(err) });
    p.clock.set(START_TIME + 65_535 * WEEK);
    expect(keeper.tick()).toBeNull();
    expect(errors).toHaveLength(1);
    expect(keeper.lastProcessedEpoch()).toBe(-1);
  });

  describe("timer", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("ticks immediately and then on every interval until stopped", () => {
      const seen: KeeperResult[] = [];
      const keeper = createEpochKeeper(p, {
        checkIntervalMs: 1000,
        logger: silent,
        onAdvance: (result) => seen.push(result),
      });
      keeper.start();
      expect(seen.map((r) => r.epoch)).toEqual([0]);

      p.clock.advanceEpochs(2);
      vi.advanceTimersByTime(1000);
      expect(seen.map((r) => r.epoch)).toEqual([0, 2]);

      keeper.stop();
      p.clock.advanceEpochs(1);
      vi.advanceTimersByTime(5000);
      expect(seen.map((r) => r.epoch)).toEqual([0, 2]);
    });
  });
});
