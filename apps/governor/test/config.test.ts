import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const KEYS = [
  "EPOCH_LENGTH_SECS",
  "START_OFFSET_SECS",
  "LOCK_TO_TOKEN_RATIO",
  "BOOST_GRACE_EPOCHS",
  "MAX_BOOST_MULTIPLIER",
  "MAX_BOOSTABLE_PCT",
  "DECAY_BOOST_PCT",
];

describe("config", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    vi.resetModules();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    saved.clear();
  });

  it("falls back to the deployment defaults", async () => {
    const { config } = await import("../src/config.js");
    expect(config.epochLengthSecs).toBe(604_800);
    expect(config.startOffsetSecs).toBe(302_400);
    expect(config.lockToTokenRatio).toBe(10n ** 18n);
    expect(config.boostGraceEpochs).toBe(2);
    expect(config.maxBoostMultiplier).toBe(2);
    expect(config.maxBoostablePct).toBe(100);
    expect(config.decayBoostPct).toBe(100);
  });

  it("reads overrides from the environment", async () => {
    process.env.START_OFFSET_SECS = "345600";
    process.env.MAX_BOOST_MULTIPLIER = "3";
    const { config } = await import("../src/config.js");
    expect(config.startOffsetSecs).toBe(345_600);
    expect(config.maxBoostMultiplier).toBe(3);
  });
});
