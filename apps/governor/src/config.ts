/**
 * Governor configuration.
 * All environment access lives here; deployProtocol() takes the same values
 * as a typed options object.
 */

import {
  DEFAULT_BOOST_GRACE_EPOCHS,
  DEFAULT_DECAY_BOOST_PCT,
  DEFAULT_EPOCH_LENGTH_SECS,
  DEFAULT_LOCK_TO_TOKEN_RATIO,
  DEFAULT_MAX_BOOST_MULTIPLIER,
  DEFAULT_MAX_BOOSTABLE_PCT,
  DEFAULT_START_OFFSET_SECS,
} from "@epochlock/weights";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

/** "13:90,26:80" → [[13, 90], [26, 80]] */
function parseSchedule(raw: string): Array<[number, number]> {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((entry): [number, number] => {
      const [epoch, pct] = entry.split(":").map((n) => parseInt(n, 10));
      if (epoch === undefined || pct === undefined || Number.isNaN(epoch) || Number.isNaN(pct)) {
        throw new Error(`Invalid EPOCH_PCT_SCHEDULE entry: ${entry}`);
      }
      return [epoch, pct];
    });
}

export const config = {
  port: parseInt(env("GOVERNOR_PORT", "3200"), 10),
  host: env("GOVERNOR_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Pretty-print logs through pino-pretty. Default: false. */
  logPretty: env("LOG_PRETTY", "false") === "true",

  epochLengthSecs: parseInt(env("EPOCH_LENGTH_SECS", String(DEFAULT_EPOCH_LENGTH_SECS)), 10),
  startOffsetSecs: parseInt(env("START_OFFSET_SECS", String(DEFAULT_START_OFFSET_SECS)), 10),

  owner: env("OWNER", "admin"),
  feeReceiver: env("FEE_RECEIVER", "fee-receiver"),
  ownershipTransferDelaySecs: parseInt(env("OWNERSHIP_TRANSFER_DELAY_SECS", String(86_400 * 7)), 10),

  lockToTokenRatio: BigInt(env("LOCK_TO_TOKEN_RATIO", String(DEFAULT_LOCK_TO_TOKEN_RATIO))),
  tokenTotalSupply: BigInt(env("TOKEN_TOTAL_SUPPLY", String(100_000_000n * 10n ** 18n))),
  penaltyWithdrawalsEnabled: env("PENALTY_WITHDRAWAL_ENABLED", "true") === "true",

  /** Emissions are locked for this many epochs on claim. */
  initialLockEpochs: parseInt(env("INITIAL_LOCK_EPOCHS", "26"), 10),
  /** Each time this many epochs pass, the lock-on-claim duration drops by one. */
  lockEpochsDecayRate: parseInt(env("LOCK_EPOCHS_DECAY_RATE", "2"), 10),
  /** Comma-separated raw token amounts emitted in the first epochs. */
  fixedInitialAmounts: env("FIXED_INITIAL_AMOUNTS", `${10n ** 24n},${10n ** 24n}`)
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => BigInt(s)),
  /** Per-epoch share of the unallocated supply, MAX_PCT units (100 = 1%). */
  initialEpochPct: parseInt(env("INITIAL_EPOCH_PCT", "100"), 10),
  epochPctSchedule: parseSchedule(env("EPOCH_PCT_SCHEDULE", "13:90,26:80,39:70,52:50")),

  boostGraceEpochs: parseInt(env("BOOST_GRACE_EPOCHS", String(DEFAULT_BOOST_GRACE_EPOCHS)), 10),
  maxBoostMultiplier: parseInt(env("MAX_BOOST_MULTIPLIER", String(DEFAULT_MAX_BOOST_MULTIPLIER)), 10),
  maxBoostablePct: parseInt(env("MAX_BOOSTABLE_PCT", String(DEFAULT_MAX_BOOSTABLE_PCT)), 10),
  decayBoostPct: parseInt(env("DECAY_BOOST_PCT", String(DEFAULT_DECAY_BOOST_PCT)), 10),

  /** Epoch keeper check interval (ms). 0 = disabled. Default: 60000. */
  epochKeeperIntervalMs: parseInt(env("EPOCH_KEEPER_INTERVAL_MS", "60000"), 10),
} as const;
