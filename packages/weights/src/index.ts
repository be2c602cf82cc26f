/**
 * @epochlock/weights — Frozen protocol primitives.
 *
 * Pure accounting machinery shared by every stateful component: bounded
 * integers, the epoch clock, the decay ledger and its unlock schedule,
 * boost and penalty math, canonical encoding and wire schemas.
 * No I/O, no component state. The governor imports from here, never the reverse.
 */

// Errors + bounded integers
export {
  ProtocolError,
  isProtocolError,
  invalidInput,
  unauthorized,
  precondition,
  callbackRejected,
  overflow,
  invariant,
  type ProtocolErrorKind,
} from "./errors.js";
export {
  u16,
  u32,
  u40,
  u128,
  epochIndex,
  positiveU32,
  assertStorageLayout,
  assertSupplyFitsLocks,
} from "./bounded.js";

// Epoch utilities
export {
  systemClock,
  computeStartTime,
  epochFromTimestamp,
  epochStart,
  epochEnd,
  isSecondHalfOfEpoch,
  EpochClock,
  type Clock,
} from "./epoch.js";

// Decay accounting
export { hasBit, setBit, clearBit, nextSetBit, prevSetBit, type BitfieldWords } from "./bitfield.js";
export {
  UnlockSchedule,
  emptyUnlockSchedule,
  type UnlockScheduleState,
  type ScheduledUnlock,
} from "./unlock-schedule.js";
export {
  DecayLedger,
  emptyDecayLedger,
  type DecayLedgerState,
  type LedgerPoint,
} from "./decay-ledger.js";

// Boost + penalty math
export {
  validateBoostParams,
  lockWeightPct,
  boostBounds,
  boostedAmount,
  claimableWithBoost,
  type BoostParams,
  type BoostBounds,
  type ClaimableWithBoost,
} from "./boost.js";
export {
  penaltyOnLock,
  planPenaltyWithdrawal,
  type PenaltyRequest,
  type LockBucket,
  type PenaltyPlan,
} from "./penalty.js";

// Canonical encoding + hashing
export { canonicalize, canonicalEncode, canonicalDecode } from "./canonical.js";
export { hashBytes, digestOf, ZERO_DIGEST, type HexDigest } from "./hash.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
