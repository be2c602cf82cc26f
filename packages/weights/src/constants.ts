/**
 * Frozen protocol constants.
 *
 * FROZEN constants never change. Storage widths are part of the protocol:
 * every ledger value is checked against them on write (see bounded.ts).
 */

// ── Epoch horizon ──────────────────────────────────────────────────
/** Epochs are valid in [0, MAX_EPOCHS). Past this the protocol stops working. */
export const MAX_EPOCHS = 65_535;
/** One bit per epoch in an unlock bitfield. */
export const BITFIELD_WIDTH = 65_536;
export const BITFIELD_WORD_BITS = 32;

// ── Locks ──────────────────────────────────────────────────────────
export const MAX_LOCK_EPOCHS = 52;

// ── Votes ──────────────────────────────────────────────────────────
/** 10_000 points = 100%. */
export const MAX_PCT = 10_000;

// ── Storage widths ─────────────────────────────────────────────────
export const U16_MAX = 2 ** 16 - 1;
export const U32_MAX = 2 ** 32 - 1;
export const U40_MAX = 2 ** 40 - 1;
export const U128_MAX = 2n ** 128n - 1n;

// ── Fixed-point scales ─────────────────────────────────────────────
/** Lock-weight share used by the boost calculator (1e9 = 100%). */
export const BOOST_PCT_PRECISION = 1_000_000_000n;
/** Receiver vote share handed to the emission schedule (1e18 = 100%). */
export const VOTE_PCT_PRECISION = 10n ** 18n;

// ── Defaults (tunable at deployment) ───────────────────────────────
export const DEFAULT_EPOCH_LENGTH_SECS = 86_400 * 7;
/** 3.5 days: with one-week epochs a new epoch starts Sunday 12:00 UTC. */
export const DEFAULT_START_OFFSET_SECS = 86_400 * 3.5;
export const DEFAULT_LOCK_TO_TOKEN_RATIO = 10n ** 18n;
export const DEFAULT_BOOST_GRACE_EPOCHS = 2;
export const DEFAULT_MAX_BOOST_MULTIPLIER = 2;
export const DEFAULT_MAX_BOOSTABLE_PCT = 100;
export const DEFAULT_DECAY_BOOST_PCT = 100;
