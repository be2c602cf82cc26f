/**
 * Event log types — append-only audit notifications.
 *
 * Events are emitted on every weight registration, vote change, lock
 * lifecycle step and emission allocation change. They are not part of
 * protocol state: nothing reads them back to make a decision.
 */

import type { EventV1 } from "@epochlock/weights";

export type { EventV1 };

/** JSON-safe payload value. Token amounts travel as decimal strings. */
export type EventValue =
  | string
  | number
  | boolean
  | null
  | EventValue[]
  | { [key: string]: EventValue };

export type EventPayload = { [key: string]: EventValue };

// ── Event types ────────────────────────────────────────────────────

export const LOCK_CREATED_EVENT = "lock.created.v1" as const;
export const LOCK_EXTENDED_EVENT = "lock.extended.v1" as const;
export const LOCK_FROZEN_EVENT = "lock.frozen.v1" as const;
export const LOCK_UNFROZEN_EVENT = "lock.unfrozen.v1" as const;
export const LOCK_WITHDRAWN_EVENT = "lock.withdrawn.v1" as const;
export const VOTE_WEIGHT_REGISTERED_EVENT = "vote.weight_registered.v1" as const;
export const VOTE_CAST_EVENT = "vote.cast.v1" as const;
export const VOTE_CLEARED_EVENT = "vote.cleared.v1" as const;
export const RECEIVER_REGISTERED_EVENT = "receiver.registered.v1" as const;
export const RECEIVER_STATUS_EVENT = "receiver.status.v1" as const;
export const EMISSION_ALLOCATED_EVENT = "emission.allocated.v1" as const;
export const EMISSION_UNALLOCATED_EVENT = "emission.unallocated.v1" as const;
export const EMISSION_CLAIMED_EVENT = "emission.claimed.v1" as const;
export const BOOST_DELEGATION_EVENT = "boost.delegation.v1" as const;
export const CONFIG_EVENT = "config.v1" as const;

export type EventType =
  | typeof LOCK_CREATED_EVENT
  | typeof LOCK_EXTENDED_EVENT
  | typeof LOCK_FROZEN_EVENT
  | typeof LOCK_UNFROZEN_EVENT
  | typeof LOCK_WITHDRAWN_EVENT
  | typeof VOTE_WEIGHT_REGISTERED_EVENT
  | typeof VOTE_CAST_EVENT
  | typeof VOTE_CLEARED_EVENT
  | typeof RECEIVER_REGISTERED_EVENT
  | typeof RECEIVER_STATUS_EVENT
  | typeof EMISSION_ALLOCATED_EVENT
  | typeof EMISSION_UNALLOCATED_EVENT
  | typeof EMISSION_CLAIMED_EVENT
  | typeof BOOST_DELEGATION_EVENT
  | typeof CONFIG_EVENT;
