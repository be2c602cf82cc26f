/**
 * Token lock request bodies.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_LOCK_EPOCHS } from "../constants.js";
import { LockEpochs, LockUnits } from "./common.js";

export const LockRequest = Type.Object(
  {
    amount: LockUnits,
    epochs: LockEpochs,
  },
  { additionalProperties: false },
);

export type LockRequest = Static<typeof LockRequest>;

export const LockManyRequest = Type.Object(
  {
    locks: Type.Array(LockRequest, { minItems: 1, maxItems: MAX_LOCK_EPOCHS }),
  },
  { additionalProperties: false },
);

export type LockManyRequest = Static<typeof LockManyRequest>;

export const ExtendLockRequest = Type.Object(
  {
    amount: LockUnits,
    epochs: LockEpochs,
    new_epochs: LockEpochs,
  },
  { additionalProperties: false },
);

export type ExtendLockRequest = Static<typeof ExtendLockRequest>;

export const ExtendManyRequest = Type.Object(
  {
    locks: Type.Array(ExtendLockRequest, { minItems: 1, maxItems: MAX_LOCK_EPOCHS }),
  },
  { additionalProperties: false },
);

export type ExtendManyRequest = Static<typeof ExtendManyRequest>;

export const UnfreezeRequest = Type.Object(
  {
    keep_vote: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type UnfreezeRequest = Static<typeof UnfreezeRequest>;

/** relock_epochs = 0 withdraws; > 0 relocks the unlocked balance instead. */
export const WithdrawExpiredRequest = Type.Object(
  {
    relock_epochs: Type.Integer({ minimum: 0, maximum: MAX_LOCK_EPOCHS }),
  },
  { additionalProperties: false },
);

export type WithdrawExpiredRequest = Static<typeof WithdrawExpiredRequest>;

export const WithdrawPenaltyRequest = Type.Object(
  {
    amount: Type.Union([LockUnits, Type.Literal("max")]),
  },
  { additionalProperties: false },
);

export type WithdrawPenaltyRequest = Static<typeof WithdrawPenaltyRequest>;
