/**
 * Incentive vote request bodies.
 * `account` defaults to the caller; naming another account requires the
 * caller to be its approved delegate.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_LOCK_EPOCHS, MAX_PCT } from "../constants.js";
import { AccountId } from "./common.js";

export const VoteV1 = Type.Object(
  {
    receiver_id: Type.Integer({ minimum: 1 }),
    points: Type.Integer({ minimum: 1, maximum: MAX_PCT }),
  },
  { additionalProperties: false },
);

export type VoteV1 = Static<typeof VoteV1>;

export const RegisterWeightRequest = Type.Object(
  {
    account: Type.Optional(AccountId),
    min_epochs: Type.Integer({ minimum: 0, maximum: MAX_LOCK_EPOCHS }),
    /** When present, replaces the current vote after registering. */
    votes: Type.Optional(Type.Array(VoteV1, { maxItems: MAX_PCT })),
  },
  { additionalProperties: false },
);

export type RegisterWeightRequest = Static<typeof RegisterWeightRequest>;

export const VoteRequest = Type.Object(
  {
    account: Type.Optional(AccountId),
    votes: Type.Array(VoteV1, { maxItems: MAX_PCT }),
    clear_previous: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type VoteRequest = Static<typeof VoteRequest>;

export const ClearVoteRequest = Type.Object(
  {
    account: Type.Optional(AccountId),
  },
  { additionalProperties: false },
);

export type ClearVoteRequest = Static<typeof ClearVoteRequest>;
