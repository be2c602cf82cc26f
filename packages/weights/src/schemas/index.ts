/**
 * Schema barrel export.
 * All V1 wire types used across the protocol.
 */

export { AccountId, LockUnits, LockEpochs, Hex32, TokenAmount } from "./common.js";

export {
  LockRequest,
  LockManyRequest,
  ExtendLockRequest,
  ExtendManyRequest,
  UnfreezeRequest,
  WithdrawExpiredRequest,
  WithdrawPenaltyRequest,
} from "./lock.js";

export {
  VoteV1,
  RegisterWeightRequest,
  VoteRequest,
  ClearVoteRequest,
} from "./vote.js";

export { EventV1, EventQuery } from "./event.js";
