/**
 * Incentive vote routes. Bodies may name another `account`; the caller
 * must then be one of its approved delegates.
 *
 * POST /votes/register          — snapshot active locks (optionally vote)
 * POST /votes                   — add to or replace the current vote
 * POST /votes/clear             — drop the vote, keep the registration
 * POST /votes/clear-registered  — drop the vote and the registration
 * POST /delegates               — approve or revoke a delegate
 * GET  /accounts/:account/votes
 * GET  /receivers/:id/weight
 * GET  /votes/total
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import {
  AccountId,
  ClearVoteRequest,
  RegisterWeightRequest,
  VoteRequest,
  type VoteV1,
} from "@epochlock/weights";
import type { Vote } from "../contracts/types.js";
import type { Protocol } from "../protocol.js";
import { accountParam, callerOf, checkBody, integerParam } from "./context.js";

const DelegateRequest = Type.Object(
  {
    delegate: AccountId,
    approved: Type.Boolean(),
  },
  { additionalProperties: false },
);

function toVotes(votes: readonly VoteV1[]): Vote[] {
  return votes.map((v) => ({ receiverId: v.receiver_id, points: v.points }));
}

export function voteRoutes(app: FastifyInstance, protocol: Protocol): void {
  const { voter, delegates } = protocol;

  app.post("/votes/register", async (req, reply) => {
    const caller = callerOf(req);
    const body = checkBody(RegisterWeightRequest, req.body);
    const account = body.account ?? caller;
    if (body.votes) {
      voter.registerAccountWeightAndVote(caller, account, body.min_epochs, toVotes(body.votes));
    } else {
      voter.registerAccountWeight(caller, account, body.min_epochs);
    }
    const { frozenWeight, locks } = voter.getAccountRegisteredLocks(account);
    return reply.send({
      ok: true,
      account,
      frozen_weight: frozenWeight,
      locks: locks.map((l) => ({ amount: l.amount, epochs_to_unlock: l.epochsToUnlock })),
    });
  });

  app.post("/votes", async (req, reply) => {
    const caller = callerOf(req);
    const body = checkBody(VoteRequest, req.body);
    const account = body.account ?? caller;
    voter.vote(caller, account, toVotes(body.votes), body.clear_previous);
    return reply.send({ ok: true, account, votes: voter.getAccountCurrentVotes(account).length });
  });

  app.post("/votes/clear", async (req, reply) => {
    const caller = callerOf(req);
    const body = checkBody(ClearVoteRequest, req.body ?? {});
    const cleared = voter.clearVote(caller, body.account ?? caller);
    return reply.send({ ok: true, cleared });
  });

  app.post("/votes/clear-registered", async (req, reply) => {
    const caller = callerOf(req);
    const body = checkBody(ClearVoteRequest, req.body ?? {});
    const cleared = voter.clearRegisteredWeight(caller, body.account ?? caller);
    return reply.send({ ok: true, cleared });
  });

  app.post("/delegates", async (req, reply) => {
    const caller = callerOf(req);
    const { delegate, approved } = checkBody(DelegateRequest, req.body);
    delegates.setDelegateApproval(caller, delegate, approved);
    return reply.send({ ok: true, account: caller, delegate, approved });
  });

  app.get<{ Params: { account: string } }>("/accounts/:account/votes", async (req, reply) => {
    const account = accountParam(req.params.account);
    const { frozenWeight, locks } = voter.getAccountRegisteredLocks(account);
    return reply.send({
      account,
      frozen_weight: frozenWeight,
      locks: locks.map((l) => ({ amount: l.amount, epochs_to_unlock: l.epochsToUnlock })),
      votes: voter
        .getAccountCurrentVotes(account)
        .map((v) => ({ receiver_id: v.receiverId, points: v.points })),
    });
  });

  app.get<{ Params: { id: string } }>("/receivers/:id/weight", async (req, reply) => {
    const id = integerParam(req.params.id, "invalid_receiver_id");
    return reply.send({ id, epoch: protocol.core.getEpoch(), weight: voter.getReceiverWeight(id) });
  });

  app.get("/votes/total", async (_req, reply) => {
    return reply.send({
      epoch: protocol.core.getEpoch(),
      weight: voter.getTotalWeight(),
      receivers: voter.receiverCount,
    });
  });
}
