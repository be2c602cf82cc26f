/**
 * Token lock routes. The caller (x-account) always acts on its own locks.
 *
 * POST /locks                      — lock tokens
 * POST /locks/batch                — several locks in one call
 * POST /locks/extend               — move an amount to a later unlock epoch
 * POST /locks/extend-batch
 * POST /locks/freeze               — turn all locks into a non-decaying position
 * POST /locks/unfreeze             — back to one full-length lock
 * POST /locks/withdraw-expired     — withdraw or relock matured tokens
 * POST /locks/withdraw-penalty     — early exit at a penalty
 * GET  /accounts/:account/locks
 * GET  /accounts/:account/balances
 * GET  /accounts/:account/weight
 * GET  /accounts/:account/penalty-quote?amount=
 * GET  /weight/total
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import {
  ExtendLockRequest,
  ExtendManyRequest,
  LockManyRequest,
  LockRequest,
  LockUnits,
  UnfreezeRequest,
  WithdrawExpiredRequest,
  WithdrawPenaltyRequest,
} from "@epochlock/weights";
import type { Protocol } from "../protocol.js";
import { accountParam, callerOf, checkBody, checkQuery } from "./context.js";

const PenaltyQuoteQuery = Type.Object({
  amount: Type.Union([Type.Literal("max"), LockUnits]),
});

export function lockRoutes(app: FastifyInstance, protocol: Protocol): void {
  const { locker } = protocol;

  // ── Lock lifecycle ─────────────────────────────────────────────
  app.post("/locks", async (req, reply) => {
    const account = callerOf(req);
    const { amount, epochs } = checkBody(LockRequest, req.body);
    const effective = locker.lock(account, account, amount, epochs);
    return reply.status(201).send({ ok: true, account, amount, epochs: effective });
  });

  app.post("/locks/batch", async (req, reply) => {
    const account = callerOf(req);
    const { locks } = checkBody(LockManyRequest, req.body);
    locker.lockMany(account, account, locks);
    return reply.status(201).send({ ok: true, account, count: locks.length });
  });

  app.post("/locks/extend", async (req, reply) => {
    const account = callerOf(req);
    const { amount, epochs, new_epochs } = checkBody(ExtendLockRequest, req.body);
    locker.extendLock(account, amount, epochs, new_epochs);
    return reply.send({ ok: true });
  });

  app.post("/locks/extend-batch", async (req, reply) => {
    const account = callerOf(req);
    const { locks } = checkBody(ExtendManyRequest, req.body);
    locker.extendMany(
      account,
      locks.map((l) => ({ amount: l.amount, epochs: l.epochs, newEpochs: l.new_epochs })),
    );
    return reply.send({ ok: true, count: locks.length });
  });

  app.post("/locks/freeze", async (req, reply) => {
    const account = callerOf(req);
    locker.freeze(account);
    return reply.send({ ok: true, balances: locker.getAccountBalances(account) });
  });

  app.post("/locks/unfreeze", async (req, reply) => {
    const account = callerOf(req);
    const { keep_vote } = checkBody(UnfreezeRequest, req.body);
    locker.unfreeze(account, keep_vote);
    return reply.send({ ok: true, balances: locker.getAccountBalances(account) });
  });

  app.post("/locks/withdraw-expired", async (req, reply) => {
    const account = callerOf(req);
    const { relock_epochs } = checkBody(WithdrawExpiredRequest, req.body);
    const amount = locker.withdrawExpiredLocks(account, relock_epochs);
    return reply.send({ ok: true, amount, relocked: relock_epochs > 0 });
  });

  app.post("/locks/withdraw-penalty", async (req, reply) => {
    const account = callerOf(req);
    const { amount } = checkBody(WithdrawPenaltyRequest, req.body);
    const { withdrawn, penalty } = locker.withdrawWithPenalty(account, amount);
    return reply.send({ ok: true, withdrawn: String(withdrawn), penalty: String(penalty) });
  });

  // ── Views ──────────────────────────────────────────────────────
  app.get<{ Params: { account: string } }>("/accounts/:account/locks", async (req, reply) => {
    const account = accountParam(req.params.account);
    const { locks, frozen } = locker.getAccountActiveLocks(account);
    return reply.send({
      account,
      frozen,
      locks: locks.map((l) => ({ amount: l.amount, epochs_to_unlock: l.epochsToUnlock })),
    });
  });

  app.get<{ Params: { account: string } }>("/accounts/:account/balances", async (req, reply) => {
    const account = accountParam(req.params.account);
    const { locked, unlocked, frozen, isFrozen } = locker.getAccountBalances(account);
    return reply.send({ account, locked, unlocked, frozen, is_frozen: isFrozen });
  });

  app.get<{ Params: { account: string } }>("/accounts/:account/weight", async (req, reply) => {
    const account = accountParam(req.params.account);
    return reply.send({
      account,
      epoch: protocol.core.getEpoch(),
      weight: locker.getAccountWeight(account),
    });
  });

  app.get<{ Params: { account: string } }>(
    "/accounts/:account/penalty-quote",
    async (req, reply) => {
      const account = accountParam(req.params.account);
      const { amount } = checkQuery(PenaltyQuoteQuery, req.query);
      const quote = locker.getWithdrawWithPenaltyAmounts(account, amount);
      return reply.send({
        account,
        withdrawn: String(quote.withdrawn),
        penalty: String(quote.penalty),
        shortfall: String(quote.shortfall),
      });
    },
  );

  app.get("/weight/total", async (_req, reply) => {
    return reply.send({ epoch: protocol.core.getEpoch(), weight: locker.getTotalWeight() });
  });
}
