/**
 * Boost routes.
 *
 * GET /accounts/:account/boost?amount=&previous=&total=  — boosted payout of a claim
 * GET /accounts/:account/claimable-with-boost             — remaining headroom this epoch
 */

import type { FastifyInstance } from "fastify";
import { Type } from "@sinclair/typebox";
import { TokenAmount } from "@epochlock/weights";
import type { Protocol } from "../protocol.js";
import { accountParam, checkQuery } from "./context.js";

const BoostQuery = Type.Object({
  amount: TokenAmount,
  previous: Type.Optional(TokenAmount),
  /** Defaults to the vault's emissions of the current epoch. */
  total: Type.Optional(TokenAmount),
});

export function boostRoutes(app: FastifyInstance, protocol: Protocol): void {
  const { boost, core, vault } = protocol;

  app.get<{ Params: { account: string } }>("/accounts/:account/boost", async (req, reply) => {
    const account = accountParam(req.params.account);
    const q = checkQuery(BoostQuery, req.query);
    const amount = BigInt(q.amount);
    const previous = BigInt(q.previous ?? "0");
    const total = q.total === undefined ? vault.epochEmissions(core.getEpoch()) : BigInt(q.total);
    const adjusted = boost.getBoostedAmount(account, amount, previous, total);
    return reply.send({
      account,
      amount: String(amount),
      previous: String(previous),
      total: String(total),
      adjusted: String(adjusted),
      grace: boost.inGracePeriod(),
    });
  });

  app.get<{ Params: { account: string } }>(
    "/accounts/:account/claimable-with-boost",
    async (req, reply) => {
      const account = accountParam(req.params.account);
      const { maxBoosted, boosted } = vault.getClaimableWithBoost(account);
      return reply.send({
        account,
        max_boosted: String(maxBoosted),
        boosted: String(boosted),
      });
    },
  );
}
