/**
 * Liveness and clock routes.
 *
 * GET /health — basic liveness check
 * GET /epoch  — current epoch and its boundaries
 */

import type { FastifyInstance } from "fastify";
import type { Protocol } from "../protocol.js";

export function healthRoutes(app: FastifyInstance, protocol: Protocol): void {
  const { core, events } = protocol;

  app.get("/health", async (_req, reply) => {
    return reply.send({ status: "ok", events: events.count(), timestamp: Date.now() });
  });

  app.get("/epoch", async (_req, reply) => {
    const epoch = core.getEpoch();
    return reply.send({
      epoch,
      start_time: core.startTime,
      epoch_length: core.epochLength,
      epoch_start: core.epochClock.epochStart(epoch),
      epoch_end: core.epochClock.epochEnd(epoch),
      second_half: core.epochClock.inSecondHalf(),
      now: core.now(),
    });
  });
}
