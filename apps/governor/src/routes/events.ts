/**
 * Event query route.
 *
 * GET /events?since=&type=  — events from seq `since` on, optionally of one type
 */

import type { FastifyInstance } from "fastify";
import { EventQuery } from "@epochlock/weights";
import type { Protocol } from "../protocol.js";
import { checkQuery } from "./context.js";

export function eventRoutes(app: FastifyInstance, protocol: Protocol): void {
  const { events } = protocol;

  app.get("/events", async (req, reply) => {
    const { since, type } = checkQuery(EventQuery, req.query);
    return reply.send({
      events: events.query({ since, type }),
      head: events.head(),
      count: events.count(),
    });
  });
}
