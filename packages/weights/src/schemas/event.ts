/**
 * EventV1 — append-only audit envelope.
 *
 * id = SHA256(canonical(envelope minus id)); `prev` is the id of the
 * preceding event, zero-filled for the first one. Payload shapes are
 * per-type conventions for indexers and are not interpreted by the protocol.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32 } from "./common.js";

export const EventV1 = Type.Object(
  {
    v: Type.Literal(1),
    /** Position in the log, from 0. */
    seq: Type.Integer({ minimum: 0 }),
    /** Event type, e.g. "lock.created.v1". */
    type: Type.String({ minLength: 1, maxLength: 64 }),
    /** Protocol epoch the event was recorded in. */
    epoch: Type.Integer({ minimum: 0 }),
    /** Unix seconds from the protocol clock. */
    ts: Type.Integer({ minimum: 0 }),
    prev: Hex32,
    payload: Type.Record(Type.String(), Type.Unknown()),
    id: Hex32,
  },
  { additionalProperties: false },
);

export type EventV1 = Static<typeof EventV1>;

export const EventQuery = Type.Object(
  {
    since: Type.Optional(Type.Integer({ minimum: 0 })),
    type: Type.Optional(Type.String({ minLength: 1, maxLength: 64 })),
  },
  { additionalProperties: false },
);

export type EventQuery = Static<typeof EventQuery>;
