/**
 * Event log writer — in-memory, hash-chained, append-only.
 *
 * id = SHA256(canonical(event minus id)), and every event names its
 * predecessor in `prev`, so a replayed log can be checked end to end.
 * The log is journaled: events appended by an aborted operation vanish
 * with the rest of its state.
 */

import { digestOf, ZERO_DIGEST, type EpochClock } from "@epochlock/weights";
import type { Journaled, Rollback, Transactor } from "../runtime/transactor.js";
import type { EventPayload, EventType, EventV1 } from "./schemas.js";

export interface EventFilter {
  since?: number;
  type?: string;
}

export class EventLog implements Journaled {
  private events: EventV1[] = [];

  constructor(
    private readonly clock: EpochClock,
    tx: Transactor,
  ) {
    tx.enlist(this);
  }

  checkpoint(): Rollback {
    const length = this.events.length;
    return () => {
      this.events.length = length;
    };
  }

  append(type: EventType, payload: EventPayload): EventV1 {
    const last = this.events[this.events.length - 1];
    const body = {
      v: 1 as const,
      seq: this.events.length,
      type,
      epoch: this.clock.currentEpoch(),
      ts: this.clock.now(),
      prev: last ? last.id : ZERO_DIGEST,
      payload,
    };
    const event: EventV1 = { ...body, id: digestOf(body) };
    this.events.push(event);
    return event;
  }

  query(filter: EventFilter = {}): EventV1[] {
    const since = filter.since ?? 0;
    return this.events
      .slice(since)
      .filter((e) => filter.type === undefined || e.type === filter.type);
  }

  count(): number {
    return this.events.length;
  }

  head(): string {
    const last = this.events[this.events.length - 1];
    return last ? last.id : ZERO_DIGEST;
  }
}

/** Recompute every id and link. Returns the seq of the first bad event, or -1. */
export function verifyChain(events: readonly EventV1[]): number {
  let prev = ZERO_DIGEST;
  for (const [index, event] of events.entries()) {
    const { id, ...body } = event;
    if (event.seq !== index || event.prev !== prev || digestOf(body) !== id) return index;
    prev = id;
  }
  return -1;
}
