/**
 * HTTP surface, driven through fastify's inject against a test deployment.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/server.js";
import { deployTestProtocol, fund, OWNER, StubReceiver, type TestProtocol } from "./helpers/protocol.js";

let p: TestProtocol;
let app: FastifyInstance;

const asAccount = (account: string) => ({ "x-account": account });

beforeEach(() => {
  p = deployTestProtocol();
  fund(p, "alice", 1000);
  ({ app } = buildApp({ protocol: p, logger: false }));
});

afterEach(async () => {
  await app.close();
});

describe("health", () => {
  it("GET /health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", events: 1 });
  });

  it("GET /epoch", async () => {
    const res = await app.inject({ method: "GET", url: "/epoch" });
    expect(res.json()).toMatchObject({ epoch: 0, epoch_length: 604_800, second_half: false });
  });
});

describe("caller identity", () => {
  it("requires the account header", async () => {
    const res = await app.inject({ method: "POST", url: "/locks", payload: { amount: 1, epochs: 1 } });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ error: "missing_account", kind: "unauthorized" });
  });

  it("refuses component accounts", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/locks",
      headers: asAccount("system:vault"),
      payload: { amount: 1, epochs: 1 },
    });
    expect(res.statusCode).toBe(403);
    expect(res.json()).toMatchObject({ error: "reserved_account" });
  });
});

describe("locks", () => {
  it("POST /locks creates a lock", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/locks",
      headers: asAccount("alice"),
      payload: { amount: 100, epochs: 10 },
    });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ ok: true, account: "alice", amount: 100, epochs: 10 });

    const weight = await app.inject({ method: "GET", url: "/accounts/alice/weight" });
    expect(weight.json()).toEqual({ account: "alice", epoch: 0, weight: 1000 });

    const locks = await app.inject({ method: "GET", url: "/accounts/alice/locks" });
    expect(locks.json()).toEqual({
      account: "alice",
      frozen: 0,
      locks: [{ amount: 100, epochs_to_unlock: 10 }],
    });
  });

  it("rejects a malformed body", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/locks",
      headers: asAccount("alice"),
      payload: { amount: 0, epochs: 10 },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "invalid_body", kind: "invalid_input" });
  });

  it("maps failed preconditions to 409", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/locks/withdraw-expired",
      headers: asAccount("alice"),
      payload: { relock_epochs: 0 },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: "no_unlocked_tokens", kind: "precondition" });
  });

  it("quotes an early exit", async () => {
    p.locker.lock("alice", "alice", 100, 10);
    const res = await app.inject({ method: "GET", url: "/accounts/alice/penalty-quote?amount=7" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ account: "alice", withdrawn: "70", penalty: "20", shortfall: "0" });
  });
});

describe("votes", () => {
  beforeEach(() => {
    p.vault.registerReceiver(OWNER, "pool", new StubReceiver(), 2);
    p.locker.lock("alice", "alice", 100, 10);
  });

  it("registers and votes in one call", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/votes/register",
      headers: asAccount("alice"),
      payload: { min_epochs: 0, votes: [{ receiver_id: 2, points: 10_000 }] },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      account: "alice",
      frozen_weight: 0,
      locks: [{ amount: 100, epochs_to_unlock: 10 }],
    });

    const weight = await app.inject({ method: "GET", url: "/receivers/2/weight" });
    expect(weight.json()).toEqual({ id: 2, epoch: 0, weight: 1000 });
    const total = await app.inject({ method: "GET", url: "/votes/total" });
    expect(total.json()).toEqual({ epoch: 0, weight: 1000, receivers: 2 });
  });

  it("votes for another account through an approved delegate", async () => {
    const denied = await app.inject({
      method: "POST",
      url: "/votes/register",
      headers: asAccount("bob"),
      payload: { account: "alice", min_epochs: 0 },
    });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toMatchObject({ error: "delegate_not_approved" });

    await app.inject({
      method: "POST",
      url: "/delegates",
      headers: asAccount("alice"),
      payload: { delegate: "bob", approved: true },
    });
    const res = await app.inject({
      method: "POST",
      url: "/votes/register",
      headers: asAccount("bob"),
      payload: { account: "alice", min_epochs: 0 },
    });
    expect(res.statusCode).toBe(200);
  });
});

describe("boost", () => {
  it("pays in full during the grace window", async () => {
    const res = await app.inject({ method: "GET", url: "/accounts/carol/boost?amount=1000&total=5000" });
    expect(res.json()).toEqual({
      account: "carol",
      amount: "1000",
      previous: "0",
      total: "5000",
      adjusted: "1000",
      grace: true,
    });
  });
});

describe("events", () => {
  it("GET /events filters by type", async () => {
    p.locker.lock("alice", "alice", 100, 10);
    const res = await app.inject({ method: "GET", url: "/events?type=lock.created.v1" });
    const body = res.json();
    expect(body.events).toHaveLength(1);
    expect(body.events[0].payload).toMatchObject({ account: "alice", amount: 100, epochs: 10 });
    expect(body.count).toBe(p.events.count());
    expect(body.head).toBe(p.events.head());
  });

  it("rejects a bad query", async () => {
    const res = await app.inject({ method: "GET", url: "/events?since=-1" });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "invalid_query" });
  });
});
