/**
 * Shared route plumbing: caller identity, body and parameter validation,
 * and the ProtocolError → HTTP status mapping.
 */

import type { FastifyError, FastifyInstance, FastifyRequest } from "fastify";
import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import {
  AccountId,
  invalidInput,
  isProtocolError,
  unauthorized,
  type ProtocolErrorKind,
} from "@epochlock/weights";
import { isSystemAccount, type Account } from "../contracts/types.js";

export const ACCOUNT_HEADER = "x-account";

const STATUS_BY_KIND: Record<ProtocolErrorKind, number> = {
  invalid_input: 422,
  unauthorized: 403,
  precondition: 409,
  callback_rejected: 502,
  overflow: 500,
  invariant: 500,
};

/** Dev node: the caller names itself. Component accounts cannot be claimed. */
export function callerOf(req: FastifyRequest): Account {
  const raw = req.headers[ACCOUNT_HEADER];
  const account = Array.isArray(raw) ? raw[0] : raw;
  if (account === undefined || !Value.Check(AccountId, account)) {
    throw unauthorized("missing_account", `${ACCOUNT_HEADER} header required`);
  }
  if (isSystemAccount(account)) throw unauthorized("reserved_account", account);
  return account;
}

export function checkBody<T extends TSchema>(schema: T, body: unknown): Static<T> {
  if (Value.Check(schema, body)) return body;
  const first = Value.Errors(schema, body).First();
  throw invalidInput("invalid_body", first ? `${first.path || "/"}: ${first.message}` : undefined);
}

/** Query strings arrive as text; convert before checking. */
export function checkQuery<T extends TSchema>(schema: T, query: unknown): Static<T> {
  const converted = Value.Convert(schema, query);
  if (Value.Check(schema, converted)) return converted;
  const first = Value.Errors(schema, converted).First();
  throw invalidInput("invalid_query", first ? `${first.path || "/"}: ${first.message}` : undefined);
}

export function accountParam(value: string): Account {
  if (!Value.Check(AccountId, value)) throw invalidInput("invalid_account", value);
  return value;
}

export function integerParam(value: string, code: string): number {
  if (!/^[0-9]{1,9}$/.test(value)) throw invalidInput(code, value);
  return parseInt(value, 10);
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (isProtocolError(err)) {
      const status = STATUS_BY_KIND[err.kind];
      if (status >= 500) req.log.error({ err }, "protocol fault");
      return reply.status(status).send({ error: err.code, kind: err.kind, detail: err.detail });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: "bad_request", detail: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });
}
