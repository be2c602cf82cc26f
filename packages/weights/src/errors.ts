/**
 * Protocol error taxonomy.
 *
 * Every rejected operation throws a ProtocolError. The kind decides how the
 * failure surfaces (HTTP status, view-path degradation); the code is a stable
 * snake_case reason string.
 */

export type ProtocolErrorKind =
  | "invalid_input"
  | "unauthorized"
  | "precondition"
  | "callback_rejected"
  | "overflow"
  | "invariant";

export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly code: string;
  readonly detail?: string;

  constructor(kind: ProtocolErrorKind, code: string, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "ProtocolError";
    this.kind = kind;
    this.code = code;
    this.detail = detail;
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

export function invalidInput(code: string, detail?: string): ProtocolError {
  return new ProtocolError("invalid_input", code, detail);
}

export function unauthorized(code: string, detail?: string): ProtocolError {
  return new ProtocolError("unauthorized", code, detail);
}

export function precondition(code: string, detail?: string): ProtocolError {
  return new ProtocolError("precondition", code, detail);
}

export function callbackRejected(code: string, detail?: string): ProtocolError {
  return new ProtocolError("callback_rejected", code, detail);
}

export function overflow(code: string, detail?: string): ProtocolError {
  return new ProtocolError("overflow", code, detail);
}

export function invariant(code: string, detail?: string): ProtocolError {
  return new ProtocolError("invariant", code, detail);
}
