import { isProtocolError } from "../src/errors.js";

/** Code of the ProtocolError `fn` throws, or undefined if it returns. */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isProtocolError(err)) return err.code;
    throw err;
  }
  return undefined;
}
