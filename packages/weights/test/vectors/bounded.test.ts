/**
 * Storage-width ceilings. Values never widen silently.
 */

import { describe, it, expect } from "vitest";
import {
  assertStorageLayout,
  assertSupplyFitsLocks,
  epochIndex,
  positiveU32,
  u16,
  u32,
  u40,
  u128,
} from "../../src/bounded.js";
import { U32_MAX, U40_MAX, U128_MAX } from "../../src/constants.js";
import { thrownCode } from "../thrown.js";

describe("bounded integers", () => {
  it("accept values up to their width", () => {
    expect(u32(U32_MAX)).toBe(U32_MAX);
    expect(u40(U40_MAX)).toBe(U40_MAX);
    expect(u128(U128_MAX)).toBe(U128_MAX);
  });

  it("reject values past their width", () => {
    expect(thrownCode(() => u32(U32_MAX + 1))).toBe("u32_overflow");
    expect(thrownCode(() => u40(-1))).toBe("u40_underflow");
    expect(thrownCode(() => u16(1.5))).toBe("u16_not_integer");
    expect(thrownCode(() => u128(U128_MAX + 1n))).toBe("u128_overflow");
  });

  it("bound epochs to the horizon", () => {
    expect(epochIndex(65_534)).toBe(65_534);
    expect(thrownCode(() => epochIndex(65_535))).toBe("epoch_out_of_range");
  });

  it("validate caller amounts as invalid input", () => {
    expect(thrownCode(() => positiveU32(0, "invalid_amount"))).toBe("invalid_amount");
    expect(thrownCode(() => positiveU32(U32_MAX + 1, "invalid_amount"))).toBe("invalid_amount");
  });
});

describe("setup assertions", () => {
  it("accept the default layout and supply", () => {
    expect(() => assertStorageLayout()).not.toThrow();
    expect(() => assertSupplyFitsLocks(10n ** 26n, 10n ** 18n)).not.toThrow();
  });

  it("reject a supply whose lock units overflow a balance", () => {
    expect(thrownCode(() => assertSupplyFitsLocks(10n ** 28n, 10n ** 18n))).toBe(
      "supply_exceeds_lock_ceiling",
    );
    expect(thrownCode(() => assertSupplyFitsLocks(1n, 0n))).toBe("invalid_lock_ratio");
  });
});
