import { describe, it, expect } from "vitest";
import { assertPositiveInt } from "./assert-positive-int.js";
import { roundTo } from "./round-to.js";

describe("assertPositiveInt", () => {
  it("returns the value when valid", () => {
    expect(assertPositiveInt(20, "cycleBudget")).toBe(20);
  });

  it("rejects zero, fractions and non-finite values", () => {
    expect(() => assertPositiveInt(0, "cycleBudget")).toThrow("cycleBudget: expected positive integer, got 0");
    expect(() => assertPositiveInt(2.5, "cycleBudget")).toThrow("got 2.5");
    expect(() => assertPositiveInt(Number.NaN, "cycleBudget")).toThrow("got NaN");
  });
});

describe("roundTo", () => {
  it("rounds to the requested decimals", () => {
    expect(roundTo(0.123456789, 6)).toBe(0.123457);
    expect(roundTo(1234.56789, 4)).toBe(1234.5679);
    expect(roundTo(12.345, 0)).toBe(12);
  });

  it("passes non-finite values through", () => {
    expect(roundTo(Number.POSITIVE_INFINITY, 2)).toBe(Number.POSITIVE_INFINITY);
    expect(roundTo(Number.NaN, 2)).toBeNaN();
  });
});
