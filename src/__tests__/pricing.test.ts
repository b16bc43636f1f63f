import { describe, it, expect } from "vitest";
import { cumulativeValueToPrice, resolvePriceForValue } from "../pricing.js";
import { levels } from "./helpers.js";

const BIDS = levels([0.5, 60], [0.49, 200], [0.48, 100]);
const ASKS = levels([0.52, 10], [0.53, 100]);

describe("resolvePriceForValue", () => {
  it("keeps walking until cumulative notional reaches the target", () => {
    // 0.50 * 60 = 30 < 40, then 30 + 0.49 * 200 = 128 >= 40
    expect(resolvePriceForValue(levels([0.5, 60], [0.49, 200]), 40, true)).toBe(0.49);
  });

  it("stops at a level whose cumulative notional exactly meets the target", () => {
    expect(resolvePriceForValue(BIDS, 30, true)).toBe(0.5);
  });

  it("returns the best price for a non-positive target", () => {
    expect(resolvePriceForValue(BIDS, 0, true)).toBe(0.5);
    expect(resolvePriceForValue(BIDS, -5, true)).toBe(0.5);
    expect(resolvePriceForValue(ASKS, 0, false)).toBe(0.52);
  });

  it("returns the side's bound for an empty ladder", () => {
    expect(resolvePriceForValue([], 10, true)).toBe(0);
    expect(resolvePriceForValue([], 10, false)).toBe(1);
    expect(resolvePriceForValue([], 0, true)).toBe(0);
    expect(resolvePriceForValue([], -1, false)).toBe(1);
  });

  it("saturates at the worst level", () => {
    expect(resolvePriceForValue(BIDS, 10_000, true)).toBe(0.48);
    expect(resolvePriceForValue(ASKS, 10_000, false)).toBe(0.53);
  });

  it("walks asks upward", () => {
    // 0.52 * 10 = 5.2 < 10, then 5.2 + 53 = 58.2
    expect(resolvePriceForValue(ASKS, 10, false)).toBe(0.53);
    expect(resolvePriceForValue(ASKS, 5, false)).toBe(0.52);
  });
});

describe("cumulativeValueToPrice", () => {
  it("includes the level that reaches the limit", () => {
    expect(cumulativeValueToPrice(BIDS, 0.49, true)).toBeCloseTo(128, 9);
    expect(cumulativeValueToPrice(BIDS, 0.5, true)).toBe(30);
  });

  it("counts the best level even when the limit is better than it", () => {
    expect(cumulativeValueToPrice(BIDS, 0.6, true)).toBe(30);
  });

  it("sweeps the whole ladder when the limit is beyond it", () => {
    expect(cumulativeValueToPrice(BIDS, 0.1, true)).toBeCloseTo(176, 9);
  });

  it("works upward for asks", () => {
    expect(cumulativeValueToPrice(ASKS, 0.53, false)).toBeCloseTo(58.2, 9);
    expect(cumulativeValueToPrice(ASKS, 0.52, false)).toBeCloseTo(5.2, 9);
  });

  it("is zero for an empty ladder", () => {
    expect(cumulativeValueToPrice([], 0.5, true)).toBe(0);
    expect(cumulativeValueToPrice([], 0.5, false)).toBe(0);
  });

  it("never decreases as the limit moves away from the best price", () => {
    const bidLimits = [0.6, 0.5, 0.495, 0.49, 0.485, 0.48, 0.1];
    const bidValues = bidLimits.map(p => cumulativeValueToPrice(BIDS, p, true));
    for (let i = 1; i < bidValues.length; i++) {
      expect(bidValues[i]).toBeGreaterThanOrEqual(bidValues[i - 1]);
    }

    const askLimits = [0.4, 0.52, 0.525, 0.53, 0.9];
    const askValues = askLimits.map(p => cumulativeValueToPrice(ASKS, p, false));
    for (let i = 1; i < askValues.length; i++) {
      expect(askValues[i]).toBeGreaterThanOrEqual(askValues[i - 1]);
    }
  });
});
