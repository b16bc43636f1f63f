import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { parseDetails, statusPayload, timeAgo } from "../dashboard.js";
import * as db from "../db.js";
import type { MarketResult } from "../types.js";

function result(overrides: Partial<MarketResult> = {}): MarketResult {
  return {
    name: "Rain",
    market_id: "m1",
    side: "yes",
    best_bid: 0.5,
    best_ask: 0.52,
    buy_price: 0.49,
    sell_price: 0.51,
    tick_size: 0.01,
    position_value: 10,
    max_position_value: 40,
    buy_orders: 3,
    sell_orders: 1,
    bid_value_ahead: 30,
    ask_value_ahead: 52,
    ...overrides,
  };
}

describe("journal", () => {
  beforeEach(async () => {
    await db.connect(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("returns events newest first", () => {
    db.logEvent("scheduler_start", { interval_s: 10 });
    db.logEvent("round_failed");

    const events = db.getRecentEvents(10);
    expect(events.map(e => e.event_type)).toEqual(["round_failed", "scheduler_start"]);
    expect(events[0].details).toBeNull();
    expect(events[1].details).toBe('{"interval_s":10}');
  });

  it("stores fills", () => {
    db.logFill({ market_id: "m1", market_name: "Rain", delta: -4, new_size: 6, new_value: 3.1, direction: "sell" });

    const [fill] = db.getRecentFills();
    expect(fill).toMatchObject({ market_id: "m1", market_name: "Rain", delta: -4, new_size: 6, new_value: 3.1, direction: "sell" });
    expect(fill.timestamp).toBeGreaterThan(0);
  });

  it("keeps the latest snapshot per market", () => {
    db.logSnapshots(1, [result(), result({ market_id: "m2", name: "Fog", side: "no", position_value: 5 })]);
    db.logSnapshots(2, [result({ position_value: 20, buy_orders: 1 })]);

    const latest = db.getLatestSnapshots();
    expect(latest.map(s => [s.name, s.round, s.position_value])).toEqual([
      ["Fog", 1, 5],
      ["Rain", 2, 20],
    ]);
    expect(latest[0].side).toBe("no");
    expect(latest[1]).toMatchObject({ buy_orders: 1, sell_orders: 1, bid_value_ahead: 30, tick_size: 0.01 });
  });

  it("summarises the latest state for the status API", () => {
    db.logSnapshots(1, [result(), result({ market_id: "m2", name: "Fog", position_value: 5, buy_orders: 2, sell_orders: 0 })]);
    db.logSnapshots(2, [result({ position_value: 20 })]);
    db.logFill({ market_id: "m1", market_name: "Rain", delta: 10, new_size: 20, new_value: 10, direction: "buy" });

    const latest = Math.max(...db.getLatestSnapshots().map(s => s.timestamp));
    const status = statusPayload(latest + 5.5);
    expect(status).toMatchObject({
      markets: 2,
      position_value: 25,
      max_position_value: 80,
      resting_buy_orders: 5,
      resting_sell_orders: 1,
      fills: 1,
      last_update: "5s ago",
    });
  });
});

describe("record", () => {
  afterEach(() => {
    db.close();
  });

  it("skips writes while disconnected", () => {
    const write = vi.fn();
    db.record("event", write);
    expect(write).not.toHaveBeenCalled();
  });

  it("drops a failed write and keeps journaling", async () => {
    await db.connect(":memory:");

    expect(() => db.record("fill", () => {
      throw new Error("disk full");
    })).not.toThrow();
    db.record("event", () => db.logEvent("after_failure"));

    expect(db.getRecentEvents(1).map(e => e.event_type)).toEqual(["after_failure"]);
  });
});

describe("dashboard helpers", () => {
  it("formats relative times", () => {
    expect(timeAgo(1000, 1042)).toBe("42s ago");
    expect(timeAgo(1000, 1000 + 125)).toBe("2m ago");
    expect(timeAgo(1000, 1000 + 7300)).toBe("2h ago");
    expect(timeAgo(1000, 1000 + 3 * 86400)).toBe("3d ago");
  });

  it("parses event details when they are JSON", () => {
    expect(parseDetails('{"round":4}')).toEqual({ round: 4 });
    expect(parseDetails("plain text")).toBe("plain text");
    expect(parseDetails(null)).toBeNull();
  });
});
