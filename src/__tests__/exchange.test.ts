import { afterEach, describe, it, expect, vi } from "vitest";
import { ClobClient, Side } from "@polymarket/clob-client";
import { config } from "../config.js";
import { OrderMutationError } from "../errors.js";
import {
  floorSize,
  parseLevels,
  parseOrder,
  parseOrderBook,
  parseOrders,
  parsePosition,
  PolymarketExchange,
} from "../exchange.js";

describe("response parsing", () => {
  it("reads string-encoded levels and drops malformed ones", () => {
    const raw = [
      { price: "0.48", size: "120.5" },
      { price: "abc", size: "1" },
      { price: "0.47" },
      null,
      { price: 0.46, size: 10 },
      { price: "0.45", size: "-1" },
    ];
    expect(parseLevels(raw)).toEqual([
      { price: 0.48, size: 120.5 },
      { price: 0.46, size: 10 },
    ]);
    expect(parseLevels("nope")).toEqual([]);
  });

  it("treats a non-object book as empty", () => {
    expect(parseOrderBook("Y", null)).toEqual({ token_id: "Y", bids: [], asks: [] });
    expect(parseOrderBook("Y", { bids: [{ price: "0.5", size: "3" }] })).toEqual({
      token_id: "Y",
      bids: [{ price: 0.5, size: 3 }],
      asks: [],
    });
  });

  it("parses an open order", () => {
    const raw = {
      id: "0xabc",
      asset_id: "Y",
      side: "BUY",
      price: "0.49",
      original_size: "20",
      size_matched: "5",
      created_at: 1700000000,
    };
    expect(parseOrder(raw)).toEqual({
      id: "0xabc",
      token_id: "Y",
      side: "BUY",
      price: 0.49,
      original_size: 20,
      size_matched: 5,
      created_at: 1700000000,
    });
  });

  it("rejects orders without an id, with an unknown side or overfilled", () => {
    const base = { id: "o1", asset_id: "Y", side: "SELL", price: "0.5", original_size: "10", size_matched: "0" };
    expect(parseOrder({ ...base, id: "" })).toBeNull();
    expect(parseOrder({ ...base, side: "sell" })).toBeNull();
    expect(parseOrder({ ...base, size_matched: "11" })).toBeNull();
    expect(parseOrder({ ...base, price: undefined })).toBeNull();
  });

  it("accepts both a bare list and a paged envelope of orders", () => {
    const good = { id: "o1", asset_id: "Y", side: "SELL", price: "0.5", original_size: "10" };
    expect(parseOrders([good, { id: 7 }])).toHaveLength(1);
    expect(parseOrders({ data: [good], next_cursor: "LTE=" })).toHaveLength(1);
    expect(parseOrders({})).toEqual([]);
  });

  it("matches the position by asset", () => {
    const raw = [
      { asset: "N", size: 50, avgPrice: 0.3, currentValue: 16 },
      { asset: "Y", size: "25.5", avgPrice: "0.42", currentValue: "11.22" },
    ];
    expect(parsePosition(raw, "Y")).toEqual({ size: 25.5, avg_price: 0.42, current_value: 11.22 });
    expect(parsePosition(raw, "Z")).toBeNull();
    expect(parsePosition({ error: "bad" }, "Y")).toBeNull();
  });

  it("floors sizes to two decimals", () => {
    expect(floorSize(20.408163265306122)).toBe(20.4);
    expect(floorSize(81.63265306122449)).toBe(81.63);
    expect(floorSize(12.34)).toBe(12.34);
  });
});

describe("PolymarketExchange", () => {
  function setup() {
    const client = new ClobClient("https://clob.test", 137);
    return { client, exchange: new PolymarketExchange(client, "0xproxy") };
  }

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it("posts orders with floored size and returns the venue id", async () => {
    const { client, exchange } = setup();
    const post = vi.spyOn(client, "createAndPostOrder").mockResolvedValue({ success: true, orderID: "0xorder" });

    await expect(exchange.createOrder("Y", "BUY", 0.49, 10 / 0.49)).resolves.toBe("0xorder");
    expect(post).toHaveBeenCalledWith({ tokenID: "Y", price: 0.49, size: 20.4, side: Side.BUY });
  });

  it("raises when the venue rejects an order", async () => {
    const { client, exchange } = setup();
    vi.spyOn(client, "createAndPostOrder").mockResolvedValue({ success: false, errorMsg: "not enough balance" });

    const err = await exchange.createOrder("Y", "SELL", 0.5, 10).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OrderMutationError);
    expect(String(err)).toBe("OrderMutationError: create Y failed: not enough balance");
  });

  it("raises when a cancel is refused", async () => {
    const { client, exchange } = setup();
    vi.spyOn(client, "cancelOrder").mockResolvedValue({ canceled: [], not_canceled: { o1: "order already matched" } });

    await expect(exchange.cancelOrder("o1")).rejects.toThrow("cancel o1 failed: order already matched");
  });

  it("accepts a confirmed cancel", async () => {
    const { client, exchange } = setup();
    vi.spyOn(client, "cancelOrder").mockResolvedValue({ canceled: ["o1"], not_canceled: {} });

    await expect(exchange.cancelOrder("o1")).resolves.toBeUndefined();
  });

  it("parses the tick size", async () => {
    const { client, exchange } = setup();
    vi.spyOn(client, "getTickSize").mockResolvedValue("0.001");

    await expect(exchange.getTickSize("Y")).resolves.toBe(0.001);
  });

  it("reads the position for the traded token from the data API", async () => {
    const { exchange } = setup();
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify([
      { asset: "Y", size: 12, avgPrice: 0.4, currentValue: 5.4 },
    ])));
    vi.stubGlobal("fetch", fetchMock);

    await expect(exchange.getPosition("m1", "Y")).resolves.toEqual({ size: 12, avg_price: 0.4, current_value: 5.4 });
    expect(fetchMock.mock.calls[0][0]).toBe(`${config.dataApiUrl}/positions?user=0xproxy&market=m1`);
  });
});
