/**
 * Polymarket CLOB exchange.
 *
 * Order book, tick size, open orders and order placement go through
 * @polymarket/clob-client; positions and the portfolio come from the public
 * data API. Every response is parsed from unknown, and malformed book
 * levels or orders are dropped at this boundary.
 */

import { AssetType, ClobClient, Side } from "@polymarket/clob-client";
import { Wallet } from "ethers";
import { config } from "./config.js";
import { OrderMutationError } from "./errors.js";
import { fetchJson } from "./http.js";
import { log } from "./logger.js";
import type {
  BookLevel,
  Exchange,
  OrderBook,
  OrderSide,
  OwnOrder,
  PortfolioHolding,
  PortfolioSummary,
  Position,
} from "./types.js";

// Gnosis safe proxy wallet
const PROXY_SIGNATURE_TYPE = 2;
const USDC_DECIMALS = 1e6;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toNumber(v: unknown): number | null {
  if (typeof v !== "number" && typeof v !== "string") return null;
  if (typeof v === "string" && v.trim() === "") return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

// ---- Response parsing ----

export function parseLevels(raw: unknown): BookLevel[] {
  if (!Array.isArray(raw)) return [];
  const levels: BookLevel[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const price = toNumber(entry.price);
    const size = toNumber(entry.size);
    if (price === null || size === null || price < 0 || size < 0) continue;
    levels.push({ price, size });
  }
  return levels;
}

export function parseOrderBook(tokenId: string, raw: unknown): OrderBook {
  if (!isRecord(raw)) return { token_id: tokenId, bids: [], asks: [] };
  return { token_id: tokenId, bids: parseLevels(raw.bids), asks: parseLevels(raw.asks) };
}

export function parseOrder(raw: unknown): OwnOrder | null {
  if (!isRecord(raw)) return null;
  const { id, asset_id, side } = raw;
  if (typeof id !== "string" || !id) return null;
  if (side !== "BUY" && side !== "SELL") return null;

  const price = toNumber(raw.price);
  const originalSize = toNumber(raw.original_size);
  const matched = toNumber(raw.size_matched) ?? 0;
  if (price === null || originalSize === null || originalSize < matched) return null;

  return {
    id,
    token_id: typeof asset_id === "string" ? asset_id : "",
    side,
    price,
    original_size: originalSize,
    size_matched: matched,
    created_at: toNumber(raw.created_at) ?? 0,
  };
}

export function parseOrders(raw: unknown): OwnOrder[] {
  const list = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.data) ? raw.data : [];
  const orders: OwnOrder[] = [];
  for (const entry of list) {
    const order = parseOrder(entry);
    if (order) {
      orders.push(order);
    } else {
      log("warn", "exchange.malformed_order", { entry: JSON.stringify(entry).slice(0, 200) });
    }
  }
  return orders;
}

export function parsePosition(raw: unknown, tokenId: string): Position | null {
  if (!Array.isArray(raw)) return null;
  for (const entry of raw) {
    if (!isRecord(entry) || entry.asset !== tokenId) continue;
    const size = toNumber(entry.size);
    if (size === null) continue;
    return {
      size,
      avg_price: toNumber(entry.avgPrice) ?? 0,
      current_value: toNumber(entry.currentValue) ?? 0,
    };
  }
  return null;
}

/** Sizes go to the venue with two decimals; round down so notional never grows. */
export function floorSize(size: number): number {
  return Math.floor(size * 100 + 1e-9) / 100;
}

// ---- Client ----

/** Unauthenticated client: books and tick sizes only. */
export function createPublicClient(): ClobClient {
  return new ClobClient(config.clobUrl, config.chainId);
}

export async function createTradingClient(): Promise<ClobClient> {
  if (!config.privateKey) throw new Error("PRIVATE_KEY is required for live trading");

  const chain = config.chainId;
  const signer = new Wallet(config.privateKey);
  const creds = await new ClobClient(config.clobUrl, chain, signer).createOrDeriveApiKey();

  if (config.proxyAddress) {
    return new ClobClient(config.clobUrl, chain, signer, creds, PROXY_SIGNATURE_TYPE, config.proxyAddress);
  }
  return new ClobClient(config.clobUrl, chain, signer, creds);
}

export class PolymarketExchange implements Exchange {
  constructor(
    private readonly client: ClobClient,
    private readonly user: string = config.proxyAddress,
  ) {}

  async getOrderBook(tokenId: string): Promise<OrderBook> {
    const raw: unknown = await this.client.getOrderBook(tokenId);
    return parseOrderBook(tokenId, raw);
  }

  async getTickSize(tokenId: string): Promise<number> {
    const raw: unknown = await this.client.getTickSize(tokenId);
    const tick = toNumber(raw);
    if (tick === null || tick <= 0) throw new Error(`invalid tick size for ${tokenId}: ${String(raw)}`);
    return tick;
  }

  async getOpenOrders(marketId: string): Promise<OwnOrder[]> {
    const raw: unknown = await this.client.getOpenOrders({ market: marketId });
    return parseOrders(raw);
  }

  async cancelOrder(orderId: string): Promise<void> {
    let raw: unknown;
    try {
      raw = await this.client.cancelOrder({ orderID: orderId });
    } catch (err) {
      throw new OrderMutationError("cancel", orderId, String(err));
    }
    if (isRecord(raw) && isRecord(raw.not_canceled) && orderId in raw.not_canceled) {
      throw new OrderMutationError("cancel", orderId, String(raw.not_canceled[orderId]));
    }
  }

  async createOrder(tokenId: string, side: OrderSide, price: number, size: number): Promise<string> {
    let raw: unknown;
    try {
      raw = await this.client.createAndPostOrder({
        tokenID: tokenId,
        price,
        size: floorSize(size),
        side: side === "BUY" ? Side.BUY : Side.SELL,
      });
    } catch (err) {
      throw new OrderMutationError("create", tokenId, String(err));
    }

    if (!isRecord(raw)) throw new OrderMutationError("create", tokenId, "empty response");
    const orderId = raw.orderID;
    if (raw.success === false || typeof orderId !== "string" || !orderId) {
      const reason = typeof raw.errorMsg === "string" && raw.errorMsg ? raw.errorMsg : "rejected";
      throw new OrderMutationError("create", tokenId, reason);
    }
    return orderId;
  }

  async getPosition(marketId: string, tokenId: string): Promise<Position | null> {
    const raw = await fetchJson(`${config.dataApiUrl}/positions`, {
      params: { user: this.user, market: marketId },
    });
    return parsePosition(raw, tokenId);
  }

  async getFreeCash(): Promise<number> {
    const raw: unknown = await this.client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL });
    const balance = isRecord(raw) ? toNumber(raw.balance) : null;
    if (balance === null) throw new Error("collateral balance missing from response");
    return balance / USDC_DECIMALS;
  }

  async getPortfolio(): Promise<PortfolioSummary> {
    const [raw, cash] = await Promise.all([
      fetchJson(`${config.dataApiUrl}/positions`, { params: { user: this.user } }),
      this.getFreeCash(),
    ]);

    const holdings: PortfolioHolding[] = [];
    for (const entry of Array.isArray(raw) ? raw : []) {
      if (!isRecord(entry)) continue;
      const size = toNumber(entry.size) ?? 0;
      if (size <= 0.01) continue;
      const title = typeof entry.title === "string" ? entry.title : String(entry.asset ?? "");
      holdings.push({ title, size, value: toNumber(entry.currentValue) ?? 0 });
    }

    const total = holdings.reduce((sum, h) => sum + h.value, 0) + cash;
    return { holdings, cash, total };
  }
}
