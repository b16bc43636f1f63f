/**
 * Paper exchange.
 *
 * Live books and tick sizes from a market data source; orders, positions
 * and cash kept in memory. Our resting orders are merged into the books we
 * hand back, the way they would appear on the venue.
 *
 * Cash is the settled balance: resting buys do not reduce it, but a new buy
 * must fit in the balance left after the buys already resting. Cash moves
 * only when an order fills.
 *
 * Fill simulation runs on every book read for a token:
 *   - BUY fills when the best external ask drops to our price or below
 *   - SELL fills when the best external bid rises to our price or above
 */

import crypto from "node:crypto";
import { config } from "./config.js";
import { OrderMutationError } from "./errors.js";
import { log, round } from "./logger.js";
import type {
  BookLevel,
  Exchange,
  MarketDataSource,
  OrderBook,
  OrderSide,
  OwnOrder,
  PortfolioSummary,
  Position,
} from "./types.js";

interface PaperOrder extends OwnOrder {
  market_id: string;
}

interface PaperHolding {
  market_id: string;
  size: number;
  avg_price: number;
  last_price: number;
}

export class PaperExchange implements Exchange {
  private orders = new Map<string, PaperOrder>();
  private holdings = new Map<string, PaperHolding>();   // keyed by token id
  private marketByToken = new Map<string, string>();
  private cash: number;
  private clock: () => number;

  constructor(
    private readonly data: MarketDataSource,
    startingCash: number = config.paperStartingCash,
    clock: () => number = () => Date.now() / 1000,
  ) {
    this.cash = startingCash;
    this.clock = clock;
  }

  /** Tokens must be registered so orders and positions can be grouped by market. */
  registerMarket(marketId: string, tokenIds: string[]): void {
    for (const tokenId of tokenIds) this.marketByToken.set(tokenId, marketId);
  }

  async getOrderBook(tokenId: string): Promise<OrderBook> {
    const book = await this.data.getOrderBook(tokenId);
    this.simulateFills(tokenId, book);
    return this.withOwnOrders(book);
  }

  getTickSize(tokenId: string): Promise<number> {
    return this.data.getTickSize(tokenId);
  }

  async getOpenOrders(marketId: string): Promise<OwnOrder[]> {
    const open: OwnOrder[] = [];
    for (const order of this.orders.values()) {
      if (order.market_id !== marketId) continue;
      const { market_id: _market, ...own } = order;
      open.push(own);
    }
    return open;
  }

  async cancelOrder(orderId: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order) throw new OrderMutationError("cancel", orderId, "unknown order");
    this.orders.delete(orderId);
  }

  async createOrder(tokenId: string, side: OrderSide, price: number, size: number): Promise<string> {
    const marketId = this.marketByToken.get(tokenId);
    if (!marketId) throw new OrderMutationError("create", tokenId, "token not registered");
    if (price <= 0 || price >= 1 || size <= 0) {
      throw new OrderMutationError("create", tokenId, `invalid order ${price} x ${size}`);
    }

    if (side === "BUY") {
      const committed = this.restingBuyValue();
      if (committed + price * size > this.cash + 1e-9) {
        throw new OrderMutationError("create", tokenId, "insufficient cash");
      }
    } else {
      const held = this.holdings.get(tokenId)?.size ?? 0;
      const committed = this.restingSize(tokenId, "SELL");
      if (committed + size > held + 1e-9) throw new OrderMutationError("create", tokenId, "insufficient position");
    }

    const id = `paper_${crypto.randomBytes(6).toString("hex")}`;
    this.orders.set(id, {
      id,
      market_id: marketId,
      token_id: tokenId,
      side,
      price,
      original_size: size,
      size_matched: 0,
      created_at: this.clock(),
    });
    return id;
  }

  async getPosition(marketId: string, tokenId: string): Promise<Position | null> {
    const holding = this.holdings.get(tokenId);
    if (!holding || holding.market_id !== marketId || holding.size <= 0) return null;
    return {
      size: holding.size,
      avg_price: holding.avg_price,
      current_value: holding.size * holding.last_price,
    };
  }

  async getFreeCash(): Promise<number> {
    return this.cash;
  }

  async getPortfolio(): Promise<PortfolioSummary> {
    const holdings = [...this.holdings.entries()]
      .filter(([, h]) => h.size > 0.01)
      .map(([tokenId, h]) => ({ title: tokenId, size: h.size, value: h.size * h.last_price }));
    const total = holdings.reduce((sum, h) => sum + h.value, 0) + this.cash;
    return { holdings, cash: this.cash, total };
  }

  private restingBuyValue(): number {
    let value = 0;
    for (const o of this.orders.values()) {
      if (o.side === "BUY") value += (o.original_size - o.size_matched) * o.price;
    }
    return value;
  }

  private restingSize(tokenId: string, side: OrderSide): number {
    let size = 0;
    for (const o of this.orders.values()) {
      if (o.token_id === tokenId && o.side === side) size += o.original_size - o.size_matched;
    }
    return size;
  }

  private simulateFills(tokenId: string, book: OrderBook): void {
    const bestBid = Math.max(0, ...book.bids.filter(l => l.size > 0).map(l => l.price));
    const bestAsk = Math.min(1, ...book.asks.filter(l => l.size > 0).map(l => l.price));

    const holding = this.holdings.get(tokenId);
    if (holding && bestBid > 0) holding.last_price = bestBid;

    for (const order of [...this.orders.values()]) {
      if (order.token_id !== tokenId) continue;
      const crossed = order.side === "BUY"
        ? book.asks.length > 0 && bestAsk <= order.price
        : book.bids.length > 0 && bestBid >= order.price;
      if (!crossed) continue;

      const size = order.original_size - order.size_matched;
      this.orders.delete(order.id);
      this.applyFill(order, size);

      log("info", "paper.fill", {
        order_id: order.id,
        side: order.side.toLowerCase(),
        price: order.price,
        size: round(size),
        market_bid: bestBid,
        market_ask: bestAsk,
      });
    }
  }

  private applyFill(order: PaperOrder, size: number): void {
    const holding = this.holdings.get(order.token_id) ?? {
      market_id: order.market_id,
      size: 0,
      avg_price: 0,
      last_price: order.price,
    };

    if (order.side === "BUY") {
      this.cash -= size * order.price;
      const cost = holding.size * holding.avg_price + size * order.price;
      holding.size += size;
      holding.avg_price = holding.size > 0 ? cost / holding.size : 0;
    } else {
      this.cash += size * order.price;
      holding.size = Math.max(0, holding.size - size);
      if (holding.size === 0) holding.avg_price = 0;
    }
    holding.last_price = order.price;
    this.holdings.set(order.token_id, holding);
  }

  private withOwnOrders(book: OrderBook): OrderBook {
    const bids: BookLevel[] = book.bids.map(l => ({ ...l }));
    const asks: BookLevel[] = book.asks.map(l => ({ ...l }));

    for (const order of this.orders.values()) {
      if (order.token_id !== book.token_id) continue;
      const remaining = order.original_size - order.size_matched;
      (order.side === "BUY" ? bids : asks).push({ price: order.price, size: remaining });
    }

    return { token_id: book.token_id, bids, asks };
  }
}
