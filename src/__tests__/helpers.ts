import type { BookLevel, MarketConfig, MarketDataSource, OrderBook, OwnOrder } from "../types.js";
import type { QuotingParams } from "../config.js";

export const PARAMS: QuotingParams = {
  minProfit: 0.007,
  minOrderValue: 5,
  maxBuyChunkValue: 10,
  excessTolerance: 0.01,
  fillThreshold: 0.01,
  maxSellPrice: 0.999,
};

export function levels(...pairs: Array<[number, number]>): BookLevel[] {
  return pairs.map(([price, size]) => ({ price, size }));
}

export function order(
  id: string,
  price: number,
  originalSize: number,
  opts: Partial<Pick<OwnOrder, "side" | "size_matched" | "created_at" | "token_id">> = {},
): OwnOrder {
  return {
    id,
    token_id: opts.token_id ?? "Y",
    side: opts.side ?? "BUY",
    price,
    original_size: originalSize,
    size_matched: opts.size_matched ?? 0,
    created_at: opts.created_at ?? 0,
  };
}

export function market(overrides: Partial<MarketConfig> = {}): MarketConfig {
  return {
    name: "Test market",
    market_id: "m1",
    yes_token_id: "Y",
    no_token_id: "N",
    trade_side: "yes",
    enabled: true,
    max_position_value: 40,
    ...overrides,
  };
}

/** In-memory books and tick sizes; unknown tokens throw. */
export class FakeMarketData implements MarketDataSource {
  books = new Map<string, { bids: BookLevel[]; asks: BookLevel[] }>();
  ticks = new Map<string, number>();
  failBooks = false;

  setBook(tokenId: string, bids: BookLevel[], asks: BookLevel[], tick: number = 0.01): void {
    this.books.set(tokenId, { bids, asks });
    this.ticks.set(tokenId, tick);
  }

  async getOrderBook(tokenId: string): Promise<OrderBook> {
    if (this.failBooks) throw new Error("book endpoint down");
    const book = this.books.get(tokenId);
    if (!book) throw new Error(`unknown token ${tokenId}`);
    return { token_id: tokenId, bids: book.bids, asks: book.asks };
  }

  async getTickSize(tokenId: string): Promise<number> {
    const tick = this.ticks.get(tokenId);
    if (tick === undefined) throw new Error(`unknown token ${tokenId}`);
    return tick;
  }
}
