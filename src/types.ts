/**
 * Shared types for the quote engine.
 */

export type OutcomeSide = "yes" | "no";
export type OrderSide = "BUY" | "SELL";

export interface MarketConfig {
  name: string;
  market_id: string;
  yes_token_id: string;
  no_token_id: string;
  trade_side: OutcomeSide;
  enabled: boolean;
  max_position_value: number;  // dollars, at cost basis
}

export interface BookLevel {
  price: number;   // probability price (0-1)
  size: number;    // contracts
}

export interface OrderBook {
  token_id: string;
  bids: BookLevel[];
  asks: BookLevel[];
}

export interface OwnOrder {
  id: string;
  token_id: string;
  side: OrderSide;
  price: number;
  original_size: number;
  size_matched: number;
  created_at: number;   // unix seconds
}

/**
 * Book liquidity with our own resting size netted out, tick-normalized.
 * Bids descending, asks ascending, no duplicate prices, no size <= 0.
 */
export interface LiquidityView {
  bids: BookLevel[];
  asks: BookLevel[];
  best_bid: number;   // 0 when no external bid
  best_ask: number;   // 1 when no external ask
}

export interface Position {
  size: number;
  avg_price: number;
  current_value: number;
}

export interface QuoteLeg {
  price: number;
  value: number;   // notional (dollars)
  size: number;    // value / price
}

export interface TargetQuote {
  buy: QuoteLeg;
  sell: QuoteLeg;
}

export interface PlannedCancel {
  order_id: string;
  reason: "price" | "excess";
  value: number;
}

export interface PlannedCreate {
  price: number;
  size: number;
  value: number;
}

export interface ReconciliationPlan {
  side: OrderSide;
  price: number;
  cancels: PlannedCancel[];
  creates: PlannedCreate[];
  kept: number;          // correctly priced orders left resting
  resting_value: number; // notional resting once the plan is applied
}

export interface MarketResult {
  name: string;
  market_id: string;
  side: OutcomeSide;
  best_bid: number;
  best_ask: number;
  buy_price: number;
  sell_price: number;
  tick_size: number;
  position_value: number;
  max_position_value: number;
  buy_orders: number;
  sell_orders: number;
  bid_value_ahead: number;
  ask_value_ahead: number;
}

export interface MarketFailure {
  name: string;
  market_id: string;
  error: string;
}

export type MarketOutcome =
  | { ok: true; result: MarketResult }
  | { ok: false; failure: MarketFailure };

export interface FillEvent {
  market_id: string;
  market_name: string;
  delta: number;       // signed: > 0 buy filled, < 0 sell filled
  new_size: number;
  new_value: number;
  direction: "buy" | "sell";
}

export interface PortfolioHolding {
  title: string;
  size: number;
  value: number;
}

export interface PortfolioSummary {
  holdings: PortfolioHolding[];
  cash: number;
  total: number;
}

/** Order book and tick size reads, public on the venue. */
export interface MarketDataSource {
  getOrderBook(tokenId: string): Promise<OrderBook>;
  getTickSize(tokenId: string): Promise<number>;
}

/** Everything the engine needs from the venue. */
export interface Exchange extends MarketDataSource {
  getOpenOrders(marketId: string): Promise<OwnOrder[]>;
  cancelOrder(orderId: string): Promise<void>;
  createOrder(tokenId: string, side: OrderSide, price: number, size: number): Promise<string>;
  /** null when we hold nothing in this token */
  getPosition(marketId: string, tokenId: string): Promise<Position | null>;
  getFreeCash(): Promise<number>;
  getPortfolio(): Promise<PortfolioSummary>;
}

export interface Notifier {
  notify(title: string, body: string): Promise<boolean>;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
