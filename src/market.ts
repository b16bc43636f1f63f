/**
 * One market's cycle:
 *   book -> orders -> tick -> liquidity view -> position/cash -> target quote
 *   -> reconcile buys -> reconcile sells -> fill tracking
 *
 * Read failures on the book, position or cash degrade to "quote nothing"
 * defaults. Failures reading our orders or the tick size, and any rejected
 * cancel/create, fail the market for this round.
 */

import { config, tradedToken, type QuotingParams } from "./config.js";
import * as db from "./db.js";
import type { FillTracker } from "./fills.js";
import { buildLiquidityView } from "./liquidity.js";
import { log, round } from "./logger.js";
import { formatFill } from "./notify.js";
import { cumulativeValueToPrice } from "./pricing.js";
import { reconcile } from "./reconciler.js";
import { computeTargetQuote } from "./strategy.js";
import type {
  Exchange,
  MarketConfig,
  MarketResult,
  Notifier,
  OrderBook,
  PortfolioSummary,
  Position,
} from "./types.js";

export interface MarketContext {
  exchange: Exchange;
  notifier: Notifier;
  fills: FillTracker;
  params?: QuotingParams;
}

const NO_POSITION: Position = { size: 0, avg_price: 0, current_value: 0 };

async function readBook(exchange: Exchange, tokenId: string, market: MarketConfig): Promise<OrderBook> {
  try {
    return await exchange.getOrderBook(tokenId);
  } catch (err) {
    log("warn", "market.book_unavailable", { market: market.name, error: String(err) });
    return { token_id: tokenId, bids: [], asks: [] };
  }
}

async function readPosition(exchange: Exchange, tokenId: string, market: MarketConfig): Promise<Position | null> {
  try {
    return (await exchange.getPosition(market.market_id, tokenId)) ?? NO_POSITION;
  } catch (err) {
    log("warn", "market.position_unavailable", { market: market.name, error: String(err) });
    return null;
  }
}

async function readCash(exchange: Exchange, market: MarketConfig): Promise<number> {
  try {
    return await exchange.getFreeCash();
  } catch (err) {
    log("warn", "market.cash_unavailable", { market: market.name, error: String(err) });
    return 0;
  }
}

export async function processMarket(ctx: MarketContext, market: MarketConfig): Promise<MarketResult> {
  const { exchange, notifier, fills } = ctx;
  const params = ctx.params ?? config;
  const tokenId = tradedToken(market);

  const book = await readBook(exchange, tokenId, market);

  const openOrders = (await exchange.getOpenOrders(market.market_id)).filter(o => o.token_id === tokenId);
  const buyOrders = openOrders.filter(o => o.side === "BUY");
  const sellOrders = openOrders.filter(o => o.side === "SELL");

  const tickSize = await exchange.getTickSize(tokenId);
  const view = buildLiquidityView(book, buyOrders, sellOrders, tickSize);

  const position = await readPosition(exchange, tokenId, market);
  const freeCash = await readCash(exchange, market);

  const quote = computeTargetQuote(
    { view, position, freeCash, maxPositionValue: market.max_position_value, tickSize },
    params,
  );

  log("debug", "market.quote", {
    market: market.name,
    best_bid: view.best_bid,
    best_ask: view.best_ask,
    buy_price: quote.buy.price,
    buy_value: round(quote.buy.value),
    sell_price: quote.sell.price,
    sell_value: round(quote.sell.value),
  });

  const buyCount = await reconcile(exchange, tokenId, buyOrders, quote.buy, "BUY", tickSize, params);
  const sellCount = await reconcile(exchange, tokenId, sellOrders, quote.sell, "SELL", tickSize, params);

  if (position) {
    const fill = fills.observe(market, position);
    if (fill) {
      log("info", "market.fill_detected", {
        market: market.name,
        direction: fill.direction,
        delta: round(fill.delta),
        new_size: round(fill.new_size),
      });

      let portfolio: PortfolioSummary | null = null;
      try {
        portfolio = await exchange.getPortfolio();
      } catch (err) {
        log("warn", "market.portfolio_unavailable", { error: String(err) });
      }
      const message = formatFill(fill, portfolio);
      await notifier.notify(message.title, message.body);
      db.record("fill", () => db.logFill(fill));
    }
  }

  return {
    name: market.name,
    market_id: market.market_id,
    side: market.trade_side,
    best_bid: view.best_bid,
    best_ask: view.best_ask,
    buy_price: quote.buy.price,
    sell_price: quote.sell.price,
    tick_size: tickSize,
    position_value: position?.current_value ?? 0,
    max_position_value: market.max_position_value,
    buy_orders: buyCount,
    sell_orders: sellCount,
    bid_value_ahead: cumulativeValueToPrice(view.bids, quote.buy.price, true),
    ask_value_ahead: cumulativeValueToPrice(view.asks, quote.sell.price, false),
  };
}
