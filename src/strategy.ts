/**
 * Quote sizing and risk governor.
 *
 * Buy side: spend up to the remaining cost-basis budget, priced where that
 * much notional from other bidders rests ahead of us, and only when the gap
 * to the best ask clears the minimum profit.
 *
 * Sell side: offer the whole position at no less than entry + min profit,
 * and no less than the price reached by sweeping its value up the asks.
 */

import { config, type QuotingParams } from "./config.js";
import { normalizePrice } from "./liquidity.js";
import { resolvePriceForValue } from "./pricing.js";
import type { LiquidityView, Position, QuoteLeg, TargetQuote } from "./types.js";

export interface QuoteInputs {
  view: LiquidityView;
  /** null when the position read failed this round */
  position: Position | null;
  freeCash: number;
  maxPositionValue: number;
  tickSize: number;
}

function leg(price: number, value: number): QuoteLeg {
  return { price, value, size: price > 0 ? value / price : 0 };
}

export function availableToBuy(position: Position, freeCash: number, maxPositionValue: number): number {
  const costBasis = position.size * position.avg_price;
  return Math.max(0, Math.min(maxPositionValue - costBasis, freeCash));
}

export function computeTargetQuote(
  inputs: QuoteInputs,
  params: QuotingParams = config,
): TargetQuote {
  const { view, position, freeCash, maxPositionValue, tickSize } = inputs;
  const { bids, asks, best_bid, best_ask } = view;

  // Unknown inventory: quote nothing, existing orders get pulled
  if (!position) {
    return { buy: leg(best_bid, 0), sell: leg(best_ask, 0) };
  }

  // ---- Buy ----
  let buy: QuoteLeg;
  if (bids.length > 0 && asks.length > 0) {
    const budget = availableToBuy(position, freeCash, maxPositionValue);
    const buyPrice = resolvePriceForValue(bids, budget, true);
    buy = leg(buyPrice, best_ask - buyPrice >= params.minProfit ? budget : 0);
  } else {
    buy = leg(best_bid, 0);
  }

  // ---- Sell ----
  let sell: QuoteLeg;
  if (position.size > 0) {
    const floor = normalizePrice(Math.min(position.avg_price + params.minProfit, params.maxSellPrice), tickSize);
    let sellPrice = floor;
    if (asks.length > 0) {
      const swept = resolvePriceForValue(asks, position.size * best_ask, false);
      sellPrice = Math.max(swept, floor);
    }
    sellPrice = Math.min(sellPrice, params.maxSellPrice);
    sell = { price: sellPrice, value: position.size * sellPrice, size: position.size };
  } else {
    sell = leg(best_ask, 0);
  }

  return { buy, sell };
}
