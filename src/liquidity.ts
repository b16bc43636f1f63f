/**
 * Liquidity view.
 *
 * Turns a raw book plus our own resting orders into per-side ladders of
 * other participants' size at each tick. Our own size is netted out so the
 * engine never prices against itself.
 */

import type { BookLevel, LiquidityView, OrderBook, OwnOrder } from "./types.js";

function tickDecimals(tick: number): number {
  const s = String(tick);
  const [mantissa, exponent] = s.split("e-");
  if (exponent !== undefined) return Number(exponent) + tickDecimals(Number(mantissa));
  const dot = s.indexOf(".");
  return dot < 0 ? 0 : s.length - dot - 1;
}

export function normalizePrice(price: number, tick: number): number {
  const snapped = Math.round(price / tick) * tick;
  return Number(snapped.toFixed(tickDecimals(tick)));
}

export function remainingSize(order: OwnOrder): number {
  return Math.max(0, order.original_size - order.size_matched);
}

export function ownSizesByPrice(orders: OwnOrder[], tick: number): Map<number, number> {
  const sizes = new Map<number, number>();
  for (const order of orders) {
    const price = normalizePrice(order.price, tick);
    sizes.set(price, (sizes.get(price) ?? 0) + remainingSize(order));
  }
  return sizes;
}

export function buildLadder(
  levels: BookLevel[],
  ownSizes: Map<number, number>,
  tick: number,
  descending: boolean,
): BookLevel[] {
  const aggregated = new Map<number, number>();
  for (const level of levels) {
    const price = normalizePrice(level.price, tick);
    aggregated.set(price, (aggregated.get(price) ?? 0) + level.size);
  }

  const ladder: BookLevel[] = [];
  for (const [price, bookSize] of aggregated) {
    const size = bookSize - (ownSizes.get(price) ?? 0);
    if (size > 0) ladder.push({ price, size });
  }

  ladder.sort((a, b) => (descending ? b.price - a.price : a.price - b.price));
  return ladder;
}

export function buildLiquidityView(
  book: OrderBook,
  buyOrders: OwnOrder[],
  sellOrders: OwnOrder[],
  tick: number,
): LiquidityView {
  const bids = buildLadder(book.bids, ownSizesByPrice(buyOrders, tick), tick, true);
  const asks = buildLadder(book.asks, ownSizesByPrice(sellOrders, tick), tick, false);

  return {
    bids,
    asks,
    best_bid: bids[0]?.price ?? 0,
    best_ask: asks[0]?.price ?? 1,
  };
}
