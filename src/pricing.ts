/**
 * Price levels by cumulative notional.
 *
 * Ladders are walked best to worst (bids descending, asks ascending),
 * accumulating price * size until a dollar target or a price limit is hit.
 */

import type { BookLevel } from "./types.js";

/**
 * Price at which the notional resting at or ahead of it first reaches
 * `targetValue`. Saturates at the worst level; an empty ladder yields 0 for
 * bids (no buyer) and 1 for asks (no seller).
 */
export function resolvePriceForValue(
  ladder: BookLevel[],
  targetValue: number,
  isBid: boolean,
): number {
  const best = ladder[0];
  if (!best) return isBid ? 0 : 1;
  if (targetValue <= 0) return best.price;

  let cumulative = 0;
  let lastPrice = best.price;
  for (const { price, size } of ladder) {
    lastPrice = price;
    cumulative += price * size;
    if (cumulative >= targetValue) return price;
  }
  return lastPrice;
}

/**
 * Notional swept from the best level down to `priceLimit`, including the
 * first level at or beyond the limit.
 */
export function cumulativeValueToPrice(
  ladder: BookLevel[],
  priceLimit: number,
  isBid: boolean,
): number {
  let cumulative = 0;
  for (const { price, size } of ladder) {
    cumulative += price * size;
    if (isBid ? price <= priceLimit : price >= priceLimit) break;
  }
  return cumulative;
}
