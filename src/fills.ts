/**
 * Fill tracker.
 *
 * Infers fills from position size changes between rounds. One slot per
 * market id holding the last size seen; the first sighting only records a
 * baseline. Slots live in memory, so a restart costs one notification.
 */

import { config } from "./config.js";
import type { FillEvent, MarketConfig, Position } from "./types.js";

export class FillTracker {
  private lastSizes = new Map<string, number>();
  private readonly threshold: number;

  constructor(threshold: number = config.fillThreshold) {
    this.threshold = threshold;
  }

  observe(market: MarketConfig, position: Position): FillEvent | null {
    const previous = this.lastSizes.get(market.market_id);
    this.lastSizes.set(market.market_id, position.size);

    if (previous === undefined) return null;

    const delta = position.size - previous;
    if (Math.abs(delta) <= this.threshold) return null;

    return {
      market_id: market.market_id,
      market_name: market.name,
      delta,
      new_size: position.size,
      new_value: position.current_value,
      direction: delta > 0 ? "buy" : "sell",
    };
  }

  lastSize(marketId: string): number | undefined {
    return this.lastSizes.get(marketId);
  }

  get trackedMarkets(): number {
    return this.lastSizes.size;
  }
}
