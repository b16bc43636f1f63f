/**
 * Order reconciler.
 *
 * Moves the live orders on one side of one market toward the target quote
 * with as few cancels and creates as possible:
 *   1. cancel anything not at the target price
 *   2. cancel newest-first while resting notional exceeds the target
 *   3. top up the shortfall (buys in capped chunks, sells as one order)
 *
 * Nothing is retried here. A rejected call fails the market for this round
 * and the next round re-derives the plan from fresh reads.
 */

import { config, type QuotingParams } from "./config.js";
import { normalizePrice, remainingSize } from "./liquidity.js";
import { log, round } from "./logger.js";
import type {
  Exchange,
  OrderSide,
  OwnOrder,
  PlannedCancel,
  PlannedCreate,
  QuoteLeg,
  ReconciliationPlan,
} from "./types.js";

type ReconcileParams = Pick<QuotingParams, "minOrderValue" | "maxBuyChunkValue" | "excessTolerance">;

export function planReconciliation(
  orders: OwnOrder[],
  target: QuoteLeg,
  side: OrderSide,
  tick: number,
  params: ReconcileParams = config,
): ReconciliationPlan {
  const price = normalizePrice(target.price, tick);
  const cancels: PlannedCancel[] = [];

  // Step 1: wrong price
  const correct: OwnOrder[] = [];
  for (const order of orders) {
    if (normalizePrice(order.price, tick) !== price) {
      cancels.push({ order_id: order.id, reason: "price", value: remainingSize(order) * order.price });
    } else {
      correct.push(order);
    }
  }

  // Step 2: too much size, drop newest first
  correct.sort((a, b) => b.created_at - a.created_at);
  let currentValue = correct.reduce((sum, o) => sum + remainingSize(o) * price, 0);
  let kept = correct.length;

  for (const order of correct) {
    if (currentValue <= target.value + params.excessTolerance) break;
    const orderValue = remainingSize(order) * price;
    cancels.push({ order_id: order.id, reason: "excess", value: orderValue });
    currentValue -= orderValue;
    kept--;
  }

  // Step 3: top up
  const creates: PlannedCreate[] = [];
  let shortfall = target.value - currentValue;
  if (shortfall >= params.minOrderValue && price > 0) {
    if (side === "BUY") {
      while (shortfall >= params.minOrderValue) {
        const value = Math.min(shortfall, params.maxBuyChunkValue);
        creates.push({ price, size: value / price, value });
        shortfall -= value;
      }
    } else {
      creates.push({ price, size: shortfall / price, value: shortfall });
      shortfall = 0;
    }
  }

  const created = creates.reduce((sum, c) => sum + c.value, 0);

  return {
    side,
    price,
    cancels,
    creates,
    kept,
    resting_value: currentValue + created,
  };
}

/** Applies a plan; returns the number of orders resting on the side afterwards. */
export async function executePlan(
  exchange: Exchange,
  tokenId: string,
  plan: ReconciliationPlan,
): Promise<number> {
  const sideLabel = plan.side.toLowerCase();

  for (const cancel of plan.cancels) {
    await exchange.cancelOrder(cancel.order_id);
    log("info", "reconciler.order_cancelled", {
      side: sideLabel,
      order_id: cancel.order_id,
      reason: cancel.reason,
      value: round(cancel.value),
    });
  }

  for (const create of plan.creates) {
    const orderId = await exchange.createOrder(tokenId, plan.side, create.price, create.size);
    log("info", "reconciler.order_created", {
      side: sideLabel,
      order_id: orderId,
      price: create.price,
      size: round(create.size),
      value: round(create.value),
    });
  }

  return plan.kept + plan.creates.length;
}

export async function reconcile(
  exchange: Exchange,
  tokenId: string,
  orders: OwnOrder[],
  target: QuoteLeg,
  side: OrderSide,
  tick: number,
  params: ReconcileParams = config,
): Promise<number> {
  const plan = planReconciliation(orders, target, side, tick, params);
  if (plan.cancels.length > 0 || plan.creates.length > 0) {
    log("debug", "reconciler.plan", {
      token_id: tokenId,
      side: side.toLowerCase(),
      price: plan.price,
      target_value: round(target.value),
      cancels: plan.cancels.length,
      creates: plan.creates.length,
    });
  }
  return executePlan(exchange, tokenId, plan);
}
