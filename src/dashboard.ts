/**
 * Status API.
 *
 * Express routes exposing the journal as JSON, served from the quoter's
 * own process.
 */

import express, { type Express } from "express";
import { config } from "./config.js";
import * as db from "./db.js";
import { round } from "./logger.js";

export function timeAgo(ts: number, now: number = Date.now() / 1000): string {
  const diff = now - ts;
  if (diff < 60) return `${Math.floor(diff)}s ago`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ago`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ago`;
  return `${Math.floor(diff / 86400)}d ago`;
}

export function parseDetails(details: string | null): unknown {
  if (!details) return null;
  try {
    return JSON.parse(details);
  } catch {
    return details;
  }
}

export function statusPayload(now: number = Date.now() / 1000): Record<string, unknown> {
  const markets = db.getLatestSnapshots();
  const fills = db.getRecentFills(1000);
  const positionValue = markets.reduce((sum, m) => sum + m.position_value, 0);
  const lastUpdate = markets.reduce((max, m) => Math.max(max, m.timestamp), 0);

  return {
    mode: config.paperTrade ? "PAPER" : "LIVE",
    markets: markets.length,
    position_value: round(positionValue),
    max_position_value: round(markets.reduce((sum, m) => sum + m.max_position_value, 0)),
    resting_buy_orders: markets.reduce((sum, m) => sum + m.buy_orders, 0),
    resting_sell_orders: markets.reduce((sum, m) => sum + m.sell_orders, 0),
    fills: fills.length,
    last_update: lastUpdate > 0 ? timeAgo(lastUpdate, now) : null,
  };
}

export function createDashboard(): Express {
  const app = express();

  app.get("/api/status", (_req, res) => {
    res.json(statusPayload());
  });

  app.get("/api/markets", (_req, res) => {
    res.json(db.getLatestSnapshots());
  });

  app.get("/api/fills", (_req, res) => {
    res.json(db.getRecentFills(100).map(f => ({ ...f, time_ago: timeAgo(f.timestamp) })));
  });

  app.get("/api/events", (_req, res) => {
    res.json(db.getRecentEvents(100).map(e => ({
      event_type: e.event_type,
      time_ago: timeAgo(e.timestamp),
      details: parseDetails(e.details),
    })));
  });

  return app;
}
