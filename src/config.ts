/**
 * Configuration loaded from .env, plus the markets file re-read every round.
 */

import "dotenv/config";
import fs from "node:fs";
import { log } from "./logger.js";
import type { LogLevel, MarketConfig } from "./types.js";

function envStr(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v ? Number(v) : fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  if (!v) return fallback;
  return v.toLowerCase() === "true" || v === "1";
}

function envLogLevel(key: string, fallback: LogLevel): LogLevel {
  const v = process.env[key];
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : fallback;
}

export const config = {
  // Mode
  paperTrade: envBool("PAPER_TRADE", true),
  paperStartingCash: envNum("PAPER_STARTING_CASH", 100),

  // Polymarket credentials
  privateKey: envStr("PRIVATE_KEY", ""),
  proxyAddress: envStr("PROXY_ADDRESS", ""),
  chainId: envNum("CHAIN_ID", 137),

  // API URLs
  clobUrl: envStr("CLOB_URL", "https://clob.polymarket.com"),
  dataApiUrl: envStr("DATA_API_URL", "https://data-api.polymarket.com"),

  // Markets file, reloaded each round so edits apply without a restart
  marketsConfigPath: envStr("MARKETS_CONFIG", "./markets_config.json"),

  // Timing
  scanIntervalSeconds: envNum("SCAN_INTERVAL_SECONDS", 10),

  // Quoting
  minProfit: envNum("MIN_PROFIT", 0.007),          // price units
  minOrderValue: envNum("MIN_ORDER_VALUE", 5),      // dollars
  maxBuyChunkValue: envNum("MAX_BUY_CHUNK_VALUE", 10),
  excessTolerance: envNum("EXCESS_TOLERANCE", 0.01),
  fillThreshold: envNum("FILL_THRESHOLD", 0.01),    // contracts
  maxSellPrice: envNum("MAX_SELL_PRICE", 0.999),

  // Risk
  alertAfterFailures: envNum("ALERT_AFTER_FAILURES", 50),

  // Transport
  httpTimeoutMs: envNum("HTTP_TIMEOUT_MS", 10_000),
  httpRetries: envNum("HTTP_RETRIES", 3),
  httpBackoffMs: envNum("HTTP_BACKOFF_MS", 1000),

  // Alerts
  telegramBotToken: envStr("TELEGRAM_BOT_TOKEN", ""),
  telegramChatId: envStr("TELEGRAM_CHAT_ID", ""),

  // Dashboard
  dashboardPort: envNum("DASHBOARD_PORT", 8052),

  // Database
  dbPath: envStr("DB_PATH", "quoter.db"),

  // Logging
  logLevel: envLogLevel("LOG_LEVEL", "info"),
};

export type Config = typeof config;

export type QuotingParams = Pick<
  Config,
  "minProfit" | "minOrderValue" | "maxBuyChunkValue" | "excessTolerance" | "fillThreshold" | "maxSellPrice"
>;

// ---- Markets file ----

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parseMarket(raw: unknown): MarketConfig | null {
  if (!isRecord(raw)) return null;

  const { name, market_id, yes_token_id, no_token_id, trade_side, enabled, max_position_value } = raw;
  if (typeof market_id !== "string" || !market_id) return null;
  if (typeof yes_token_id !== "string" || !yes_token_id) return null;
  if (typeof no_token_id !== "string" || !no_token_id) return null;
  if (trade_side !== "yes" && trade_side !== "no") return null;

  const maxValue = Number(max_position_value);
  if (!Number.isFinite(maxValue) || maxValue < 0) return null;

  return {
    name: typeof name === "string" && name ? name : market_id,
    market_id,
    yes_token_id,
    no_token_id,
    trade_side,
    enabled: enabled === true,
    max_position_value: maxValue,
  };
}

/**
 * Reads the markets file. Unreadable or non-JSON files throw; a malformed
 * entry is skipped with a warning.
 */
export function loadMarkets(path: string = config.marketsConfigPath): MarketConfig[] {
  const data: unknown = JSON.parse(fs.readFileSync(path, "utf-8"));
  if (!isRecord(data) || !Array.isArray(data.markets)) {
    throw new Error(`${path}: expected an object with a "markets" array`);
  }

  const markets: MarketConfig[] = [];
  data.markets.forEach((raw: unknown, index: number) => {
    const market = parseMarket(raw);
    if (!market) {
      log("warn", "config.invalid_market", { path, index });
      return;
    }
    markets.push(market);
  });
  return markets;
}

export function enabledMarkets(path: string = config.marketsConfigPath): MarketConfig[] {
  return loadMarkets(path).filter(m => m.enabled);
}

export function tradedToken(market: MarketConfig): string {
  return market.trade_side === "yes" ? market.yes_token_id : market.no_token_id;
}
