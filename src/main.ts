/**
 * Quoter - entrypoint.
 *
 * Wires exchange (paper or live), notifier, journal, status API and the
 * scheduler; SIGINT/SIGTERM stop the loop between rounds.
 */

import type { Server } from "node:http";
import { config, enabledMarkets } from "./config.js";
import { createDashboard } from "./dashboard.js";
import * as db from "./db.js";
import { createPublicClient, createTradingClient, PolymarketExchange } from "./exchange.js";
import { log, setLogLevel } from "./logger.js";
import { createNotifier } from "./notify.js";
import { PaperExchange } from "./paper.js";
import { Scheduler } from "./scheduler.js";
import type { Exchange, MarketConfig } from "./types.js";

async function createExchange(): Promise<{ exchange: Exchange; loadMarkets: () => MarketConfig[] }> {
  if (config.paperTrade) {
    const paper = new PaperExchange(new PolymarketExchange(createPublicClient()));
    return {
      exchange: paper,
      loadMarkets: () => {
        const markets = enabledMarkets();
        for (const m of markets) paper.registerMarket(m.market_id, [m.yes_token_id, m.no_token_id]);
        return markets;
      },
    };
  }

  if (!config.privateKey || !config.proxyAddress) {
    throw new Error("PRIVATE_KEY and PROXY_ADDRESS are required for live trading");
  }
  const client = await createTradingClient();
  return { exchange: new PolymarketExchange(client), loadMarkets: () => enabledMarkets() };
}

async function main(): Promise<void> {
  setLogLevel(config.logLevel);
  log("info", "quoter.starting", {
    paper_trade: config.paperTrade,
    markets_file: config.marketsConfigPath,
    interval_s: config.scanIntervalSeconds,
    min_profit: config.minProfit,
  });

  await db.connect();
  const { exchange, loadMarkets } = await createExchange();
  const scheduler = new Scheduler({ exchange, notifier: createNotifier(), loadMarkets });

  let server: Server | null = null;
  if (config.dashboardPort > 0) {
    server = createDashboard().listen(config.dashboardPort, () => {
      log("info", "dashboard.listening", { port: config.dashboardPort });
    });
  }

  process.on("SIGINT", () => scheduler.requestShutdown());
  process.on("SIGTERM", () => scheduler.requestShutdown());

  try {
    await scheduler.start();
  } finally {
    server?.close();
    db.close();
  }
}

main().catch(err => {
  log("error", "quoter.fatal", { error: String(err) });
  db.close();
  process.exit(1);
});
