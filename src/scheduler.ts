/**
 * Market scheduler.
 *
 * Each round: load enabled markets -> run every market's cycle in parallel
 * -> log a summary -> sleep. A market that throws is reported and skipped
 * for the round; its siblings carry on. Only a failure of the round itself
 * (e.g. unreadable markets file) counts toward the operator alert.
 */

import { config, enabledMarkets } from "./config.js";
import * as db from "./db.js";
import { FillTracker } from "./fills.js";
import { log, round } from "./logger.js";
import { processMarket, type MarketContext } from "./market.js";
import { formatFailureAlert, formatStarted, formatStopped } from "./notify.js";
import type {
  Exchange,
  MarketConfig,
  MarketOutcome,
  MarketResult,
  Notifier,
} from "./types.js";

export interface SchedulerOptions {
  exchange: Exchange;
  notifier: Notifier;
  loadMarkets?: () => MarketConfig[];
  intervalSeconds?: number;
  alertAfterFailures?: number;
  fills?: FillTracker;
  context?: Partial<Pick<MarketContext, "params">>;
}

export class Scheduler {
  private readonly ctx: MarketContext;
  private readonly loadMarkets: () => MarketConfig[];
  private readonly intervalSeconds: number;
  private readonly alertAfterFailures: number;
  private running = false;
  private shutdownRequested = false;
  private _rounds = 0;
  private _consecutiveFailures = 0;
  private _lastOutcomes: MarketOutcome[] = [];

  constructor(options: SchedulerOptions) {
    this.ctx = {
      exchange: options.exchange,
      notifier: options.notifier,
      fills: options.fills ?? new FillTracker(options.context?.params?.fillThreshold),
      params: options.context?.params,
    };
    this.loadMarkets = options.loadMarkets ?? (() => enabledMarkets());
    this.intervalSeconds = options.intervalSeconds ?? config.scanIntervalSeconds;
    this.alertAfterFailures = options.alertAfterFailures ?? config.alertAfterFailures;
  }

  get rounds(): number {
    return this._rounds;
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures;
  }

  get lastOutcomes(): MarketOutcome[] {
    return this._lastOutcomes;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Runs every market once, concurrently. Never throws for a single market. */
  async runCycle(markets: MarketConfig[]): Promise<MarketOutcome[]> {
    return Promise.all(markets.map(async (market): Promise<MarketOutcome> => {
      try {
        return { ok: true, result: await processMarket(this.ctx, market) };
      } catch (err) {
        log("error", "scheduler.market_error", { market: market.name, error: String(err) });
        return { ok: false, failure: { name: market.name, market_id: market.market_id, error: String(err) } };
      }
    }));
  }

  /** One full round. Returns false when the round itself failed. */
  async runRound(): Promise<boolean> {
    this._rounds++;
    const roundNo = this._rounds;
    const started = Date.now();

    try {
      const markets = this.loadMarkets();
      if (markets.length === 0) {
        log("info", "scheduler.no_markets", { round: roundNo });
      }

      const outcomes = await this.runCycle(markets);
      this._lastOutcomes = outcomes;
      this.report(roundNo, outcomes);

      const results = outcomes.flatMap(o => (o.ok ? [o.result] : []));
      db.record("snapshots", () => db.logSnapshots(roundNo, results));

      log("info", "scheduler.round_complete", {
        round: roundNo,
        markets: markets.length,
        failed: outcomes.length - results.length,
        elapsed_ms: Date.now() - started,
      });

      this._consecutiveFailures = 0;
      return true;
    } catch (err) {
      this._consecutiveFailures++;
      log("error", "scheduler.round_error", {
        round: roundNo,
        consecutive: this._consecutiveFailures,
        error: String(err),
      });
      db.record("round_failed", () => db.logEvent("round_failed", {
        round: roundNo,
        consecutive: this._consecutiveFailures,
        error: String(err),
      }));

      if (this._consecutiveFailures === this.alertAfterFailures) {
        const alert = formatFailureAlert(this._consecutiveFailures, String(err));
        await this.ctx.notifier.notify(alert.title, alert.body);
      }
      return false;
    }
  }

  async start(): Promise<void> {
    log("info", "scheduler.starting", {
      interval_s: this.intervalSeconds,
      alert_after: this.alertAfterFailures,
    });
    const started = formatStarted(this.intervalSeconds, config.paperTrade);
    await this.ctx.notifier.notify(started.title, started.body);
    db.record("scheduler_start", () => db.logEvent("scheduler_start", { interval_s: this.intervalSeconds }));

    this.running = true;
    try {
      while (!this.shutdownRequested) {
        await this.runRound();
        if (this.shutdownRequested) break;
        await this.sleep(this.intervalSeconds);
      }
    } finally {
      this.running = false;
      log("info", "scheduler.stopped", { rounds: this._rounds });
      db.record("scheduler_stop", () => db.logEvent("scheduler_stop", { rounds: this._rounds }));
      const stopped = formatStopped(this._rounds);
      await this.ctx.notifier.notify(stopped.title, stopped.body);
    }
  }

  requestShutdown(): void {
    log("info", "scheduler.shutdown_requested");
    this.shutdownRequested = true;
  }

  private report(roundNo: number, outcomes: MarketOutcome[]): void {
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        log("warn", "scheduler.market_skipped", { round: roundNo, market: outcome.failure.name });
        continue;
      }
      log("info", "scheduler.market", summaryFields(outcome.result));
    }
  }

  private sleep(seconds: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(done, seconds * 1000);
      // Check shutdown more frequently
      const check = setInterval(() => {
        if (this.shutdownRequested) done();
      }, 200);

      function done(): void {
        clearTimeout(timer);
        clearInterval(check);
        resolve();
      }
    });
  }
}

export function summaryFields(r: MarketResult): Record<string, unknown> {
  const spread = r.sell_price - r.buy_price;
  return {
    name: r.name,
    side: r.side.toUpperCase(),
    bid: r.best_bid,
    ask: r.best_ask,
    buy: r.buy_price,
    sell: r.sell_price,
    spread: round(spread, 4),
    spread_pct: r.buy_price > 0 ? round((spread / r.buy_price) * 100) : 0,
    position: `${round(r.position_value, 1)}/${r.max_position_value}`,
    position_pct: r.max_position_value > 0 ? round((r.position_value / r.max_position_value) * 100, 0) : 0,
    buy_orders: r.buy_orders,
    sell_orders: r.sell_orders,
  };
}
