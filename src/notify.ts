/**
 * Operator notifications.
 *
 * Telegram when a bot token and chat id are configured, otherwise the log.
 * A failed send returns false; it never reaches the trading path.
 */

import { config } from "./config.js";
import { fetchJson } from "./http.js";
import { log } from "./logger.js";
import type { FillEvent, Notifier, PortfolioSummary } from "./types.js";

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
  ) {}

  async notify(title: string, body: string): Promise<boolean> {
    try {
      const data = await fetchJson(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
        method: "POST",
        body: { chat_id: this.chatId, text: `${title}\n\n${body}` },
        retries: 1,
      });
      return typeof data === "object" && data !== null && "ok" in data && data.ok === true;
    } catch (err) {
      log("warn", "notify.send_failed", { title, error: String(err) });
      return false;
    }
  }
}

export class LogNotifier implements Notifier {
  async notify(title: string, body: string): Promise<boolean> {
    log("info", "notify.message", { title, body });
    return true;
  }
}

export function createNotifier(): Notifier {
  if (config.telegramBotToken && config.telegramChatId) {
    return new TelegramNotifier(config.telegramBotToken, config.telegramChatId);
  }
  return new LogNotifier();
}

// ---- Messages ----

export function formatPortfolio(portfolio: PortfolioSummary): string {
  const lines = portfolio.holdings.map(h => `- ${h.title.slice(0, 30)}: ${h.size.toFixed(2)} ($${h.value.toFixed(2)})`);
  lines.push(`- Cash: $${portfolio.cash.toFixed(2)}`);
  lines.push(`Total: $${portfolio.total.toFixed(2)}`);
  return lines.join("\n");
}

export function formatFill(event: FillEvent, portfolio: PortfolioSummary | null): { title: string; body: string } {
  const title = `${event.direction === "buy" ? "Buy filled" : "Sell filled"} - ${event.market_name}`;
  const sign = event.delta > 0 ? "+" : "";
  const lines = [
    `Market: ${event.market_name}`,
    `Size change: ${sign}${event.delta.toFixed(2)}`,
    `Position: ${event.new_size.toFixed(2)} ($${event.new_value.toFixed(2)})`,
  ];
  if (portfolio) lines.push("", "Portfolio:", formatPortfolio(portfolio));
  return { title, body: lines.join("\n") };
}

export function formatFailureAlert(failures: number, error: string): { title: string; body: string } {
  return {
    title: "Consecutive round failures",
    body: `Failed rounds: ${failures}\nLast error: ${error.slice(0, 200)}`,
  };
}

export function formatStarted(intervalSeconds: number, paper: boolean): { title: string; body: string } {
  return {
    title: "Quoter started",
    body: `Mode: ${paper ? "paper" : "live"}\nInterval: ${intervalSeconds}s`,
  };
}

export function formatStopped(rounds: number): { title: string; body: string } {
  return { title: "Quoter stopped", body: `Rounds run: ${rounds}` };
}
