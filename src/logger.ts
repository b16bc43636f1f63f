/**
 * Structured logger.
 * Outputs single lines with timestamp, level, event, and key=value fields.
 */

import type { LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function envLevel(): LogLevel {
  const v = process.env.LOG_LEVEL;
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

let minLevel = LEVELS[envLevel()];

export function setLogLevel(level: LogLevel): void {
  minLevel = LEVELS[level];
}

export function formatLine(
  level: LogLevel,
  event: string,
  fields?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const parts = [`${now.toISOString()} [${level.padEnd(5)}] ${event}`];

  if (fields) {
    for (const [k, v] of Object.entries(fields)) {
      parts.push(`${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
    }
  }

  return parts.join("  ");
}

export function log(
  level: LogLevel,
  event: string,
  fields?: Record<string, unknown>,
): void {
  if (LEVELS[level] < minLevel) return;

  const line = formatLine(level, event, fields);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function round(value: number, decimals: number = 2): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}
