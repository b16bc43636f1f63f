/**
 * HTTP transport shared by every market task.
 *
 * Node's global fetch keeps a pooled keep-alive agent, so concurrent
 * market tasks reuse connections. Timeouts, network errors, 429 and 5xx
 * are retried with exponential backoff up to a fixed ceiling; anything
 * else surfaces immediately as an HttpError.
 */

import { config } from "./config.js";
import { HttpError } from "./errors.js";
import { log } from "./logger.js";

export interface RequestOptions {
  method?: "GET" | "POST";
  params?: Record<string, string>;
  body?: unknown;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
}

const RETRY_STATUS = new Set([429, 500, 502, 503, 504]);

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryableStatus(status: number): boolean {
  return RETRY_STATUS.has(status);
}

export async function fetchJson(url: string, options: RequestOptions = {}): Promise<unknown> {
  const {
    method = "GET",
    params,
    body,
    timeoutMs = config.httpTimeoutMs,
    retries = config.httpRetries,
    backoffMs = config.httpBackoffMs,
  } = options;

  const fullUrl = params ? `${url}?${new URLSearchParams(params)}` : url;
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) await sleep(backoffMs * 2 ** (attempt - 1));

    let resp: Response;
    try {
      resp = await fetch(fullUrl, {
        method,
        headers: { Accept: "application/json", ...(body !== undefined ? { "Content-Type": "application/json" } : {}) },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      lastError = err;
      log("warn", "http.transport_error", { url, attempt, error: String(err) });
      continue;
    }

    if (resp.ok) return resp.json();

    const text = await resp.text();
    lastError = new HttpError(resp.status, url, text);
    if (!isRetryableStatus(resp.status)) throw lastError;
    log("warn", "http.retry_status", { url, attempt, status: resp.status });
  }

  throw lastError instanceof Error ? lastError : new Error(`request to ${url} failed`);
}
