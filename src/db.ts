/**
 * SQLite journal via sql.js (WASM, no native deps).
 *
 * Tables: events, fills, market_snapshots. This is a record of what the
 * engine did; nothing here feeds back into quoting decisions.
 * A path of ":memory:" keeps the database off disk.
 */

import initSqlJs, { type Database as SqlJsDb, type ParamsObject } from "sql.js";
import fs from "node:fs";
import { config } from "./config.js";
import { log } from "./logger.js";
import type { FillEvent, MarketResult } from "./types.js";

let _db: SqlJsDb | null = null;
let _path: string | null = null;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS events (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  details    TEXT,
  timestamp  REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS fills (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  market_id   TEXT NOT NULL,
  market_name TEXT NOT NULL,
  delta       REAL NOT NULL,
  new_size    REAL NOT NULL,
  new_value   REAL NOT NULL,
  direction   TEXT NOT NULL,
  timestamp   REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS market_snapshots (
  id                 INTEGER PRIMARY KEY AUTOINCREMENT,
  round              INTEGER NOT NULL,
  market_id          TEXT NOT NULL,
  name               TEXT NOT NULL,
  side               TEXT NOT NULL,
  best_bid           REAL,
  best_ask           REAL,
  buy_price          REAL,
  sell_price         REAL,
  tick_size          REAL,
  position_value     REAL,
  max_position_value REAL,
  buy_orders         INTEGER,
  sell_orders        INTEGER,
  bid_value_ahead    REAL,
  ask_value_ahead    REAL,
  timestamp          REAL NOT NULL
);
`;

export interface EventRow {
  event_type: string;
  details: string | null;
  timestamp: number;
}

export interface FillRow extends FillEvent {
  timestamp: number;
}

export interface SnapshotRow extends MarketResult {
  round: number;
  timestamp: number;
}

function save(): void {
  if (!_db || !_path || _path === ":memory:") return;
  fs.writeFileSync(_path, Buffer.from(_db.export()));
}

export async function connect(dbPath: string = config.dbPath): Promise<void> {
  const SQL = await initSqlJs();

  if (dbPath !== ":memory:" && fs.existsSync(dbPath)) {
    _db = new SQL.Database(fs.readFileSync(dbPath));
  } else {
    _db = new SQL.Database();
  }
  _path = dbPath;

  _db.run(SCHEMA);
  save();
  log("info", "db.connected", { path: dbPath });
}

export function close(): void {
  if (_db) {
    save();
    _db.close();
    _db = null;
    _path = null;
  }
}

/** Runs a journal write when connected. A failed write is logged and dropped. */
export function record(what: string, write: () => void): void {
  if (!_db) return;
  try {
    write();
  } catch (err) {
    log("warn", "db.write_failed", { what, error: String(err) });
  }
}

function db(): SqlJsDb {
  if (!_db) throw new Error("Database not connected");
  return _db;
}

function query(sql: string, params: (string | number)[]): ParamsObject[] {
  const stmt = db().prepare(sql);
  stmt.bind(params);
  const rows: ParamsObject[] = [];
  while (stmt.step()) {
    rows.push(stmt.getAsObject());
  }
  stmt.free();
  return rows;
}

const num = (v: unknown): number => Number(v ?? 0);
const str = (v: unknown): string => (v === null || v === undefined ? "" : String(v));

// ---- Events ----

export function logEvent(eventType: string, details?: Record<string, unknown>): void {
  db().run(
    "INSERT INTO events (event_type, details, timestamp) VALUES (?, ?, ?)",
    [eventType, details ? JSON.stringify(details) : null, Date.now() / 1000],
  );
  save();
}

export function getRecentEvents(limit: number = 50): EventRow[] {
  return query("SELECT * FROM events ORDER BY id DESC LIMIT ?", [limit]).map(r => ({
    event_type: str(r.event_type),
    details: r.details === null ? null : str(r.details),
    timestamp: num(r.timestamp),
  }));
}

// ---- Fills ----

export function logFill(event: FillEvent): void {
  db().run(
    `INSERT INTO fills (market_id, market_name, delta, new_size, new_value, direction, timestamp)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [event.market_id, event.market_name, event.delta, event.new_size, event.new_value, event.direction, Date.now() / 1000],
  );
  save();
}

export function getRecentFills(limit: number = 100): FillRow[] {
  return query("SELECT * FROM fills ORDER BY id DESC LIMIT ?", [limit]).map(r => ({
    market_id: str(r.market_id),
    market_name: str(r.market_name),
    delta: num(r.delta),
    new_size: num(r.new_size),
    new_value: num(r.new_value),
    direction: r.direction === "sell" ? "sell" : "buy",
    timestamp: num(r.timestamp),
  }));
}

// ---- Snapshots ----

export function logSnapshots(round: number, results: MarketResult[]): void {
  const now = Date.now() / 1000;
  for (const r of results) {
    db().run(
      `INSERT INTO market_snapshots (round, market_id, name, side, best_bid, best_ask, buy_price, sell_price, tick_size,
         position_value, max_position_value, buy_orders, sell_orders, bid_value_ahead, ask_value_ahead, timestamp)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [round, r.market_id, r.name, r.side, r.best_bid, r.best_ask, r.buy_price, r.sell_price, r.tick_size,
        r.position_value, r.max_position_value, r.buy_orders, r.sell_orders, r.bid_value_ahead, r.ask_value_ahead, now],
    );
  }
  save();
}

/** Most recent snapshot per market. */
export function getLatestSnapshots(): SnapshotRow[] {
  const rows = query(
    `SELECT s.* FROM market_snapshots s
     JOIN (SELECT market_id, MAX(id) AS max_id FROM market_snapshots GROUP BY market_id) latest
       ON s.id = latest.max_id
     ORDER BY s.name`,
    [],
  );
  return rows.map(r => ({
    round: num(r.round),
    name: str(r.name),
    market_id: str(r.market_id),
    side: r.side === "yes" ? "yes" : "no",
    best_bid: num(r.best_bid),
    best_ask: num(r.best_ask),
    buy_price: num(r.buy_price),
    sell_price: num(r.sell_price),
    tick_size: num(r.tick_size),
    position_value: num(r.position_value),
    max_position_value: num(r.max_position_value),
    buy_orders: num(r.buy_orders),
    sell_orders: num(r.sell_orders),
    bid_value_ahead: num(r.bid_value_ahead),
    ask_value_ahead: num(r.ask_value_ahead),
    timestamp: num(r.timestamp),
  }));
}
