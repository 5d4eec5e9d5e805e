/**
 * File-based persistence: one JSON snapshot of all quotes.
 * No database server. Uses config.db.path as the snapshot file; its directory is the data dir.
 * Writes go to a temp file and are renamed into place, so readers always see a whole snapshot.
 */

import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from "fs";
import { basename, dirname, join } from "path";
import { z } from "zod";
import type { Config } from "../config/load_config";
import type { QuoteRecord, StoredQuote } from "../types";
import { parseCommenceTime } from "../quotes/quote_fields";

const DEFAULT_QUOTES_FILE = "quotes.json";

const StoredQuoteSchema = z.object({
  sportsbook: z.string().min(1),
  league: z.string(),
  event: z.string(),
  market: z.string(),
  outcome: z.string(),
  line: z.string().nullable(),
  price: z.number(),
  americanPrice: z.string().nullable(),
  commenceTime: z.string().nullable(),
  eventDate: z.string().nullable(),
  lastUpdated: z.string(),
});

export interface QuoteStore {
  dataDir: string;
  file: string;
}

/**
 * Ensure data directory exists. Returns the store location.
 * Logs where the snapshot is written.
 */
export function initStore(config: Config): QuoteStore {
  const dataDir = dirname(config.db.path);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  const store = { dataDir, file: basename(config.db.path) || DEFAULT_QUOTES_FILE };
  console.log("[store] Data directory:", dataDir);
  console.log("[store] Quotes:", quotesPath(store));
  return store;
}

function quotesPath(store: QuoteStore): string {
  return join(store.dataDir, store.file);
}

/** Identity of a quote row: one price per book, league, event, market, outcome and line. */
function quoteIdentity(q: QuoteRecord): string {
  return JSON.stringify([q.sportsbook, q.league, q.event, q.market, q.outcome, q.line]);
}

/** Load the current snapshot. Rows that fail validation are dropped. */
export function loadQuotes(store: QuoteStore): StoredQuote[] {
  const path = quotesPath(store);
  if (!existsSync(path)) return [];
  const raw = readFileSync(path, "utf-8");
  let arr: unknown;
  try {
    arr = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in quote store at ${path}: ${String(e)}`);
  }
  if (!Array.isArray(arr)) {
    throw new Error(`Quote store at ${path} is not an array`);
  }
  const out: StoredQuote[] = [];
  let dropped = 0;
  for (const row of arr) {
    const parsed = StoredQuoteSchema.safeParse(row);
    if (parsed.success) out.push(parsed.data);
    else dropped++;
  }
  if (dropped > 0) {
    console.warn(`[store] Dropped ${dropped} invalid quote rows from ${path}`);
  }
  return out;
}

/** Overwrite the snapshot with the given rows. */
function saveQuotes(store: QuoteStore, quotes: readonly StoredQuote[]): void {
  const path = quotesPath(store);
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, JSON.stringify(quotes, null, 2), "utf-8");
  renameSync(tmp, path);
}

export interface UpsertResult {
  inserted: number;
  updated: number;
  /** Stored rows dropped because their event has started. */
  pruned: number;
}

/** False once the start time has passed; rows with an unknown start are kept. */
function notStarted(q: QuoteRecord, nowMs: number): boolean {
  const start = parseCommenceTime(q.commenceTime);
  return !start.ok || start.value > nowMs;
}

/**
 * Insert new rows, or replace price/times on rows with the same identity.
 * Rows for events that have already started are dropped, stored or incoming.
 */
export function upsertQuotes(store: QuoteStore, quotes: readonly QuoteRecord[], nowIso: string): UpsertResult {
  const nowMs = Date.parse(nowIso);
  const loaded = loadQuotes(store);
  const existing = loaded.filter((q) => notStarted(q, nowMs));
  const pruned = loaded.length - existing.length;
  const index = new Map<string, number>();
  existing.forEach((q, i) => index.set(quoteIdentity(q), i));

  let inserted = 0;
  let updated = 0;
  for (const q of quotes) {
    if (!notStarted(q, nowMs)) continue;
    const id = quoteIdentity(q);
    const idx = index.get(id);
    if (idx !== undefined) {
      existing[idx] = {
        ...existing[idx],
        price: q.price,
        americanPrice: q.americanPrice,
        commenceTime: q.commenceTime,
        eventDate: q.eventDate,
        lastUpdated: nowIso,
      };
      updated++;
    } else {
      index.set(id, existing.length);
      existing.push({ ...q, lastUpdated: nowIso });
      inserted++;
    }
  }
  saveQuotes(store, existing);
  if (pruned > 0) console.log(`[store] Pruned ${pruned} rows for started events`);
  return { inserted, updated, pruned };
}

function distinct(values: Iterable<string>): string[] {
  return [...new Set([...values].filter(Boolean))].sort();
}

export function listLeagues(store: QuoteStore): string[] {
  return distinct(loadQuotes(store).map((q) => q.league.toLowerCase()));
}

export function listMarkets(store: QuoteStore): string[] {
  return distinct(loadQuotes(store).map((q) => q.market.toLowerCase()));
}

export function listSportsbooks(store: QuoteStore): string[] {
  return distinct(loadQuotes(store).map((q) => q.sportsbook));
}

/** Read-side view of the store, as used by the HTTP API. */
export interface QuoteSource {
  loadQuotes(): readonly QuoteRecord[];
  listLeagues(): string[];
  listMarkets(): string[];
  listSportsbooks(): string[];
}

export function createQuoteSource(store: QuoteStore): QuoteSource {
  return {
    loadQuotes: () => loadQuotes(store),
    listLeagues: () => listLeagues(store),
    listMarkets: () => listMarkets(store),
    listSportsbooks: () => listSportsbooks(store),
  };
}
