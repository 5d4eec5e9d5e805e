/**
 * Buckets quotes that price the same market: (event, market, lineKey).
 *  - h2h: no line, one bucket per event.
 *  - totals: exact published total (trimmed); different totals never combine.
 *  - spreads: absolute handicap, so Team A -2.5 and Team B +2.5 share a bucket.
 */

import type { QuoteRecord } from "../types";
import { formatLineNumber, normalizeLine, parseLine } from "../quotes/quote_fields";

export interface MarketBucket<T extends QuoteRecord = QuoteRecord> {
  event: string;
  market: string;
  lineKey: string | null;
  quotes: T[];
}

export function marketOf(q: QuoteRecord): string {
  return q.market.toLowerCase();
}

/** |line| rounded to 3 decimals; the trimmed raw string when not numeric. */
export function spreadLineKey(line: string | null): string | null {
  const parsed = parseLine(line);
  if (!parsed.ok) return normalizeLine(line);
  return formatLineNumber(Math.abs(parsed.value));
}

export function lineKeyFor(q: QuoteRecord): string | null {
  const market = marketOf(q);
  if (market === "spreads") return spreadLineKey(q.line);
  if (market === "totals") return normalizeLine(q.line);
  return null;
}

function bucketKey(event: string, market: string, lineKey: string | null): string {
  return JSON.stringify([event, market, lineKey]);
}

export function groupByMarketLine<T extends QuoteRecord>(quotes: readonly T[]): Map<string, MarketBucket<T>> {
  const buckets = new Map<string, MarketBucket<T>>();
  for (const q of quotes) {
    const event = q.event;
    const market = marketOf(q);
    const lineKey = lineKeyFor(q);
    const key = bucketKey(event, market, lineKey);
    const bucket = buckets.get(key);
    if (bucket) bucket.quotes.push(q);
    else buckets.set(key, { event, market, lineKey, quotes: [q] });
  }
  return buckets;
}
