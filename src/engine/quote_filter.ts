import type { QuoteRecord } from "../types";
import { parseCommenceTime } from "../quotes/quote_fields";

const HOUR_MS = 60 * 60 * 1000;

export interface QuoteFilterConfig {
  /** Lower-cased allow-lists; null or empty means no restriction. */
  leagues: ReadonlySet<string> | null;
  markets: ReadonlySet<string> | null;
  sportsbooks: ReadonlySet<string> | null;
  minLeadHours: number;
}

function allowed(set: ReadonlySet<string> | null, value: string): boolean {
  if (!set || set.size === 0) return true;
  return set.has(value.toLowerCase());
}

/**
 * Drop quotes that cannot be reported: unknown or unresolvable start time,
 * starting at or before now + minLeadHours, or outside the allow-lists.
 */
export function filterQuotes<T extends QuoteRecord>(
  quotes: readonly T[],
  config: QuoteFilterConfig,
  now: Date
): T[] {
  const cutoff = now.getTime() + config.minLeadHours * HOUR_MS;
  const out: T[] = [];
  for (const q of quotes) {
    const start = parseCommenceTime(q.commenceTime);
    if (!start.ok) continue;
    if (start.value <= cutoff) continue;

    if (!allowed(config.leagues, q.league)) continue;
    if (!allowed(config.markets, q.market)) continue;
    if (!allowed(config.sportsbooks, q.sportsbook)) continue;

    out.push(q);
  }
  return out;
}
