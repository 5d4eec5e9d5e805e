/**
 * Odds API events -> canonical QuoteRecords (one per book x market x outcome).
 */

import type { QuoteRecord } from "../types";
import { commenceTimeIso } from "../quotes/quote_fields";
import type { OddsApiEvent } from "./odds_api";

/** Decimal -> American display string; null when the price has no American form. */
export function decimalToAmerican(decimal: number): string | null {
  if (!Number.isFinite(decimal) || decimal <= 1) return null;
  if (decimal >= 2) return `+${Math.trunc((decimal - 1) * 100)}`;
  return String(Math.trunc(-100 / (decimal - 1)));
}

function toPrice(raw: number | string | undefined): number {
  const n = typeof raw === "number" ? raw : parseFloat(String(raw ?? ""));
  return Number.isFinite(n) ? n : 0;
}

export function normalizePayload(events: readonly OddsApiEvent[], allowedBooks: readonly string[] = []): QuoteRecord[] {
  const allow = new Set(allowedBooks);
  const rows: QuoteRecord[] = [];
  for (const ev of events) {
    const league = (ev.sport_title || ev.sport_key).toLowerCase();
    const event = `${ev.home_team} vs ${ev.away_team}`;
    const commenceTime = commenceTimeIso(ev.commence_time);
    const eventDate = commenceTime ? commenceTime.slice(0, 10) : null;

    for (const book of ev.bookmakers) {
      const sportsbook = book.title || book.key;
      if (!sportsbook) continue;
      if (allow.size > 0 && !allow.has(sportsbook)) continue;

      for (const m of book.markets) {
        const market = m.key.toLowerCase();
        if (market.includes("lay")) continue;

        for (const o of m.outcomes) {
          const price = toPrice(o.price);
          rows.push({
            sportsbook,
            league,
            event,
            market,
            outcome: o.name,
            line: o.point != null ? String(o.point) : null,
            price,
            americanPrice: decimalToAmerican(price),
            commenceTime,
            eventDate,
          });
        }
      }
    }
  }
  return rows;
}
