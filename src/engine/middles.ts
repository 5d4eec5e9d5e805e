/**
 * Totals middles: an Over at a lower total and an Under at a higher total,
 * possibly at different books. If the final total lands strictly between the
 * two lines both bets win. These are gap candidates, not guaranteed profit:
 * whether a result can land in the gap depends on the sport's scoring.
 */

import type { MiddleCandidate, QuoteRecord } from "../types";
import { commenceTimeIso, parseLine } from "../quotes/quote_fields";
import { beatsPrice } from "./best_price";
import { marketOf } from "./market_grouper";

export const MIDDLE_NOTE = "Totals middle candidate (not guaranteed profit).";

export interface MiddleConfig {
  minWidth: number;
  minPrice: number;
}

/** Best quote per distinct numeric line; quotes with a non-numeric line are skipped. */
function bestByLine(quotes: readonly QuoteRecord[]): Map<number, QuoteRecord> {
  const best = new Map<number, QuoteRecord>();
  for (const q of quotes) {
    const line = parseLine(q.line);
    if (!line.ok) continue;
    if (beatsPrice(q, best.get(line.value))) best.set(line.value, q);
  }
  return best;
}

function sortedLines(m: Map<number, QuoteRecord>): number[] {
  return [...m.keys()].sort((a, b) => a - b);
}

export function detectTotalsMiddles(quotes: readonly QuoteRecord[], config: MiddleConfig): MiddleCandidate[] {
  const byEvent = new Map<string, QuoteRecord[]>();
  for (const q of quotes) {
    if (marketOf(q) !== "totals") continue;
    const list = byEvent.get(q.event);
    if (list) list.push(q);
    else byEvent.set(q.event, [q]);
  }

  const candidates: MiddleCandidate[] = [];
  for (const [event, list] of byEvent) {
    const overs = list.filter((q) => q.outcome.toLowerCase().startsWith("over"));
    const unders = list.filter((q) => q.outcome.toLowerCase().startsWith("under"));
    if (overs.length === 0 || unders.length === 0) continue;

    const bestOver = bestByLine(overs);
    const bestUnder = bestByLine(unders);
    if (bestOver.size === 0 || bestUnder.size === 0) continue;

    const underLines = sortedLines(bestUnder);
    for (const lo of sortedLines(bestOver)) {
      const over = bestOver.get(lo);
      if (!over || !(over.price >= config.minPrice)) continue;
      for (const lu of underLines) {
        if (lu <= lo) continue;
        const under = bestUnder.get(lu);
        if (!under || !(under.price >= config.minPrice)) continue;

        const width = lu - lo;
        if (width < config.minWidth) continue;

        candidates.push({
          event,
          league: (over.league || under.league).toLowerCase(),
          market: "totals",
          over: { sportsbook: over.sportsbook, line: String(lo), price: over.price, americanPrice: over.americanPrice },
          under: { sportsbook: under.sportsbook, line: String(lu), price: under.price, americanPrice: under.americanPrice },
          middleWidth: width,
          commenceTime: commenceTimeIso(over.commenceTime) ?? commenceTimeIso(under.commenceTime),
          eventDate: over.eventDate ?? under.eventDate,
          note: MIDDLE_NOTE,
        });
      }
    }
  }
  return candidates;
}
