/**
 * Per-sportsbook analytics over the filtered snapshot: how often each book
 * holds the best price for an (event, market, line, outcome), and its average
 * offered price. Observational only; never filters opportunities.
 */

import type { BooksSummary, QuoteRecord } from "../types";
import { normalizeLine } from "../quotes/quote_fields";
import { beatsPrice } from "./best_price";
import { marketOf } from "./market_grouper";

export function collectBooksSummary(quotes: readonly QuoteRecord[]): BooksSummary {
  const byOutcome = new Map<string, QuoteRecord[]>();
  for (const q of quotes) {
    const key = JSON.stringify([q.event, marketOf(q), normalizeLine(q.line), q.outcome]);
    const list = byOutcome.get(key);
    if (list) list.push(q);
    else byOutcome.set(key, [q]);
  }

  const bestCounts: Record<string, number> = {};
  const priceSum: Record<string, number> = {};
  const priceCount: Record<string, number> = {};

  for (const list of byOutcome.values()) {
    let best: QuoteRecord | undefined;
    for (const q of list) {
      if (beatsPrice(q, best)) best = q;
    }
    if (best && best.sportsbook) {
      bestCounts[best.sportsbook] = (bestCounts[best.sportsbook] ?? 0) + 1;
    }

    // Non-positive prices are included in the average.
    for (const q of list) {
      if (!q.sportsbook) continue;
      priceSum[q.sportsbook] = (priceSum[q.sportsbook] ?? 0) + (Number.isFinite(q.price) ? q.price : 0);
      priceCount[q.sportsbook] = (priceCount[q.sportsbook] ?? 0) + 1;
    }
  }

  const summary: BooksSummary = {};
  const books = new Set([...Object.keys(bestCounts), ...Object.keys(priceSum)]);
  for (const book of books) {
    const n = priceCount[book] ?? 0;
    summary[book] = {
      bestPriceCount: bestCounts[book] ?? 0,
      averageOfferedPrice: n > 0 ? (priceSum[book] ?? 0) / n : null,
    };
  }
  return summary;
}
