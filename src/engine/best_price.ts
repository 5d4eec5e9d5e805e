import type { QuoteRecord } from "../types";
import { parseLine } from "../quotes/quote_fields";
import { marketOf } from "./market_grouper";

/**
 * Outcome key used to compare quotes inside one bucket. Spreads collapse to the
 * side of the quote's own line ("plus" for >= 0, "minus" otherwise), falling
 * back to the outcome label when the line is not numeric.
 */
export function outcomeKeyFor(q: QuoteRecord): string {
  if (marketOf(q) !== "spreads") return q.outcome;
  const line = parseLine(q.line);
  if (!line.ok) return q.outcome;
  return line.value >= 0 ? "plus" : "minus";
}

/**
 * True when `candidate` beats `current`; ties keep the first-seen quote.
 * A non-finite price never wins a slot.
 */
export function beatsPrice(candidate: QuoteRecord, current: QuoteRecord | undefined): boolean {
  if (!Number.isFinite(candidate.price)) return false;
  return current === undefined || candidate.price > current.price;
}

/** Best (max price) quote per outcome key, in first-seen key order. */
export function bestPriceByOutcome<T extends QuoteRecord>(quotes: readonly T[]): Map<string, T> {
  const best = new Map<string, T>();
  for (const q of quotes) {
    const key = outcomeKeyFor(q);
    if (beatsPrice(q, best.get(key))) best.set(key, q);
  }
  return best;
}
