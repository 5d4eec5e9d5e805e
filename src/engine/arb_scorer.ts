import type { ArbOpportunity, BestOddsLeg, QuoteRecord } from "../types";
import { commenceTimeIso, normalizeLine } from "../quotes/quote_fields";
import type { MarketBucket } from "./market_grouper";
import { bestPriceByOutcome } from "./best_price";
import { computeArbMargin, roundTo, stakePercent } from "./margin";

/**
 * Spread markets are assumed two-sided. A bucket quoting more than two outcome
 * labels (e.g. a draw leg) cannot be collapsed by line sign and is not scored.
 */
export function isMultiWaySpread(bucket: MarketBucket): boolean {
  if (bucket.market !== "spreads") return false;
  const labels = new Set(bucket.quotes.map((q) => q.outcome));
  return labels.size > 2;
}

/** Score one bucket; null when it is not a reportable opportunity. */
export function scoreBucket<T extends QuoteRecord>(
  bucket: MarketBucket<T>,
  minMarginPercent: number
): ArbOpportunity | null {
  if (bucket.quotes.length === 0 || isMultiWaySpread(bucket)) return null;

  const best = bestPriceByOutcome(bucket.quotes);
  if (best.size < 2) return null;

  const { impliedSum, margin } = computeArbMargin(best.values());
  if (margin <= 0 || margin < minMarginPercent) return null;

  const bestOdds: BestOddsLeg[] = [];
  for (const [outcomeKey, q] of best) {
    bestOdds.push({
      sportsbook: q.sportsbook,
      outcomeKey,
      outcome: q.outcome,
      price: q.price,
      americanPrice: q.americanPrice,
      line: normalizeLine(q.line),
      stakePercent: stakePercent(q.price, impliedSum),
    });
  }

  const sample = bucket.quotes[0];
  return {
    event: bucket.event,
    league: sample.league.toLowerCase(),
    market: bucket.market,
    line: bucket.lineKey,
    commenceTime: commenceTimeIso(sample.commenceTime),
    eventDate: sample.eventDate,
    profitMargin: roundTo(margin, 3),
    impliedSum,
    bestOdds,
  };
}

export function scoreBuckets<T extends QuoteRecord>(
  buckets: Iterable<MarketBucket<T>>,
  minMarginPercent: number
): ArbOpportunity[] {
  const out: ArbOpportunity[] = [];
  for (const bucket of buckets) {
    const opp = scoreBucket(bucket, minMarginPercent);
    if (opp) out.push(opp);
  }
  return out;
}
