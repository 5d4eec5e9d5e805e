import type { QuoteRecord } from "../types";

export interface ArbMargin {
  /** Σ 1/price over the selected quotes; NaN when any price is non-positive. */
  impliedSum: number;
  /** Guaranteed return in percent (1.23 for 1.23%); 0 when there is none. */
  margin: number;
}

/**
 * Margin from staking 1/price on every outcome.
 * Arbitrage when the inverse sum is below 1.
 */
export function computeArbMargin(best: Iterable<QuoteRecord>): ArbMargin {
  let impliedSum = 0;
  for (const q of best) {
    if (!(q.price > 0)) return { impliedSum: NaN, margin: 0 };
    impliedSum += 1 / q.price;
  }
  if (impliedSum < 1) return { impliedSum, margin: (1 - impliedSum) * 100 };
  return { impliedSum, margin: 0 };
}

/**
 * Share of the total stake (percent) for a leg at `price`, so that every
 * outcome pays out the same amount.
 */
export function stakePercent(price: number, impliedSum: number): number {
  if (!(price > 0) || !(impliedSum > 0)) return 0;
  return ((1 / price) / impliedSum) * 100;
}

export function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}
