/**
 * Opportunity-detection engine: one pure pass over a quote snapshot.
 *
 *   filter -> group -> best price -> margin -> rank/paginate
 *   filter -> books summary
 *   filter -> totals middles (optional)
 */

import type { QuoteRecord, ScanResponse } from "../types";
import { filterQuotes } from "./quote_filter";
import { groupByMarketLine } from "./market_grouper";
import { scoreBuckets } from "./arb_scorer";
import { collectBooksSummary } from "./books_summary";
import { detectTotalsMiddles } from "./middles";
import { paginate, sortMiddles, sortOpportunities } from "./ranker";
import type { ScanOptions } from "./scan_options";

export {
  parseScanOptions,
  type ScanOptions,
  type ScanOptionsInput,
} from "./scan_options";

function toSet(values: string[] | null): Set<string> | null {
  return values ? new Set(values) : null;
}

function sortedOrNull(values: string[] | null): string[] | null {
  return values ? [...values].sort() : null;
}

export function scanOpportunities(
  quotes: readonly QuoteRecord[],
  options: ScanOptions,
  now: Date = new Date()
): ScanResponse {
  const rows = filterQuotes(
    quotes,
    {
      leagues: toSet(options.leagues),
      markets: toSet(options.markets),
      sportsbooks: toSet(options.sportsbooks),
      minLeadHours: options.minLeadHours,
    },
    now
  );

  const booksSummary = collectBooksSummary(rows);

  const opportunities = sortOpportunities(
    scoreBuckets(groupByMarketLine(rows).values(), options.minMarginPercent),
    options.sortBy,
    options.sortDir
  );
  const { items, total } = paginate(opportunities, options.page, options.limit);

  const middles = options.showMiddles
    ? sortMiddles(
        detectTotalsMiddles(rows, { minWidth: options.middleMinWidth, minPrice: options.middleMinPrice })
      )
    : [];

  return {
    filters: {
      leagues: sortedOrNull(options.leagues),
      markets: sortedOrNull(options.markets),
      sportsbooks: sortedOrNull(options.sportsbooks),
      minMarginPercent: options.minMarginPercent,
      minLeadHours: options.minLeadHours,
      showMiddles: options.showMiddles,
      middleMinWidth: options.middleMinWidth,
      middleMinPrice: options.middleMinPrice,
    },
    sort: { by: options.sortBy, dir: options.sortDir },
    page: options.page,
    limit: options.limit,
    total,
    opportunities: items,
    middles,
    booksSummary,
    generatedAt: now.toISOString(),
  };
}
