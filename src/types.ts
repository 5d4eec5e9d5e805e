/**
 * Shared types for the sportsbook arbitrage scanner.
 */

/** One price quote from one sportsbook, already normalized by ingestion. */
export interface QuoteRecord {
  sportsbook: string;
  league: string;
  /** Event label ("Home vs Away"); string equality is the match key. */
  event: string;
  market: string;
  outcome: string;
  /** Original formatted line; null for h2h. */
  line: string | null;
  /** Decimal odds. */
  price: number;
  americanPrice: string | null;
  /** ISO-8601; null means the start time is unknown. */
  commenceTime: string | null;
  /** YYYY-MM-DD, display only. */
  eventDate: string | null;
}

export interface StoredQuote extends QuoteRecord {
  lastUpdated: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "missing" | "unparseable" };

export interface BestOddsLeg {
  sportsbook: string;
  /** Selector key: outcome label, or "plus"/"minus" for spreads. */
  outcomeKey: string;
  outcome: string;
  price: number;
  americanPrice: string | null;
  line: string | null;
  /** Share of the total stake for an equal return on every outcome. */
  stakePercent: number;
}

export interface ArbOpportunity {
  event: string;
  league: string;
  market: string;
  /** Normalized line key; null for h2h. */
  line: string | null;
  commenceTime: string | null;
  eventDate: string | null;
  profitMargin: number;
  impliedSum: number;
  bestOdds: BestOddsLeg[];
}

export interface MiddleLeg {
  sportsbook: string;
  line: string;
  price: number;
  americanPrice: string | null;
}

export interface MiddleCandidate {
  event: string;
  league: string;
  market: "totals";
  over: MiddleLeg;
  under: MiddleLeg;
  middleWidth: number;
  commenceTime: string | null;
  eventDate: string | null;
  note: string;
}

export interface BookSummary {
  bestPriceCount: number;
  averageOfferedPrice: number | null;
}

export type BooksSummary = Record<string, BookSummary>;

export type SortBy = "profit" | "date" | "league" | "event";
export type SortDir = "asc" | "desc";

export interface ScanResponse {
  filters: {
    leagues: string[] | null;
    markets: string[] | null;
    sportsbooks: string[] | null;
    minMarginPercent: number;
    minLeadHours: number;
    showMiddles: boolean;
    middleMinWidth: number;
    middleMinPrice: number;
  };
  sort: { by: SortBy; dir: SortDir };
  page: number;
  limit: number;
  total: number;
  opportunities: ArbOpportunity[];
  middles: MiddleCandidate[];
  booksSummary: BooksSummary;
  generatedAt: string;
}
