import type { QuoteRecord } from "../types";

export const NOW = new Date("2030-06-01T12:00:00.000Z");
export const TOMORROW = "2030-06-02T00:00:00.000Z";

export function hoursFromNow(hours: number): string {
  return new Date(NOW.getTime() + hours * 3600 * 1000).toISOString();
}

export function quote(overrides: Partial<QuoteRecord> = {}): QuoteRecord {
  return {
    sportsbook: "Book1",
    league: "nba",
    event: "A vs B",
    market: "h2h",
    outcome: "A",
    line: null,
    price: 2.0,
    americanPrice: null,
    commenceTime: TOMORROW,
    eventDate: "2030-06-02",
    ...overrides,
  };
}
