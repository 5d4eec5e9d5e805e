import type { ArbOpportunity, MiddleCandidate, SortBy, SortDir } from "../types";

function compareKeys(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function sortKey(item: ArbOpportunity, by: SortBy): number | string {
  switch (by) {
    case "date":
      return item.commenceTime ?? "";
    case "league":
      return item.league;
    case "event":
      return item.event;
    default:
      return item.profitMargin;
  }
}

/** Stable sort on one key; equal keys keep their input order in both directions. */
export function sortOpportunities(items: readonly ArbOpportunity[], by: SortBy, dir: SortDir): ArbOpportunity[] {
  const sign = dir === "desc" ? -1 : 1;
  return [...items].sort((a, b) => sign * compareKeys(sortKey(a, by), sortKey(b, by)));
}

export interface Page<T> {
  items: T[];
  total: number;
}

export function paginate<T>(items: readonly T[], page: number, limit: number): Page<T> {
  const start = (page - 1) * limit;
  return { items: items.slice(start, start + limit), total: items.length };
}

/** Widest gap first, then latest start. */
export function sortMiddles(middles: readonly MiddleCandidate[]): MiddleCandidate[] {
  return [...middles].sort((a, b) => {
    if (b.middleWidth !== a.middleWidth) return b.middleWidth - a.middleWidth;
    return compareKeys(b.commenceTime ?? "", a.commenceTime ?? "");
  });
}
