import type { QuoteStore } from "../state/store";
import { upsertQuotes } from "../state/store";
import { fetchOddsForSport, fetchSports, type OddsApiClient, type OddsQuery } from "./odds_api";
import { normalizePayload } from "./normalize";

export interface IngestDeps {
  client: OddsApiClient;
  store: QuoteStore;
  /** Sport keys to poll; others listed by the API are ignored. */
  sports: readonly string[];
  query: OddsQuery;
  allowedBooks: readonly string[];
  now?: () => Date;
}

export interface IngestSummary {
  sportsFetched: number;
  rowsParsed: number;
  inserted: number;
  updated: number;
  pruned: number;
  failures: string[];
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * One ingestion cycle: list sports, fetch odds for the configured ones and upsert.
 * A failing sport is logged and skipped; a failing sports listing aborts the cycle.
 */
export async function runIngestCycle(deps: IngestDeps): Promise<IngestSummary> {
  const now = deps.now ?? (() => new Date());
  const wanted = new Set(deps.sports);
  const summary: IngestSummary = { sportsFetched: 0, rowsParsed: 0, inserted: 0, updated: 0, pruned: 0, failures: [] };

  const sports = await fetchSports(deps.client);
  console.log(`[ingest] Found ${sports.length} sports`);

  for (const sport of sports) {
    if (!wanted.has(sport.key)) continue;
    if (sport.key.includes("_winner")) {
      console.log(`[ingest] Skipping ${sport.key} (outrights only)`);
      continue;
    }

    try {
      const events = await fetchOddsForSport(deps.client, sport.key, deps.query);
      const rows = normalizePayload(events, deps.allowedBooks);
      const result = upsertQuotes(deps.store, rows, now().toISOString());
      summary.sportsFetched++;
      summary.rowsParsed += rows.length;
      summary.inserted += result.inserted;
      summary.updated += result.updated;
      summary.pruned += result.pruned;
      console.log(`[ingest] ${sport.key}: ${rows.length} rows (${result.inserted} new, ${result.updated} updated)`);
    } catch (e) {
      const msg = `${sport.key}: ${errorMessage(e)}`;
      summary.failures.push(msg);
      console.warn(`[ingest] Skipped ${msg}`);
    }
  }

  console.log(`[ingest] Done. ${summary.rowsParsed} rows saved from ${summary.sportsFetched} sports`);
  return summary;
}
