/**
 * Sportsbook arbitrage scanner: polls The Odds API into a local quote store
 * and serves arbitrage / middle scans over HTTP. Read-only; never places bets.
 *
 *   --once   run one ingestion cycle and exit
 */

import { config as loadEnv } from "dotenv";
import { findConfigPath, loadConfig, type Config } from "./config/load_config";
import { initStore, createQuoteSource, type QuoteStore } from "./state/store";
import { runIngestCycle, type IngestDeps } from "./ingest/run_ingest";
import { createArbitrageApi } from "./api/arbitrage_api";

function ingestDeps(config: Config, store: QuoteStore, apiKey: string): IngestDeps {
  return {
    client: {
      baseUrl: config.api.oddsBaseUrl,
      apiKey,
      timeoutMs: config.ingest.request_timeout_ms,
    },
    store,
    sports: config.ingest.sports,
    query: { regions: config.ingest.regions, markets: config.ingest.markets },
    allowedBooks: config.ingest.allowed_books,
  };
}

async function main(): Promise<void> {
  loadEnv();
  const configPath = findConfigPath();
  console.log("[config] Using", configPath);
  const config = loadConfig(configPath);
  const store = initStore(config);
  const apiKey = process.env.ODDS_API_KEY?.trim() ?? "";

  if (process.argv.includes("--once")) {
    if (!apiKey) throw new Error("Missing ODDS_API_KEY (set it in the environment or .env)");
    await runIngestCycle(ingestDeps(config, store, apiKey));
    return;
  }

  createArbitrageApi(config.control_api.port, createQuoteSource(store), { scanDefaults: config.scan });

  if (!apiKey) {
    console.warn("[ingest] ODDS_API_KEY not set; serving stored quotes only");
    return;
  }

  const deps = ingestDeps(config, store, apiKey);
  let running = false;

  async function tick(): Promise<void> {
    if (running) {
      console.log("[ingest] Previous cycle still running; skipping");
      return;
    }
    running = true;
    try {
      await runIngestCycle(deps);
    } catch (e) {
      console.warn("[ingest] Cycle failed:", e instanceof Error ? e.message : String(e));
    } finally {
      running = false;
    }
  }

  const intervalMs = config.ingest.poll_interval_minutes * 60 * 1000;
  await tick();
  setInterval(() => {
    void tick();
  }, intervalMs);
  console.log(`[ingest] Polling every ${config.ingest.poll_interval_minutes} min`);
}

main().catch((e) => {
  console.error("[main] Fatal:", e instanceof Error ? e.message : String(e));
  process.exit(1);
});
