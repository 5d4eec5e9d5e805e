/**
 * HTTP API: catalogue endpoints and the arbitrage scan.
 * Read-only; every request works on one store snapshot.
 */

import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "http";
import type { ScanDefaults } from "../config/load_config";
import type { QuoteSource } from "../state/store";
import { parseScanOptions, scanOpportunities } from "../engine";

const ALLOWED_ARBITRAGE_PARAMS: ReadonlySet<string> = new Set([
  "leagues",
  "markets",
  "sportsbooks",
  "min_margin",
  "time",
  "show_middles",
  "middle_min_width",
  "middle_min_price",
  "sort_by",
  "sort_dir",
  "page",
  "limit",
]);

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Headers": "*",
};

function normalizeStr(v: string | null | undefined): string | undefined {
  if (v == null) return undefined;
  const t = String(v).trim();
  return t === "" ? undefined : t;
}

function csv(v: string | null): string[] | undefined {
  const s = normalizeStr(v);
  if (s === undefined) return undefined;
  return s.split(",").map((x) => x.trim()).filter(Boolean);
}

/**
 * Translate query-string values into engine input. Numbers and booleans that do
 * not parse are reported here; ranges and enums are checked by the option schema.
 */
export function parseArbitrageQuery(
  params: URLSearchParams,
  defaults: ScanDefaults
): { ok: true; input: Record<string, unknown> } | { ok: false; details: string[] } {
  const details: string[] = [];
  for (const key of params.keys()) {
    if (!ALLOWED_ARBITRAGE_PARAMS.has(key)) {
      details.push(`unknown query param: ${key}`);
    }
  }
  if (details.length > 0) return { ok: false, details };

  const num = (name: string, fallback?: number): number | undefined => {
    const s = normalizeStr(params.get(name));
    if (s === undefined) return fallback;
    const n = Number(s);
    if (Number.isNaN(n)) {
      details.push(`${name} must be a number`);
      return fallback;
    }
    return n;
  };

  const bool = (name: string): boolean | undefined => {
    const s = normalizeStr(params.get(name))?.toLowerCase();
    if (s === undefined) return undefined;
    if (s === "true" || s === "1" || s === "yes") return true;
    if (s === "false" || s === "0" || s === "no") return false;
    details.push(`${name} must be true or false`);
    return undefined;
  };

  const sortBy = normalizeStr(params.get("sort_by"))?.toLowerCase();
  const sortDir = normalizeStr(params.get("sort_dir"))?.toLowerCase();

  const input = {
    leagues: csv(params.get("leagues")),
    markets: csv(params.get("markets")),
    sportsbooks: csv(params.get("sportsbooks")),
    minMarginPercent: num("min_margin", defaults.min_margin_percent),
    minLeadHours: num("time", defaults.min_lead_hours),
    showMiddles: bool("show_middles"),
    middleMinWidth: num("middle_min_width", defaults.middle_min_width),
    middleMinPrice: num("middle_min_price", defaults.middle_min_price),
    sortBy,
    sortDir,
    page: num("page"),
    limit: num("limit", defaults.default_limit),
  };
  if (details.length > 0) return { ok: false, details };
  return { ok: true, input };
}

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json", ...CORS_HEADERS });
  res.end(JSON.stringify(data));
}

export interface ArbitrageApiOptions {
  scanDefaults: ScanDefaults;
  now?: () => Date;
  /** Called when the server fails to bind or errors later; defaults to logging and exiting. */
  onServerError?: (err: Error) => void;
}

function exitOnServerError(err: Error): void {
  console.error("[api] Server error:", err.message);
  process.exit(1);
}

export function createArbitrageApi(port: number, source: QuoteSource, options: ArbitrageApiOptions) {
  const now = options.now ?? (() => new Date());

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = req.url ?? "/";
    const path = url.split("?")[0];
    const method = req.method ?? "GET";

    try {
      if (method === "OPTIONS") {
        res.writeHead(204, CORS_HEADERS);
        res.end();
        return;
      }

      if (method === "GET" && path === "/health") {
        sendJson(res, 200, { ok: true, time: now().toISOString() });
        return;
      }

      if (method === "GET" && path === "/leagues") {
        sendJson(res, 200, { leagues: source.listLeagues() });
        return;
      }

      if (method === "GET" && path === "/markets") {
        sendJson(res, 200, { markets: source.listMarkets() });
        return;
      }

      if (method === "GET" && path === "/books") {
        sendJson(res, 200, { sportsbooks: source.listSportsbooks() });
        return;
      }

      if (method === "GET" && path === "/arbitrage") {
        const params = url.includes("?") ? new URLSearchParams(url.split("?")[1]) : new URLSearchParams();
        const query = parseArbitrageQuery(params, options.scanDefaults);
        if (!query.ok) {
          sendJson(res, 400, { error: "invalid_query", details: query.details });
          return;
        }
        const parsed = parseScanOptions(query.input);
        if (!parsed.ok) {
          sendJson(res, 400, { error: "invalid_query", details: parsed.details });
          return;
        }
        const quotes = source.loadQuotes();
        const result = scanOpportunities(quotes, parsed.options, now());
        console.log(
          `[scan] ${quotes.length} quotes -> ${result.total} opportunities, ${result.middles.length} middles`
        );
        sendJson(res, 200, result);
        return;
      }

      sendJson(res, 404, { error: "Not found" });
    } catch (e) {
      console.error("[api] Request failed:", e);
      sendJson(res, 500, { error: String(e) });
    }
  });

  server.on("error", options.onServerError ?? exitOnServerError);

  server.listen(port, () => {
    console.log(`[api] Listening on port ${port}`);
  });

  return server;
}
