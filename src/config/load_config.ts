import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";

const MarketKeySchema = z.enum(["h2h", "spreads", "totals"]);

const ConfigSchema = z.object({
  api: z.object({
    oddsBaseUrl: z.string().url(),
  }),
  ingest: z.object({
    /** Odds API sport keys to poll, e.g. "baseball_mlb". */
    sports: z.array(z.string().min(1)).min(1),
    regions: z.string().min(1).optional().default("us"),
    markets: z.array(MarketKeySchema).min(1).optional().default(["h2h", "spreads", "totals"]),
    /** Sportsbook titles to keep; empty keeps every book. */
    allowed_books: z.array(z.string().min(1)).optional().default([]),
    poll_interval_minutes: z.number().positive(),
    request_timeout_ms: z.number().int().positive().optional().default(20_000),
  }),
  scan: z
    .object({
      min_margin_percent: z.number().finite().optional().default(0),
      min_lead_hours: z.number().min(0).optional().default(0),
      middle_min_width: z.number().min(0).optional().default(0.5),
      middle_min_price: z.number().min(0).optional().default(1.87),
      default_limit: z.number().int().min(1).max(500).optional().default(50),
    })
    .optional()
    .default({
      min_margin_percent: 0,
      min_lead_hours: 0,
      middle_min_width: 0.5,
      middle_min_price: 1.87,
      default_limit: 50,
    }),
  db: z.object({
    path: z.string(),
  }),
  control_api: z
    .object({
      port: z.number().int().min(0).max(65535),
    })
    .optional()
    .default({ port: 8000 }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScanDefaults = Config["scan"];

/** First existing config file from the project root or src/config. */
export function findConfigPath(): string {
  const cwd = process.cwd();
  const candidates = [
    join(cwd, "config.json"),
    join(cwd, "src", "config", "config.json"),
    join(cwd, "src", "config", "config.example.json"),
    join(__dirname, "config.json"),
    join(__dirname, "config.example.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error(
    `No scanner config found; copy src/config/config.example.json to ./config.json. Looked in: ${candidates.join(", ")}`
  );
}

export function parseConfig(data: unknown, source = "config"): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const msg = issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Config validation failed (${source}): ${msg}`);
  }
  return result.data;
}

export function loadConfig(configPath: string = findConfigPath()): Config {
  const raw = readFileSync(configPath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in config at ${configPath}: ${String(e)}`);
  }
  return parseConfig(data, configPath);
}
