import { request } from "undici";
import { z } from "zod";

export interface OddsApiClient {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

const SportSchema = z.object({
  key: z.string(),
  title: z.string().optional().default(""),
  active: z.boolean().optional().default(true),
  has_outrights: z.boolean().optional().default(false),
});

const OutcomeSchema = z.object({
  name: z.string().optional().default(""),
  price: z.union([z.number(), z.string()]).optional(),
  point: z.number().nullable().optional(),
});

const BookmakerSchema = z.object({
  key: z.string().optional().default(""),
  title: z.string().optional().default(""),
  markets: z
    .array(
      z.object({
        key: z.string().optional().default("h2h"),
        outcomes: z.array(OutcomeSchema).optional().default([]),
      })
    )
    .optional()
    .default([]),
});

const OddsEventSchema = z.object({
  id: z.string().optional(),
  sport_key: z.string().optional().default(""),
  sport_title: z.string().optional().default(""),
  commence_time: z.string().nullable().optional(),
  home_team: z.string().optional().default(""),
  away_team: z.string().optional().default(""),
  bookmakers: z.array(BookmakerSchema).optional().default([]),
});

type OddsApiSport = z.infer<typeof SportSchema>;
export type OddsApiEvent = z.infer<typeof OddsEventSchema>;

export interface OddsQuery {
  regions: string;
  markets: string[];
}

function buildUrl(client: OddsApiClient, path: string, params: Record<string, string>): string {
  const qs = new URLSearchParams({ ...params, apiKey: client.apiKey });
  return `${client.baseUrl.replace(/\/$/, "")}${path}?${qs.toString()}`;
}

/** The `message` field of an error body, else the start of the raw text. */
function upstreamMessage(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text.slice(0, 200);
  }
  if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
    return parsed.message;
  }
  return text.slice(0, 200);
}

async function getJson(client: OddsApiClient, path: string, params: Record<string, string> = {}): Promise<unknown> {
  const { statusCode, body } = await request(buildUrl(client, path, params), {
    method: "GET",
    headersTimeout: client.timeoutMs,
    bodyTimeout: client.timeoutMs,
  });
  if (statusCode !== 200) {
    const text = await body.text();
    throw new Error(`Odds API returned ${statusCode} for ${path}: ${upstreamMessage(text)}`);
  }
  return body.json();
}

function parseList<T extends z.ZodTypeAny>(schema: T, json: unknown, what: string): z.infer<T>[] {
  const result = z.array(schema).safeParse(json);
  if (!result.success) {
    const msg = result.error.issues
      .slice(0, 5)
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new Error(`Unexpected ${what} payload: ${msg}`);
  }
  return result.data;
}

export async function fetchSports(client: OddsApiClient): Promise<OddsApiSport[]> {
  return parseList(SportSchema, await getJson(client, "/sports/"), "sports");
}

export async function fetchOddsForSport(
  client: OddsApiClient,
  sportKey: string,
  query: OddsQuery
): Promise<OddsApiEvent[]> {
  const json = await getJson(client, `/sports/${encodeURIComponent(sportKey)}/odds`, {
    regions: query.regions,
    markets: query.markets.join(","),
    oddsFormat: "decimal",
  });
  return parseList(OddsEventSchema, json, `odds (${sportKey})`);
}
