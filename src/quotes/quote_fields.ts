/**
 * Field parsing for quote lines and start times.
 * Every parser returns a ParseResult instead of throwing, so callers can tell
 * a valid 0 from a value that is missing or not numeric.
 */

import type { ParseResult } from "../types";

const NUMERIC = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Trimmed line string, or null when absent/blank. */
export function normalizeLine(raw: string | null | undefined): string | null {
  if (raw == null) return null;
  const s = String(raw).trim();
  return s === "" ? null : s;
}

export function parseLine(raw: string | null | undefined): ParseResult<number> {
  const s = normalizeLine(raw);
  if (s === null) return { ok: false, reason: "missing" };
  if (!NUMERIC.test(s)) return { ok: false, reason: "unparseable" };
  const value = Number(s);
  if (!Number.isFinite(value)) return { ok: false, reason: "unparseable" };
  return { ok: true, value };
}

/**
 * Start time in epoch ms. A date-time without zone designator is read as UTC
 * (Date would otherwise take it as local time).
 */
export function parseCommenceTime(raw: string | null | undefined): ParseResult<number> {
  if (raw == null) return { ok: false, reason: "missing" };
  const s = String(raw).trim();
  if (s === "") return { ok: false, reason: "missing" };
  const iso = NAIVE_DATETIME.test(s) && !ZONE_SUFFIX.test(s) ? `${s.replace(" ", "T")}Z` : s;
  const ms = new Date(iso).getTime();
  if (Number.isNaN(ms)) return { ok: false, reason: "unparseable" };
  return { ok: true, value: ms };
}

/** Canonical ISO form of a start time, or null when it cannot be resolved. */
export function commenceTimeIso(raw: string | null | undefined): string | null {
  const parsed = parseCommenceTime(raw);
  return parsed.ok ? new Date(parsed.value).toISOString() : null;
}

/** Round to 3 decimals and drop trailing zeros: 2.500 -> "2.5", 3.0 -> "3". */
export function formatLineNumber(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return String(rounded === 0 ? 0 : rounded);
}
