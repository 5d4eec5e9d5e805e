import { z } from "zod";

/** Lower-cased, trimmed, de-duplicated; an empty list means "no filter". */
const FilterListSchema = z
  .array(z.string())
  .optional()
  .transform((values) => {
    if (!values) return null;
    const out = [...new Set(values.map((v) => v.trim().toLowerCase()).filter(Boolean))];
    return out.length > 0 ? out : null;
  });

const SORT_BY = ["profit", "date", "league", "event"] as const;
const SORT_DIR = ["asc", "desc"] as const;
const MAX_PAGE_LIMIT = 500;

const ScanOptionsSchema = z.object({
  leagues: FilterListSchema,
  markets: FilterListSchema,
  sportsbooks: FilterListSchema,
  /** Percent, e.g. 1.0 for 1%. */
  minMarginPercent: z.number().finite().default(0),
  /** Exclude events starting within this many hours from now. */
  minLeadHours: z.number().finite().min(0).default(0),
  showMiddles: z.boolean().default(false),
  middleMinWidth: z.number().finite().min(0).default(0.5),
  /** ~ -115 American. */
  middleMinPrice: z.number().finite().min(0).default(1.87),
  sortBy: z.enum(SORT_BY).default("profit"),
  sortDir: z.enum(SORT_DIR).default("desc"),
  page: z.number().int().min(1).default(1),
  limit: z.number().int().min(1).max(MAX_PAGE_LIMIT).default(50),
});

export type ScanOptionsInput = z.input<typeof ScanOptionsSchema>;
export type ScanOptions = z.output<typeof ScanOptionsSchema>;

export function parseScanOptions(
  input: unknown
): { ok: true; options: ScanOptions } | { ok: false; details: string[] } {
  const result = ScanOptionsSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      details: result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`),
    };
  }
  return { ok: true, options: result.data };
}
