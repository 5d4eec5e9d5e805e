/**
 * End-to-end tests for scanOpportunities over small quote snapshots.
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { parseScanOptions, scanOpportunities, type ScanOptions, type ScanOptionsInput } from "../engine";
import { MIDDLE_NOTE } from "../engine/middles";
import { NOW, hoursFromNow, quote } from "./fixtures";

function options(input: ScanOptionsInput = {}): ScanOptions {
  const parsed = parseScanOptions(input);
  if (!parsed.ok) throw new Error(parsed.details.join("; "));
  return parsed.options;
}

const h2hArb = [
  quote({ outcome: "A", price: 2.1, sportsbook: "Book1" }),
  quote({ outcome: "B", price: 1.8, sportsbook: "Book1" }),
  quote({ outcome: "A", price: 1.9, sportsbook: "Book2" }),
  quote({ outcome: "B", price: 2.05, sportsbook: "Book2" }),
];

const noArb = [
  quote({ event: "C vs D", outcome: "C", price: 1.9, sportsbook: "Book1" }),
  quote({ event: "C vs D", outcome: "D", price: 1.9, sportsbook: "Book2" }),
];

describe("scanOpportunities", () => {
  it("finds a two-book h2h arbitrage with proportional stakes", () => {
    const result = scanOpportunities([...h2hArb, ...noArb], options(), NOW);
    assert.strictEqual(result.total, 1);
    const [opp] = result.opportunities;
    assert.strictEqual(opp.event, "A vs B");
    assert.strictEqual(opp.league, "nba");
    assert.strictEqual(opp.market, "h2h");
    assert.strictEqual(opp.line, null);
    assert.strictEqual(opp.commenceTime, "2030-06-02T00:00:00.000Z");
    assert.strictEqual(opp.profitMargin, 3.6);
    assert.deepStrictEqual(
      opp.bestOdds.map((l) => [l.outcomeKey, l.sportsbook, l.price]),
      [
        ["A", "Book1", 2.1],
        ["B", "Book2", 2.05],
      ]
    );
    const stakeTotal = opp.bestOdds.reduce((s, l) => s + l.stakePercent, 0);
    assert.ok(Math.abs(stakeTotal - 100) < 1e-9);
  });

  it("min margin is inclusive", () => {
    assert.strictEqual(scanOpportunities(h2hArb, options({ minMarginPercent: 3.6 }), NOW).total, 1);
    assert.strictEqual(scanOpportunities(h2hArb, options({ minMarginPercent: 3.7 }), NOW).total, 0);
  });

  it("excludes events that start inside the lead window", () => {
    const soon = h2hArb.map((q) => ({ ...q, commenceTime: hoursFromNow(1) }));
    assert.strictEqual(scanOpportunities(soon, options(), NOW).total, 1);
    assert.strictEqual(scanOpportunities(soon, options({ minLeadHours: 2 }), NOW).total, 0);
  });

  it("a single outcome is never an opportunity", () => {
    const oneSided = [
      quote({ outcome: "A", price: 50, sportsbook: "Book1" }),
      quote({ outcome: "A", price: 40, sportsbook: "Book2" }),
    ];
    assert.strictEqual(scanOpportunities(oneSided, options(), NOW).total, 0);
  });

  it("combines opposite spread sides across books", () => {
    const spreads = [
      quote({ market: "spreads", outcome: "A", line: "-2.5", price: 2.1, sportsbook: "Book1" }),
      quote({ market: "spreads", outcome: "B", line: "+2.5", price: 2.05, sportsbook: "Book2" }),
    ];
    const result = scanOpportunities(spreads, options(), NOW);
    assert.strictEqual(result.total, 1);
    assert.strictEqual(result.opportunities[0].line, "2.5");
    assert.deepStrictEqual(
      result.opportunities[0].bestOdds.map((l) => [l.outcomeKey, l.line]),
      [
        ["minus", "-2.5"],
        ["plus", "+2.5"],
      ]
    );
  });

  it("does not report a spread bucket with three outcome labels", () => {
    const threeWay = [
      quote({ market: "spreads", outcome: "A", line: "-0.5", price: 3, sportsbook: "Book1" }),
      quote({ market: "spreads", outcome: "B", line: "+0.5", price: 3, sportsbook: "Book2" }),
      quote({ market: "spreads", outcome: "Draw", line: "+0.5", price: 3, sportsbook: "Book3" }),
    ];
    assert.strictEqual(scanOpportunities(threeWay, options(), NOW).total, 0);
  });

  it("totals at different lines are not an arbitrage", () => {
    const totals = [
      quote({ market: "totals", outcome: "Over", line: "47.5", price: 2.2, sportsbook: "Book1" }),
      quote({ market: "totals", outcome: "Under", line: "49.5", price: 2.2, sportsbook: "Book2" }),
    ];
    const result = scanOpportunities(totals, options({ showMiddles: true }), NOW);
    assert.strictEqual(result.total, 0);
    assert.strictEqual(result.middles.length, 1);
    assert.strictEqual(result.middles[0].note, MIDDLE_NOTE);
  });

  it("middles are only computed when asked for", () => {
    const totals = [
      quote({ market: "totals", outcome: "Over", line: "47.5", price: 1.91 }),
      quote({ market: "totals", outcome: "Under", line: "49.5", price: 1.91, sportsbook: "Book2" }),
    ];
    assert.deepStrictEqual(scanOpportunities(totals, options(), NOW).middles, []);
    assert.strictEqual(scanOpportunities(totals, options({ showMiddles: true }), NOW).middles.length, 1);
  });

  it("a page past the end is empty but keeps the total", () => {
    const result = scanOpportunities(h2hArb, options({ page: 2, limit: 1 }), NOW);
    assert.deepStrictEqual(result.opportunities, []);
    assert.strictEqual(result.total, 1);
    assert.strictEqual(result.page, 2);
    assert.strictEqual(result.limit, 1);
  });

  it("applies the sportsbook filter before pricing", () => {
    const result = scanOpportunities(h2hArb, options({ sportsbooks: ["BOOK1"] }), NOW);
    assert.strictEqual(result.total, 0);
    assert.deepStrictEqual(Object.keys(result.booksSummary), ["Book1"]);
  });

  it("echoes normalised filters and stamps generatedAt", () => {
    const result = scanOpportunities(h2hArb, options({ leagues: ["NFL", " nba ", "nba", ""] }), NOW);
    assert.deepStrictEqual(result.filters.leagues, ["nba", "nfl"]);
    assert.strictEqual(result.filters.markets, null);
    assert.deepStrictEqual(result.sort, { by: "profit", dir: "desc" });
    assert.strictEqual(result.generatedAt, "2030-06-01T12:00:00.000Z");
  });

  it("books summary covers the filtered snapshot", () => {
    const result = scanOpportunities(h2hArb, options(), NOW);
    assert.deepStrictEqual(result.booksSummary, {
      Book1: { bestPriceCount: 1, averageOfferedPrice: (2.1 + 1.8) / 2 },
      Book2: { bestPriceCount: 1, averageOfferedPrice: (1.9 + 2.05) / 2 },
    });
  });
});

describe("parseScanOptions", () => {
  it("fills defaults", () => {
    const opts = options();
    assert.strictEqual(opts.minMarginPercent, 0);
    assert.strictEqual(opts.middleMinWidth, 0.5);
    assert.strictEqual(opts.middleMinPrice, 1.87);
    assert.strictEqual(opts.limit, 50);
    assert.strictEqual(opts.leagues, null);
  });

  it("rejects out-of-range values", () => {
    const bad = parseScanOptions({ page: 0, limit: 501, minLeadHours: -1, sortBy: "volume" });
    assert.strictEqual(bad.ok, false);
    if (!bad.ok) {
      assert.deepStrictEqual(
        bad.details.map((d) => d.split(":")[0]).sort(),
        ["limit", "minLeadHours", "page", "sortBy"]
      );
    }
  });
});
