/**
 * Unit tests for the quote filter: start-time safety window and allow-lists.
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { filterQuotes, type QuoteFilterConfig } from "../engine/quote_filter";
import { NOW, hoursFromNow, quote } from "./fixtures";

const open: QuoteFilterConfig = { leagues: null, markets: null, sportsbooks: null, minLeadHours: 0 };

describe("filterQuotes start time", () => {
  it("drops quotes with no start time", () => {
    const out = filterQuotes([quote({ commenceTime: null })], open, NOW);
    assert.strictEqual(out.length, 0);
  });

  it("drops quotes whose start time cannot be parsed", () => {
    const out = filterQuotes([quote({ commenceTime: "tbd" })], open, NOW);
    assert.strictEqual(out.length, 0);
  });

  it("drops an event that started an hour ago, whatever the lead time", () => {
    const started = quote({ commenceTime: hoursFromNow(-1) });
    assert.strictEqual(filterQuotes([started], open, NOW).length, 0);
    assert.strictEqual(filterQuotes([started], { ...open, minLeadHours: 5 }, NOW).length, 0);
  });

  it("a start exactly at the cutoff is excluded", () => {
    assert.strictEqual(filterQuotes([quote({ commenceTime: NOW.toISOString() })], open, NOW).length, 0);
    assert.strictEqual(filterQuotes([quote({ commenceTime: hoursFromNow(0.25) })], open, NOW).length, 1);
  });

  it("applies minLeadHours", () => {
    const soon = quote({ commenceTime: hoursFromNow(1) });
    const later = quote({ commenceTime: hoursFromNow(3) });
    const out = filterQuotes([soon, later], { ...open, minLeadHours: 2 }, NOW);
    assert.deepStrictEqual(out, [later]);
  });

  it("reads naive timestamps as UTC", () => {
    const naive = quote({ commenceTime: "2030-06-01T13:00:00" });
    assert.strictEqual(filterQuotes([naive], open, NOW).length, 1);
    assert.strictEqual(filterQuotes([naive], { ...open, minLeadHours: 2 }, NOW).length, 0);
  });
});

describe("filterQuotes allow-lists", () => {
  const rows = [
    quote({ league: "NBA", sportsbook: "DraftKings", market: "h2h" }),
    quote({ league: "nfl", sportsbook: "FanDuel", market: "totals" }),
  ];

  it("matches league and sportsbook case-insensitively", () => {
    const byLeague = filterQuotes(rows, { ...open, leagues: new Set(["nba"]) }, NOW);
    assert.deepStrictEqual(byLeague.map((q) => q.sportsbook), ["DraftKings"]);

    const byBook = filterQuotes(rows, { ...open, sportsbooks: new Set(["fanduel"]) }, NOW);
    assert.deepStrictEqual(byBook.map((q) => q.league), ["nfl"]);
  });

  it("filters by market", () => {
    const out = filterQuotes(rows, { ...open, markets: new Set(["totals"]) }, NOW);
    assert.deepStrictEqual(out.map((q) => q.market), ["totals"]);
  });

  it("an empty set does not restrict", () => {
    const out = filterQuotes(rows, { ...open, leagues: new Set() }, NOW);
    assert.strictEqual(out.length, 2);
  });
});
