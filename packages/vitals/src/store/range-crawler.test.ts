/**
 * Tests for day and month crawling
 */

import { describe, it, expect } from "vitest";
import { formatDateKey, formatMonthKey } from "../parsers/datetime.js";
import { utc, SIX_RECORDS, storeOf } from "../test/fixtures.js";
import { crawl, crawlRange } from "./range-crawler.js";

describe("crawl", () => {
  const store = storeOf(SIX_RECORDS);

  it("walks to the first record of the same day", () => {
    expect(crawl(store, 1, "earlier", "day")).toBe(0);
  });

  it("walks to the last record of the same day", () => {
    expect(crawl(store, 3, "later", "day")).toBe(4);
  });

  it("stays put at a store boundary", () => {
    expect(crawl(store, 0, "earlier", "month")).toBe(0);
    expect(crawl(store, 5, "later", "day")).toBe(5);
  });

  it("rejects an invalid granularity", () => {
    expect(() => Reflect.apply(crawl, undefined, [store, 0, "later", "week"])).toThrow(
      "Invalid granularity: week"
    );
  });

  it("rejects a start outside the store", () => {
    expect(() => crawl(store, 6, "later", "day")).toThrow(RangeError);
  });
});

describe("crawlRange", () => {
  const store = storeOf(SIX_RECORDS);

  it("spans both readings of a shared day", () => {
    expect(crawlRange(store, 0, "day")).toEqual({ first: 0, last: 1 });
    expect(crawlRange(store, 1, "day")).toEqual({ first: 0, last: 1 });
  });

  it("collapses to the start for a lone reading", () => {
    expect(crawlRange(store, 2, "day")).toEqual({ first: 2, last: 2 });
  });

  it("spans a whole month", () => {
    expect(crawlRange(store, 0, "month")).toEqual({ first: 0, last: 2 });
    expect(crawlRange(store, 4, "month")).toEqual({ first: 3, last: 5 });
  });

  it("keeps the same month of different years apart", () => {
    const twoYears = storeOf([
      { timestamp: utc(2024, 1, 15, 8, 0), pulse: 70 },
      { timestamp: utc(2025, 1, 15, 8, 0), pulse: 72 },
    ]);
    expect(crawlRange(twoYears, 0, "month")).toEqual({ first: 0, last: 0 });
  });

  it("covers exactly the positions sharing the start's day or month", () => {
    for (const granularity of ["day", "month"] as const) {
      const key = granularity === "day" ? formatDateKey : formatMonthKey;
      for (let start = 0; start < store.records.length; start++) {
        const { first, last } = crawlRange(store, start, granularity);
        const startKey = key(store.records[start].timestamp, "UTC");
        const expected = store.records
          .map((record, position) => ({ position, k: key(record.timestamp, "UTC") }))
          .filter(({ k }) => k === startKey)
          .map(({ position }) => position);

        const actual: number[] = [];
        for (let position = first; position <= last; position++) actual.push(position);
        expect(actual).toEqual(expected);
      }
    }
  });
});
