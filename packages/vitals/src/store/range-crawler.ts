/**
 * Expansion from a found position to neighbours in the same day or month
 */

import type { CrawlDirection, Granularity, VitalsRecord } from "../models/record.js";
import { formatDateKey, formatMonthKey } from "../parsers/datetime.js";
import type { RecordStore } from "./record-store.js";
import { isPosition } from "./record-store.js";

/**
 * Calendar key a record is grouped by. Months include the year.
 */
export function groupKey(record: VitalsRecord, granularity: Granularity, timezone: string): string {
  switch (granularity) {
    case "day":
      return formatDateKey(record.timestamp, timezone);
    case "month":
      return formatMonthKey(record.timestamp, timezone);
    default: {
      const invalid: never = granularity;
      throw new Error(`Invalid granularity: ${String(invalid)}`);
    }
  }
}

/**
 * Farthest position in `direction` such that every record between it and
 * `start` falls in the same day (or month) as the start record.
 *
 * Throws a RangeError when `start` is not a position in the store.
 */
export function crawl(
  store: RecordStore,
  start: number,
  direction: CrawlDirection,
  granularity: Granularity
): number {
  if (!isPosition(store, start)) {
    throw new RangeError(`Position ${start} is outside the store (size ${store.records.length})`);
  }
  if (direction !== "earlier" && direction !== "later") {
    throw new Error(`Invalid crawl direction: ${String(direction)}`);
  }

  const { records, config } = store;
  const step = direction === "later" ? 1 : -1;
  let current = start;
  let currentKey = groupKey(records[current], granularity, config.timezone);

  while (true) {
    const next = current + step;
    if (next < 0 || next >= records.length) return current;

    const nextKey = groupKey(records[next], granularity, config.timezone);
    if (nextKey !== currentKey) return current;

    current = next;
    currentKey = nextKey;
  }
}

/**
 * Inclusive [first, last] range of the group around `start`
 */
export function crawlRange(
  store: RecordStore,
  start: number,
  granularity: Granularity
): { first: number; last: number } {
  return {
    first: crawl(store, start, "earlier", granularity),
    last: crawl(store, start, "later", granularity),
  };
}
