/**
 * Window selection over the record store
 */

import type { Result } from "../models/result.js";
import { ok, fail, aborted } from "../models/result.js";
import { formatDateKey } from "../parsers/datetime.js";
import type { RecordStore } from "../store/record-store.js";
import { isPosition } from "../store/record-store.js";
import { searchByDate } from "../store/date-search.js";
import { crawlRange } from "../store/range-crawler.js";

/**
 * Caller-selected timeframe
 */
export type TimeframeRequest =
  | { mode: "all" }
  | { mode: "single"; position: number }
  | { mode: "same_day"; position: number }
  | { mode: "same_month"; position: number }
  | { mode: "before"; position: number; count: number };

export type TimeframeMode = TimeframeRequest["mode"];

/**
 * An ordered run of positions
 */
export interface Window {
  positions: number[];
  /** Number of positions actually selected */
  count: number;
  /** True when fewer records than requested were available */
  clamped: boolean;
}

function range(first: number, last: number): number[] {
  const positions: number[] = [];
  for (let position = first; position <= last; position++) {
    positions.push(position);
  }
  return positions;
}

function toWindow(positions: number[], clamped = false): Window {
  return { positions, count: positions.length, clamped };
}

function shown(count: number): string {
  return `${count} record(s) will be shown.`;
}

/**
 * Select a window of positions. A null request means the caller backed out.
 */
export function selectTimeframe(
  store: RecordStore,
  request: TimeframeRequest | null
): Result<Window> {
  if (request === null) {
    return aborted("No selection made.");
  }

  if (request.mode === "all") {
    const window = toWindow(range(0, store.records.length - 1));
    return ok(window, shown(window.count));
  }

  if (!isPosition(store, request.position)) {
    return fail("NOT_FOUND", "The selected timeframe cannot be accessed.");
  }

  switch (request.mode) {
    case "single":
      return ok(toWindow([request.position]), shown(1));

    case "same_day":
    case "same_month": {
      const granularity = request.mode === "same_day" ? "day" : "month";
      const { first, last } = crawlRange(store, request.position, granularity);
      const window = toWindow(range(first, last));
      return ok(window, shown(window.count));
    }

    case "before": {
      const { position, count } = request;
      if (!Number.isInteger(count) || count <= 0) {
        return fail("INVALID_VALUE", "Please enter a valid number of records.");
      }

      const available = position + 1;
      if (count > available) {
        const window = toWindow(range(0, position), true);
        return ok(
          window,
          `There are only ${available} record(s) before this. Only ${available} record(s) will be shown.`
        );
      }

      const window = toWindow(range(position - count + 1, position));
      return ok(window, shown(window.count));
    }
  }
}

/**
 * All records on the calendar date of `date`, for picking one to edit or remove
 */
export function locateCandidates(store: RecordStore, date: number): Result<Window> {
  const found = searchByDate(store, { timestamp: date, precision: "date" });
  if (found.status !== "ok") return found;

  const { first, last } = crawlRange(store, found.value, "day");
  return ok(
    toWindow(range(first, last)),
    `These are the entries for ${formatDateKey(date, store.config.timezone)}:`
  );
}
