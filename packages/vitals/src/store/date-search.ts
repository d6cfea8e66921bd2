/**
 * Binary search for a record at a target date or datetime.
 *
 * Tracks [low, high] bounds over the sorted store instead of copying it.
 * When several records share the target date, the position returned is
 * whichever one the search probes first; use the crawler to get all of them.
 */

import type { SearchTarget, VitalsRecord } from "../models/record.js";
import type { Result } from "../models/result.js";
import { ok, fail } from "../models/result.js";
import { formatDateKey, formatTimestamp } from "../parsers/datetime.js";
import type { RecordStore } from "./record-store.js";

function compareToTarget(record: VitalsRecord, target: SearchTarget, timezone: string): number {
  if (target.precision === "datetime") {
    return Math.sign(record.timestamp - target.timestamp);
  }
  const recordDate = formatDateKey(record.timestamp, timezone);
  const targetDate = formatDateKey(target.timestamp, timezone);
  if (recordDate === targetDate) return 0;
  return recordDate > targetDate ? 1 : -1;
}

function describeTarget(target: SearchTarget, timezone: string): string {
  return target.precision === "datetime"
    ? formatTimestamp(target.timestamp, timezone)
    : formatDateKey(target.timestamp, timezone);
}

/**
 * Find the position of a record matching the target.
 *
 * Returns NOT_FOUND when no record matches, and INTERNAL_LIMIT when the
 * search has not converged after `config.maxSearchSteps` probes.
 */
export function searchByDate(store: RecordStore, target: SearchTarget): Result<number> {
  const { records, config } = store;
  const label = describeTarget(target, config.timezone);

  let low = 0;
  let high = records.length - 1;
  let steps = 0;

  while (low <= high) {
    if (steps >= config.maxSearchSteps) {
      return fail(
        "INTERNAL_LIMIT",
        `Search for ${label} did not converge after ${steps} steps. The records may be out of order.`,
        target.timestamp
      );
    }
    steps++;

    // Low median when the range has an even length
    const middle = Math.floor((low + high) / 2);
    const comparison = compareToTarget(records[middle], target, config.timezone);

    if (comparison > 0) {
      high = middle - 1;
    } else if (comparison < 0) {
      low = middle + 1;
    } else {
      return ok(middle, `${label} has been selected.`);
    }
  }

  return fail("NOT_FOUND", `No record found for ${label}.`, target.timestamp);
}
