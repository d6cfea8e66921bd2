/**
 * In-memory record store.
 *
 * Records are kept sorted ascending by timestamp. A record's position is its
 * array index, so positions are always contiguous from 0. Stores are never
 * changed in place: every mutation builds a new store from a copy.
 */

import type { VitalsRecord } from "../models/record.js";
import { MEASUREMENT_COLUMNS } from "../models/record.js";
import type { VitalsConfig } from "../models/config.js";
import type { Result } from "../models/result.js";
import { ok, fail } from "../models/result.js";
import { formatTimestamp, truncateToMinute } from "../parsers/datetime.js";
import { hasMeasurement, normalizeMeasurements } from "../parsers/validation.js";

export interface RecordStore {
  readonly config: VitalsConfig;
  readonly records: readonly VitalsRecord[];
}

/**
 * Copy a record, leaving out absent measurements
 */
export function copyRecord(record: VitalsRecord): VitalsRecord {
  const copy: VitalsRecord = { timestamp: record.timestamp };
  for (const column of MEASUREMENT_COLUMNS) {
    const value = record[column];
    if (value !== undefined) copy[column] = value;
  }
  return copy;
}

/**
 * Copies of the records, sorted ascending by timestamp
 */
export function sortRecords(records: readonly VitalsRecord[]): VitalsRecord[] {
  return records.map(copyRecord).sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Build a store from records already known to be valid and unique
 */
export function buildStore(records: readonly VitalsRecord[], config: VitalsConfig): RecordStore {
  return { config, records: sortRecords(records) };
}

export function emptyStore(config: VitalsConfig): RecordStore {
  return { config, records: [] };
}

/**
 * Load initial records into a sorted store.
 * Timestamps are cut to the minute, the precision of the persisted file.
 * Duplicate timestamps, all-empty records and implausible values are
 * reported as errors rather than dropped.
 */
export function createStore(
  records: readonly VitalsRecord[],
  config: VitalsConfig
): Result<RecordStore> {
  const sorted = sortRecords(
    records.map((record) => ({ ...record, timestamp: truncateToMinute(record.timestamp) }))
  );

  for (let i = 0; i < sorted.length; i++) {
    const record = sorted[i];
    if (!Number.isFinite(record.timestamp)) {
      return fail("INVALID_VALUE", "A record has no valid timestamp.");
    }

    const when = formatTimestamp(record.timestamp, config.timezone);
    if (i > 0 && sorted[i - 1].timestamp === record.timestamp) {
      return fail("DUPLICATE", `More than one record exists for ${when}.`, record.timestamp);
    }
    if (!hasMeasurement(record)) {
      return fail("EMPTY_RECORD", `The record for ${when} has no measurements.`, record.timestamp);
    }
    const normalized = normalizeMeasurements(record, config);
    if (normalized.status === "error") {
      return fail("INVALID_VALUE", `The record for ${when} is invalid. ${normalized.message}`, record.timestamp);
    }
  }

  return ok({ config, records: sorted }, "Records loaded successfully.");
}

/**
 * Deep copy of a store. Used for per-operation backups and the session backup.
 */
export function snapshot(store: RecordStore): RecordStore {
  return { config: store.config, records: store.records.map(copyRecord) };
}

export function storeSize(store: RecordStore): number {
  return store.records.length;
}

/**
 * Copy of the record at a position, or undefined when out of range
 */
export function recordAt(store: RecordStore, position: number): VitalsRecord | undefined {
  if (!isPosition(store, position)) return undefined;
  return copyRecord(store.records[position]);
}

export function isPosition(store: RecordStore, position: number): boolean {
  return Number.isInteger(position) && position >= 0 && position < store.records.length;
}

/**
 * Position of the most recent record
 */
export function latestPosition(store: RecordStore): Result<number> {
  const size = store.records.length;
  if (size === 0) {
    return fail("NOT_FOUND", "There are no records available.");
  }
  const when = formatTimestamp(store.records[size - 1].timestamp, store.config.timezone);
  return ok(size - 1, `The record for ${when} has been selected.`);
}

/**
 * Records in store order, copied for persistence
 */
export function toRecords(store: RecordStore): VitalsRecord[] {
  return store.records.map(copyRecord);
}
