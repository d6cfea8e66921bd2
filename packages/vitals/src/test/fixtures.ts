/**
 * Shared record fixtures for store, selection and mutation tests
 */

import type { VitalsRecord } from "../models/record.js";
import { DEFAULT_CONFIG } from "../models/config.js";
import type { RecordStore } from "../store/record-store.js";
import { buildStore } from "../store/record-store.js";

/**
 * UTC timestamp from calendar parts (month is 1-12)
 */
export function utc(year: number, month: number, day: number, hour = 0, minute = 0): number {
  return Date.UTC(year, month - 1, day, hour, minute);
}

/**
 * Two readings on 5 Jan, one on 10 Feb
 */
export const THREE_RECORDS: VitalsRecord[] = [
  { timestamp: utc(2024, 1, 5, 8, 0), pulse: 70 },
  { timestamp: utc(2024, 1, 5, 20, 0), pulse: 75 },
  { timestamp: utc(2024, 2, 10, 7, 30), glucose: 6.1 },
];

/**
 * Six readings over two months:
 * 0-1 on 5 Jan, 2 on 31 Jan, 3-4 on 10 Feb, 5 on 28 Feb
 */
export const SIX_RECORDS: VitalsRecord[] = [
  { timestamp: utc(2024, 1, 5, 8, 0), systolic: 120, diastolic: 80, pulse: 70 },
  { timestamp: utc(2024, 1, 5, 20, 0), glucose: 6.1 },
  { timestamp: utc(2024, 1, 31, 9, 0), pulse: 65, glucose: 5.4 },
  { timestamp: utc(2024, 2, 10, 7, 30), systolic: 135, diastolic: 88 },
  { timestamp: utc(2024, 2, 10, 21, 0), glucose: 7.2 },
  { timestamp: utc(2024, 2, 28, 12, 0), pulse: 80 },
];

export function storeOf(records: VitalsRecord[], config = DEFAULT_CONFIG): RecordStore {
  return buildStore(records, config);
}

/**
 * True when timestamps are strictly ascending
 */
export function isStrictlyAscending(store: RecordStore): boolean {
  return store.records.every((record, i) => i === 0 || store.records[i - 1].timestamp < record.timestamp);
}
