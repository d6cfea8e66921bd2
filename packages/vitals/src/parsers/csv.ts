/**
 * Flat-file codec for vitals records
 *
 * The persisted table has the header `datetime,sys,dia,pulse,glucose`.
 * Empty cells are absent values.
 */

import type { Measurements, MeasurementColumn, VitalsRecord } from "../models/record.js";
import { MEASUREMENT_COLUMNS } from "../models/record.js";
import type { VitalsConfig } from "../models/config.js";
import { parseTimestamp, formatTimestamp } from "./datetime.js";
import { hasMeasurement, normalizeMeasurements } from "./validation.js";

/**
 * Column headers of the persisted table
 */
export const VITALS_HEADERS = ["datetime", "sys", "dia", "pulse", "glucose"] as const;

const HEADER_FOR_COLUMN: Record<MeasurementColumn, string> = {
  systolic: "sys",
  diastolic: "dia",
  pulse: "pulse",
  glucose: "glucose",
};

/**
 * Parse result
 */
export interface VitalsParseResult {
  records: VitalsRecord[];
  /** One message per rejected line, prefixed with its 1-based line number */
  errors: string[];
}

/**
 * Parse a CSV line, handling quoted values
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "," && !inQuotes) {
      values.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  values.push(current.trim());
  return values;
}

/**
 * Create column index map from header
 */
export function createColumnMap(header: string[]): Map<string, number> {
  const map = new Map<string, number>();
  header.forEach((col, idx) => {
    const normalized = col.toLowerCase().replace(/[^a-z0-9]/g, "");
    map.set(normalized, idx);
  });
  return map;
}

/**
 * Get column value by possible names
 */
export function getColumn(
  row: string[],
  colMap: Map<string, number>,
  ...names: string[]
): string {
  for (const name of names) {
    const normalized = name.toLowerCase().replace(/[^a-z0-9]/g, "");
    const idx = colMap.get(normalized);
    if (idx !== undefined && row[idx] !== undefined) {
      return row[idx];
    }
  }
  return "";
}

const COLUMN_ALIASES: Record<MeasurementColumn, string[]> = {
  systolic: ["sys", "systolic"],
  diastolic: ["dia", "diastolic"],
  pulse: ["pulse", "heartrate"],
  glucose: ["glucose", "bloodglucose"],
};

/**
 * Parse the persisted table into records.
 * Lines that cannot be read are skipped and reported in `errors`.
 */
export function parseVitalsCsv(content: string, config: VitalsConfig): VitalsParseResult {
  const records: VitalsRecord[] = [];
  const errors: string[] = [];
  const lines = content.replace(/\r\n/g, "\n").trim().split("\n");
  if (lines.length <= 1) return { records, errors };

  const colMap = createColumnMap(parseCsvLine(lines[0]));

  for (let i = 1; i < lines.length; i++) {
    const lineNo = i + 1;
    if (!lines[i].trim()) continue;

    const row = parseCsvLine(lines[i]);
    const rawTimestamp = getColumn(row, colMap, "datetime", "timestamp", "date");
    const timestamp = parseTimestamp(rawTimestamp, config.timezone);
    if (timestamp === null) {
      errors.push(`Line ${lineNo}: unreadable datetime "${rawTimestamp}"`);
      continue;
    }

    const values: Measurements = {};
    let unreadable: string | null = null;
    for (const column of MEASUREMENT_COLUMNS) {
      const cell = getColumn(row, colMap, ...COLUMN_ALIASES[column]);
      if (!cell) continue;
      const value = Number(cell);
      if (isNaN(value)) {
        unreadable = `Line ${lineNo}: unreadable ${HEADER_FOR_COLUMN[column]} "${cell}"`;
        break;
      }
      values[column] = value;
    }
    if (unreadable) {
      errors.push(unreadable);
      continue;
    }

    if (!hasMeasurement(values)) {
      errors.push(`Line ${lineNo}: no measurements recorded`);
      continue;
    }

    const normalized = normalizeMeasurements(values, config);
    if (normalized.status !== "ok") {
      errors.push(`Line ${lineNo}: ${normalized.message}`);
      continue;
    }

    records.push({ timestamp, ...normalized.value });
  }

  return { records, errors };
}

/**
 * Write records as the persisted table, in the order given
 */
export function serializeVitalsCsv(
  records: readonly VitalsRecord[],
  config: VitalsConfig
): string {
  const lines: string[] = [VITALS_HEADERS.join(",")];

  for (const record of records) {
    const cells = [formatTimestamp(record.timestamp, config.timezone)];
    for (const column of MEASUREMENT_COLUMNS) {
      const value = record[column];
      if (value === undefined) {
        cells.push("");
      } else if (column === "glucose") {
        cells.push(value.toFixed(config.glucoseDecimals));
      } else {
        cells.push(String(value));
      }
    }
    lines.push(cells.join(","));
  }

  return lines.join("\n") + "\n";
}
