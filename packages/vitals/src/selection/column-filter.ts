/**
 * Projection of a window onto a subset of measurement columns
 */

import type { MeasurementColumn, Measurements } from "../models/record.js";
import type { ColumnPreset } from "../models/config.js";
import type { Result } from "../models/result.js";
import { ok, fail, aborted } from "../models/result.js";
import type { RecordStore } from "../store/record-store.js";
import { isPosition } from "../store/record-store.js";

/**
 * A record reduced to the selected columns, tagged with its position
 */
export interface ProjectedRow extends Measurements {
  position: number;
  timestamp: number;
}

export interface ColumnView {
  /** Selected measurement columns; the timestamp is always kept */
  columns: readonly MeasurementColumn[];
  rows: ProjectedRow[];
}

/**
 * Keep only `columns` on each row and drop rows where all of them are empty
 */
export function projectRows(
  rows: readonly ProjectedRow[],
  columns: readonly MeasurementColumn[]
): ProjectedRow[] {
  const projected: ProjectedRow[] = [];

  for (const row of rows) {
    const next: ProjectedRow = { position: row.position, timestamp: row.timestamp };
    let present = false;
    for (const column of columns) {
      const value = row[column];
      if (value !== undefined) {
        next[column] = value;
        present = true;
      }
    }
    if (present) projected.push(next);
  }

  return projected;
}

/**
 * Rows of a window reduced to a column preset. A null preset means the
 * caller backed out. The store is not modified.
 */
export function selectColumns(
  store: RecordStore,
  positions: readonly number[],
  preset: ColumnPreset | null
): Result<ColumnView> {
  if (preset === null) {
    return aborted("No selection made.");
  }

  const columns = store.config.columnPresets[preset];
  const rows: ProjectedRow[] = [];
  for (const position of positions) {
    if (!isPosition(store, position)) {
      return fail("NOT_FOUND", `Position ${position} is not in the records.`);
    }
    rows.push({ position, ...store.records[position] });
  }

  const projected = projectRows(rows, columns);
  return ok({ columns, rows: projected }, `${projected.length} record(s) will be shown.`);
}
