/**
 * Measurement value validation
 */

import type { MeasurementColumn, Measurements } from "../models/record.js";
import { MEASUREMENT_COLUMNS } from "../models/record.js";
import type { VitalsConfig } from "../models/config.js";
import type { Result } from "../models/result.js";
import { ok, fail } from "../models/result.js";

/**
 * Display name and unit for each measurement column
 */
export const COLUMN_INFO: Record<MeasurementColumn, { label: string; unit: string; integer: boolean }> = {
  systolic: { label: "systolic blood pressure", unit: "mmHg", integer: true },
  diastolic: { label: "diastolic blood pressure", unit: "mmHg", integer: true },
  pulse: { label: "pulse rate", unit: "bpm", integer: true },
  glucose: { label: "blood glucose level", unit: "mmol/L", integer: false },
};

/**
 * Round a glucose reading to the configured number of decimals
 */
export function roundGlucose(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Whether a value lies strictly inside the column's plausible range
 * (and is a whole number for blood pressure and pulse)
 */
export function isPlausible(column: MeasurementColumn, value: number, config: VitalsConfig): boolean {
  if (!Number.isFinite(value)) return false;
  if (COLUMN_INFO[column].integer && !Number.isInteger(value)) return false;
  const { min, max } = config.ranges[column];
  return value > min && value < max;
}

/**
 * Whether at least one measurement is present
 */
export function hasMeasurement(values: Measurements): boolean {
  return MEASUREMENT_COLUMNS.some((column) => values[column] !== undefined);
}

/**
 * Check every present value against its plausible range.
 * Glucose is rounded before the check. Absent values are dropped from the output.
 */
export function normalizeMeasurements(
  values: Measurements,
  config: VitalsConfig
): Result<Measurements> {
  const normalized: Measurements = {};

  for (const column of MEASUREMENT_COLUMNS) {
    const raw = values[column];
    if (raw === undefined) continue;

    const value = column === "glucose" ? roundGlucose(raw, config.glucoseDecimals) : raw;
    if (!isPlausible(column, value, config)) {
      const { label, unit, integer } = COLUMN_INFO[column];
      const { min, max } = config.ranges[column];
      const kind = integer ? "a whole number" : "a number";
      return fail(
        "INVALID_VALUE",
        `The ${label} must be ${kind} between ${min} and ${max} ${unit} (exclusive), got ${raw}.`
      );
    }
    normalized[column] = value;
  }

  return ok(normalized);
}
