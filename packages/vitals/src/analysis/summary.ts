/**
 * Window summary statistics, the data handed to charting
 */

import type { MeasurementColumn, Measurements } from "../models/record.js";
import { MEASUREMENT_COLUMNS } from "../models/record.js";
import type { Thresholds } from "../models/config.js";

/**
 * Glucose band a reading falls in
 */
export type GlucoseBand = "low" | "normal" | "elevated" | "high";

/**
 * Per-column statistics
 */
export interface ColumnStats {
  count: number;
  min: number;
  max: number;
  /** Mean rounded to one decimal */
  mean: number;
}

export interface VitalsSummary {
  /** Number of rows summarised */
  recordCount: number;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
  /** Statistics for columns with at least one reading */
  columns: Partial<Record<MeasurementColumn, ColumnStats>>;
  /** Mean of the latest three glucose readings (fewer if fewer exist) */
  glucoseMovingAverage: number | null;
  glucoseBands: Record<GlucoseBand, number>;
  /** Rows with systolic or diastolic pressure at or above the hypertension lines */
  hypertensiveReadings: number;
  /** Rows with pulse above the tachycardia line */
  tachycardicReadings: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Classify a glucose value (mmol/L)
 */
export function classifyGlucose(value: number, thresholds: Thresholds): GlucoseBand {
  if (value < thresholds.glucoseLow) return "low";
  if (value < thresholds.glucoseElevated) return "normal";
  if (value < thresholds.glucoseHigh) return "elevated";
  return "high";
}

/**
 * Summarise rows given in ascending timestamp order
 */
export function summarizeVitals(
  rows: ReadonlyArray<Measurements & { timestamp: number }>,
  thresholds: Thresholds
): VitalsSummary {
  const columns: Partial<Record<MeasurementColumn, ColumnStats>> = {};

  for (const column of MEASUREMENT_COLUMNS) {
    const values = rows
      .map((row) => row[column])
      .filter((value): value is number => value !== undefined);
    if (values.length === 0) continue;

    const sum = values.reduce((a, b) => a + b, 0);
    columns[column] = {
      count: values.length,
      min: Math.min(...values),
      max: Math.max(...values),
      mean: round1(sum / values.length),
    };
  }

  const glucose = rows
    .map((row) => row.glucose)
    .filter((value): value is number => value !== undefined);
  const latest = glucose.slice(-3);
  const glucoseMovingAverage =
    latest.length > 0 ? round1(latest.reduce((a, b) => a + b, 0) / latest.length) : null;

  const glucoseBands: Record<GlucoseBand, number> = { low: 0, normal: 0, elevated: 0, high: 0 };
  for (const value of glucose) {
    glucoseBands[classifyGlucose(value, thresholds)]++;
  }

  const hypertensiveReadings = rows.filter(
    (row) =>
      (row.systolic !== undefined && row.systolic >= thresholds.hypertensionSystolic) ||
      (row.diastolic !== undefined && row.diastolic >= thresholds.hypertensionDiastolic)
  ).length;

  const tachycardicReadings = rows.filter(
    (row) => row.pulse !== undefined && row.pulse > thresholds.tachycardia
  ).length;

  return {
    recordCount: rows.length,
    firstTimestamp: rows.length > 0 ? rows[0].timestamp : null,
    lastTimestamp: rows.length > 0 ? rows[rows.length - 1].timestamp : null,
    columns,
    glucoseMovingAverage,
    glucoseBands,
    hypertensiveReadings,
    tachycardicReadings,
  };
}
