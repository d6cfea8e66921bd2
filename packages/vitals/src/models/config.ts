/**
 * Engine configuration: plausible ranges, column presets and thresholds.
 * Passed explicitly into every store and engine call.
 */

import type { MeasurementColumn } from "./record.js";

/**
 * Exclusive plausible bounds for one measurement column
 */
export interface PlausibleRange {
  min: number;
  max: number;
}

/**
 * Named subsets of measurement columns offered for viewing
 */
export type ColumnPreset = "all" | "glucose" | "blood_pressure" | "pulse" | "blood_pressure_pulse";

export const COLUMN_PRESETS = [
  "all",
  "glucose",
  "blood_pressure",
  "pulse",
  "blood_pressure_pulse",
] as const satisfies readonly ColumnPreset[];

/**
 * Reference lines used when summarising a window
 */
export interface Thresholds {
  /** Systolic reading at or above this is hypertensive (mmHg) */
  hypertensionSystolic: number;
  /** Diastolic reading at or above this is hypertensive (mmHg) */
  hypertensionDiastolic: number;
  /** Pulse above this is tachycardic (bpm) */
  tachycardia: number;
  /** Glucose below this is low (mmol/L) */
  glucoseLow: number;
  /** Glucose at or above this is elevated (mmol/L) */
  glucoseElevated: number;
  /** Glucose at or above this is high (mmol/L) */
  glucoseHigh: number;
}

export interface VitalsConfig {
  /** IANA timezone that calendar days and months are derived in */
  timezone: string;
  ranges: Record<MeasurementColumn, PlausibleRange>;
  /** Decimal places glucose values are rounded to */
  glucoseDecimals: number;
  /** Probe limit for date search before reporting INTERNAL_LIMIT */
  maxSearchSteps: number;
  columnPresets: Record<ColumnPreset, readonly MeasurementColumn[]>;
  thresholds: Thresholds;
}

export const DEFAULT_CONFIG: VitalsConfig = {
  timezone: "UTC",
  ranges: {
    systolic: { min: 20, max: 300 },
    diastolic: { min: 20, max: 300 },
    pulse: { min: 10, max: 200 },
    glucose: { min: 0, max: 30 },
  },
  glucoseDecimals: 1,
  maxSearchSteps: 1000,
  columnPresets: {
    all: ["systolic", "diastolic", "pulse", "glucose"],
    glucose: ["glucose"],
    blood_pressure: ["systolic", "diastolic"],
    pulse: ["pulse"],
    blood_pressure_pulse: ["systolic", "diastolic", "pulse"],
  },
  thresholds: {
    hypertensionSystolic: 150,
    hypertensionDiastolic: 90,
    tachycardia: 100,
    glucoseLow: 6,
    glucoseElevated: 10,
    glucoseHigh: 15,
  },
};

/**
 * Overrides accepted by createConfig; nested objects merge per key
 */
export interface ConfigOverrides {
  timezone?: string;
  ranges?: Partial<Record<MeasurementColumn, PlausibleRange>>;
  glucoseDecimals?: number;
  maxSearchSteps?: number;
  columnPresets?: Partial<Record<ColumnPreset, readonly MeasurementColumn[]>>;
  thresholds?: Partial<Thresholds>;
}

function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Merge overrides onto the defaults.
 * Throws on an unknown timezone, an inverted range or a non-positive step limit.
 */
export function createConfig(overrides: ConfigOverrides = {}): VitalsConfig {
  const config: VitalsConfig = {
    timezone: overrides.timezone ?? DEFAULT_CONFIG.timezone,
    ranges: { ...DEFAULT_CONFIG.ranges, ...overrides.ranges },
    glucoseDecimals: overrides.glucoseDecimals ?? DEFAULT_CONFIG.glucoseDecimals,
    maxSearchSteps: overrides.maxSearchSteps ?? DEFAULT_CONFIG.maxSearchSteps,
    columnPresets: { ...DEFAULT_CONFIG.columnPresets, ...overrides.columnPresets },
    thresholds: { ...DEFAULT_CONFIG.thresholds, ...overrides.thresholds },
  };

  if (!isKnownTimezone(config.timezone)) {
    throw new Error(`Unknown timezone: ${config.timezone}`);
  }
  for (const [column, range] of Object.entries(config.ranges)) {
    if (!(range.min < range.max)) {
      throw new Error(`Invalid plausible range for ${column}: (${range.min}, ${range.max})`);
    }
  }
  if (!Number.isInteger(config.maxSearchSteps) || config.maxSearchSteps < 1) {
    throw new Error(`maxSearchSteps must be a positive integer, got ${config.maxSearchSteps}`);
  }
  if (!Number.isInteger(config.glucoseDecimals) || config.glucoseDecimals < 0) {
    throw new Error(`glucoseDecimals must be a non-negative integer, got ${config.glucoseDecimals}`);
  }

  return config;
}
