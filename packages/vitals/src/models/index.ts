/**
 * @vitals/core - Models
 *
 * Record, result and configuration types
 */

// Record types
export type {
  MeasurementColumn,
  Measurements,
  VitalsRecord,
  Granularity,
  CrawlDirection,
  SearchPrecision,
  SearchTarget,
} from "./record.js";
export { MEASUREMENT_COLUMNS } from "./record.js";

// Result variants
export type { ErrorKind, Ok, Failure, Aborted, Result } from "./result.js";
export { ok, fail, aborted, isOk } from "./result.js";

// Configuration
export type {
  PlausibleRange,
  ColumnPreset,
  Thresholds,
  VitalsConfig,
  ConfigOverrides,
} from "./config.js";
export { COLUMN_PRESETS, DEFAULT_CONFIG, createConfig } from "./config.js";
