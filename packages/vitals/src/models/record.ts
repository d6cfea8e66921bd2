/**
 * Vital-sign record types
 */

/**
 * Measurement columns, in the order they are stored and displayed
 */
export const MEASUREMENT_COLUMNS = ["systolic", "diastolic", "pulse", "glucose"] as const;

/**
 * A single measurement column name
 */
export type MeasurementColumn = (typeof MEASUREMENT_COLUMNS)[number];

/**
 * Optional measurement values of one record
 */
export interface Measurements {
  /** Systolic blood pressure in mmHg */
  systolic?: number;
  /** Diastolic blood pressure in mmHg */
  diastolic?: number;
  /** Pulse rate in bpm */
  pulse?: number;
  /** Blood glucose in mmol/L, one decimal place */
  glucose?: number;
}

/**
 * One measurement event.
 * At least one measurement is present; timestamps are unique within a store.
 */
export interface VitalsRecord extends Measurements {
  /** Unix timestamp in milliseconds */
  timestamp: number;
}

/**
 * Calendar unit used to group adjacent records
 */
export type Granularity = "day" | "month";

/**
 * Direction of a crawl from a starting position
 */
export type CrawlDirection = "earlier" | "later";

/**
 * How much of a timestamp a search compares
 */
export type SearchPrecision = "date" | "datetime";

/**
 * A search for the record at a given date or exact datetime
 */
export interface SearchTarget {
  timestamp: number;
  precision: SearchPrecision;
}
