/**
 * @vitals/core - Parsers
 *
 * Flat-file codec, calendar helpers and value validation
 */

// Flat-file codec
export {
  VITALS_HEADERS,
  parseVitalsCsv,
  serializeVitalsCsv,
  parseCsvLine,
  createColumnMap,
  getColumn,
  type VitalsParseResult,
} from "./csv.js";

// Calendar helpers
export {
  getCalendarParts,
  isValidCalendarDate,
  toTimestamp,
  formatDateKey,
  formatMonthKey,
  formatTimestamp,
  parseTimestamp,
  parseTimeOfDay,
  withDate,
  withTime,
  truncateToMinute,
  type CalendarParts,
  type TimeOfDay,
} from "./datetime.js";

// Validation
export {
  COLUMN_INFO,
  roundGlucose,
  isPlausible,
  hasMeasurement,
  normalizeMeasurements,
} from "./validation.js";
