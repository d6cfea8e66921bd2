/**
 * Timezone-aware calendar helpers.
 *
 * Records carry Unix millisecond timestamps; calendar days and months are
 * derived in the configured timezone so grouping does not depend on the
 * host's local zone.
 */

/**
 * Wall-clock components of a timestamp in some timezone (month is 1-12)
 */
export interface CalendarParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Time-of-day components
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

const MINUTE_MS = 60 * 1000;

/**
 * Drop seconds and milliseconds. Records are kept at minute precision,
 * the precision of the persisted file.
 */
export function truncateToMinute(timestampMs: number): number {
  return Math.floor(timestampMs / MINUTE_MS) * MINUTE_MS;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

/**
 * Break a timestamp into wall-clock parts in the given timezone
 */
export function getCalendarParts(timestampMs: number, timezone: string): CalendarParts {
  const parts = getFormatter(timezone).formatToParts(new Date(timestampMs));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value || "0", 10);

  return {
    year: part("year"),
    month: part("month"),
    day: part("day"),
    hour: part("hour"),
    minute: part("minute"),
    second: part("second"),
  };
}

/**
 * Check that year/month/day name a real calendar date
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

/**
 * Milliseconds to add to a wall-clock time read as UTC to get the instant
 */
function offsetAt(timestampMs: number, timezone: string): number {
  const local = getCalendarParts(timestampMs, timezone);
  const localAsUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second
  );
  return timestampMs - localAsUtc;
}

/**
 * Convert wall-clock parts in a timezone to Unix milliseconds.
 * Returns null when the parts do not form a valid date and time.
 */
export function toTimestamp(
  parts: Pick<CalendarParts, "year" | "month" | "day"> & Partial<CalendarParts>,
  timezone: string
): number | null {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts;
  if (!isValidCalendarDate(year, month, day)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
    return null;
  }

  const utcGuess = Date.UTC(year, month - 1, day, hour, minute, second);
  const firstOffset = offsetAt(utcGuess, timezone);
  // The offset can differ at the result when a DST change falls in between
  const secondOffset = offsetAt(utcGuess + firstOffset, timezone);

  return utcGuess + secondOffset;
}

/**
 * YYYY-MM-DD of a timestamp in the timezone
 */
export function formatDateKey(timestampMs: number, timezone: string): string {
  const { year, month, day } = getCalendarParts(timestampMs, timezone);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * YYYY-MM of a timestamp in the timezone
 */
export function formatMonthKey(timestampMs: number, timezone: string): string {
  const { year, month } = getCalendarParts(timestampMs, timezone);
  return `${pad(year, 4)}-${pad(month)}`;
}

/**
 * YYYY-MM-DD HH:MM of a timestamp in the timezone
 */
export function formatTimestamp(timestampMs: number, timezone: string): string {
  const { hour, minute } = getCalendarParts(timestampMs, timezone);
  return `${formatDateKey(timestampMs, timezone)} ${pad(hour)}:${pad(minute)}`;
}

/**
 * Parse a timestamp string into Unix milliseconds.
 *
 * Accepts ISO strings with an explicit offset, naive `YYYY-MM-DD[ HH:MM[:SS]]`
 * (space or `T` separated) and day-first `DD/MM/YYYY[ HH:MM[:SS]]`. Naive values
 * are read as wall-clock time in the timezone. Seconds are dropped.
 */
export function parseTimestamp(value: string, timezone: string): number | null {
  const timestamp = parseExactTimestamp(value, timezone);
  return timestamp === null ? null : truncateToMinute(timestamp);
}

function parseExactTimestamp(value: string, timezone: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (/^\d{4}-\d{2}-\d{2}T.*([Zz]|[+-]\d{2}:\d{2})$/.test(trimmed)) {
    const date = new Date(trimmed);
    return isNaN(date.getTime()) ? null : date.getTime();
  }

  const isoFormat = trimmed.match(
    /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/
  );
  if (isoFormat) {
    const [, year, month, day, hour = "0", minute = "0", second = "0"] = isoFormat;
    return toTimestamp(
      {
        year: parseInt(year, 10),
        month: parseInt(month, 10),
        day: parseInt(day, 10),
        hour: parseInt(hour, 10),
        minute: parseInt(minute, 10),
        second: parseInt(second, 10),
      },
      timezone
    );
  }

  const dayFirstFormat = trimmed.match(
    /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/
  );
  if (dayFirstFormat) {
    const [, day, month, year, hour = "0", minute = "0", second = "0"] = dayFirstFormat;
    return toTimestamp(
      {
        year: parseInt(year, 10),
        month: parseInt(month, 10),
        day: parseInt(day, 10),
        hour: parseInt(hour, 10),
        minute: parseInt(minute, 10),
        second: parseInt(second, 10),
      },
      timezone
    );
  }

  return null;
}

/**
 * Parse `HH:MM` (24-hour) into a time of day
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * Move a timestamp to another calendar date, keeping its time of day
 */
export function withDate(timestampMs: number, dateMs: number, timezone: string): number | null {
  const time = getCalendarParts(timestampMs, timezone);
  const date = getCalendarParts(dateMs, timezone);
  return toTimestamp(
    { year: date.year, month: date.month, day: date.day, hour: time.hour, minute: time.minute },
    timezone
  );
}

/**
 * Change the time of day of a timestamp, keeping its calendar date
 */
export function withTime(timestampMs: number, time: TimeOfDay, timezone: string): number | null {
  const { year, month, day } = getCalendarParts(timestampMs, timezone);
  return toTimestamp({ year, month, day, hour: time.hour, minute: time.minute }, timezone);
}
