/**
 * Plain-text rendering of views and summaries
 */

import type { ColumnView, MeasurementColumn, VitalsConfig, VitalsSummary } from "@vitals/core";
import { MEASUREMENT_COLUMNS, formatTimestamp } from "@vitals/core";

const COLUMN_HEADINGS: Record<MeasurementColumn, string> = {
  systolic: "Sys",
  diastolic: "Dia",
  pulse: "Pulse",
  glucose: "Glucose",
};

const TIME_WIDTH = 16;
const VALUE_WIDTH = 7;

function formatValue(column: MeasurementColumn, value: number | undefined, config: VitalsConfig): string {
  if (value === undefined) return "-";
  return column === "glucose" ? value.toFixed(config.glucoseDecimals) : String(value);
}

/**
 * One heading line plus one line per row
 */
export function formatView(view: ColumnView, config: VitalsConfig): string[] {
  const heading = [
    "Date/Time".padEnd(TIME_WIDTH),
    ...view.columns.map((column) => COLUMN_HEADINGS[column].padStart(VALUE_WIDTH)),
  ].join(" ");

  const rows = view.rows.map((row) =>
    [
      formatTimestamp(row.timestamp, config.timezone).padEnd(TIME_WIDTH),
      ...view.columns.map((column) => formatValue(column, row[column], config).padStart(VALUE_WIDTH)),
    ].join(" ")
  );

  return [heading, ...rows];
}

/**
 * Candidate line for picking a record, e.g. "08:00  Sys 120, Dia 80"
 */
export function describeRecord(
  row: { timestamp: number } & Partial<Record<MeasurementColumn, number>>,
  config: VitalsConfig
): string {
  const values = MEASUREMENT_COLUMNS.flatMap((column) => {
    const value = row[column];
    return value === undefined
      ? []
      : [`${COLUMN_HEADINGS[column]} ${formatValue(column, value, config)}`];
  });
  return `${formatTimestamp(row.timestamp, config.timezone).slice(11)}  ${values.join(", ")}`;
}

export function formatSummary(summary: VitalsSummary, config: VitalsConfig): string[] {
  const { firstTimestamp, lastTimestamp } = summary;
  const lines: string[] = [];

  if (firstTimestamp === null || lastTimestamp === null) {
    lines.push(`Records: ${summary.recordCount}`);
    return lines;
  }

  lines.push(
    `Records: ${summary.recordCount} (${formatTimestamp(firstTimestamp, config.timezone)} to ${formatTimestamp(lastTimestamp, config.timezone)})`
  );

  for (const column of MEASUREMENT_COLUMNS) {
    const stats = summary.columns[column];
    if (!stats) continue;
    lines.push(
      `${COLUMN_HEADINGS[column]}: min ${stats.min}, max ${stats.max}, mean ${stats.mean} (${stats.count} readings)`
    );
  }

  if (summary.glucoseMovingAverage !== null) {
    const { low, normal, elevated, high } = summary.glucoseBands;
    lines.push(`Glucose, latest 3 average: ${summary.glucoseMovingAverage}`);
    lines.push(`Glucose bands: low ${low}, normal ${normal}, elevated ${elevated}, high ${high}`);
  }

  lines.push(`Hypertensive readings: ${summary.hypertensiveReadings}`);
  lines.push(`Tachycardic readings: ${summary.tachycardicReadings}`);
  return lines;
}
