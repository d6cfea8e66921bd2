/**
 * Command implementations behind the CLI.
 *
 * Each command loads the store, runs one operation and, for mutations,
 * saves on success. Terminal input and the file are passed in so the
 * commands can run against in-memory stand-ins.
 */

import type {
  ColumnPreset,
  ColumnView,
  Measurements,
  MeasurementColumn,
  RecordPatch,
  RecordSelection,
  RecordStore,
  Result,
  TimeframeRequest,
  VitalsConfig,
} from "@vitals/core";
import {
  COLUMN_PRESETS,
  MEASUREMENT_COLUMNS,
  createVitalsSession,
  fail,
  formatDateKey,
  latestPosition,
  locateCandidates,
  ok,
  parseTimeOfDay,
  parseTimestamp,
  searchByDate,
  selectColumns,
  selectTimeframe,
  summarizeVitals,
  withDate,
  withTime,
} from "@vitals/core";
import { describeRecord, formatSummary, formatView } from "./format.js";

export interface Prompt {
  /** Yes/no question */
  confirm: (question: string) => Promise<boolean>;
  /** Index of the chosen item, or null when nothing was chosen */
  pick: (items: string[], prompt: string) => Promise<number | null>;
}

export interface VitalsFile {
  path: string;
  load: () => Result<RecordStore>;
  save: (store: RecordStore) => void;
}

export type Logger = Pick<Console, "log" | "error">;

export interface CommandContext {
  config: VitalsConfig;
  file: VitalsFile;
  prompt: Prompt;
  logger: Logger;
  dryRun: boolean;
  /** Current time, for records added without --at */
  now: () => number;
}

export interface SelectionOptions {
  /** Show the most recent record */
  latest?: boolean;
  /** Date to look up */
  date?: string;
  /** Every record of the looked-up day */
  day?: boolean;
  /** Every record of the looked-up month */
  month?: boolean;
  /** N records ending at the looked-up one */
  before?: string;
  columns?: string;
}

export type MeasurementOptions = Partial<Record<"sys" | "dia" | "pulse" | "glucose", string>>;

export interface AddOptions extends MeasurementOptions {
  at?: string;
}

export interface EditOptions extends MeasurementOptions {
  newDate?: string;
  newTime?: string;
}

export interface RemoveOptions {
  yes?: boolean;
}

const OPTION_FOR_COLUMN: Record<MeasurementColumn, keyof MeasurementOptions> = {
  systolic: "sys",
  diastolic: "dia",
  pulse: "pulse",
  glucose: "glucose",
};

/** Value that clears a measurement when editing */
const CLEAR_VALUE = "none";

/**
 * Print a result and turn it into an exit code
 */
function report<T>(result: Result<T>, logger: Logger): number {
  switch (result.status) {
    case "ok":
      if (result.message) logger.log(result.message);
      return 0;
    case "aborted":
      logger.log(result.message);
      return 0;
    case "error":
      logger.error(result.message);
      return 1;
  }
}

function isColumnPreset(value: string): value is ColumnPreset {
  return COLUMN_PRESETS.some((preset) => preset === value);
}

function parseDate(value: string, config: VitalsConfig): Result<number> {
  const timestamp = parseTimestamp(value, config.timezone);
  if (timestamp === null) {
    return fail("INVALID_VALUE", `Please enter a valid date, got "${value}".`);
  }
  return ok(timestamp);
}

function parseNumber(option: string, value: string): Result<number> {
  const parsed = Number(value);
  if (!value.trim() || isNaN(parsed)) {
    return fail("INVALID_VALUE", `Please enter a number for --${option}, got "${value}".`);
  }
  return ok(parsed);
}

/**
 * Build the timeframe request from the selection options
 */
export function buildTimeframeRequest(
  store: RecordStore,
  options: SelectionOptions
): Result<TimeframeRequest> {
  let anchor: Result<number>;
  if (options.latest) {
    anchor = latestPosition(store);
  } else if (options.date) {
    const date = parseDate(options.date, store.config);
    if (date.status !== "ok") return date;
    anchor = searchByDate(store, { timestamp: date.value, precision: "date" });
  } else {
    return ok<TimeframeRequest>({ mode: "all" });
  }
  if (anchor.status !== "ok") return anchor;

  const position = anchor.value;
  if (options.before !== undefined) {
    return ok<TimeframeRequest>({ mode: "before", position, count: Number(options.before) });
  }
  if (options.month) return ok<TimeframeRequest>({ mode: "same_month", position });
  if (options.day) return ok<TimeframeRequest>({ mode: "same_day", position });
  return ok<TimeframeRequest>({ mode: "single", position });
}

function selectRows(
  store: RecordStore,
  options: SelectionOptions,
  logger: Logger
): Result<ColumnView> {
  const preset = options.columns ?? "all";
  if (!isColumnPreset(preset)) {
    return fail(
      "INVALID_VALUE",
      `Unknown column preset "${preset}". Choose one of: ${COLUMN_PRESETS.join(", ")}.`
    );
  }

  const request = buildTimeframeRequest(store, options);
  if (request.status !== "ok") return request;

  const window = selectTimeframe(store, request.value);
  if (window.status !== "ok") return window;
  logger.log(window.message);

  return selectColumns(store, window.value.positions, preset);
}

/**
 * Print the selected window
 */
export function showCommand(ctx: CommandContext, options: SelectionOptions): number {
  const loaded = ctx.file.load();
  if (loaded.status !== "ok") return report(loaded, ctx.logger);

  const view = selectRows(loaded.value, options, ctx.logger);
  if (view.status !== "ok") return report(view, ctx.logger);

  if (view.value.rows.length === 0) {
    ctx.logger.log("There are no records to show.");
    return 0;
  }
  formatView(view.value, ctx.config).forEach((line) => ctx.logger.log(line));
  return 0;
}

/**
 * Print summary statistics for the selected window
 */
export function summaryCommand(ctx: CommandContext, options: SelectionOptions): number {
  const loaded = ctx.file.load();
  if (loaded.status !== "ok") return report(loaded, ctx.logger);

  const view = selectRows(loaded.value, options, ctx.logger);
  if (view.status !== "ok") return report(view, ctx.logger);

  const summary = summarizeVitals(view.value.rows, ctx.config.thresholds);
  formatSummary(summary, ctx.config).forEach((line) => ctx.logger.log(line));
  return 0;
}

function readMeasurements(options: MeasurementOptions): Result<Measurements> {
  const values: Measurements = {};
  for (const column of MEASUREMENT_COLUMNS) {
    const option = OPTION_FOR_COLUMN[column];
    const raw = options[option];
    if (raw === undefined) continue;
    const parsed = parseNumber(option, raw);
    if (parsed.status !== "ok") return parsed;
    values[column] = parsed.value;
  }
  return ok(values);
}

function readPatch(options: EditOptions, current: number, config: VitalsConfig): Result<RecordPatch> {
  const patch: RecordPatch = {};

  let timestamp = current;
  if (options.newDate !== undefined) {
    const date = parseDate(options.newDate, config);
    if (date.status !== "ok") return date;
    const moved = withDate(timestamp, date.value, config.timezone);
    if (moved === null) return fail("INVALID_VALUE", "Please enter a valid date and time.");
    timestamp = moved;
  }
  if (options.newTime !== undefined) {
    const time = parseTimeOfDay(options.newTime);
    const moved = time === null ? null : withTime(timestamp, time, config.timezone);
    if (moved === null) {
      return fail("INVALID_VALUE", `Please enter a valid time as HH:MM, got "${options.newTime}".`);
    }
    timestamp = moved;
  }
  if (timestamp !== current) patch.timestamp = timestamp;

  for (const column of MEASUREMENT_COLUMNS) {
    const option = OPTION_FOR_COLUMN[column];
    const raw = options[option];
    if (raw === undefined) continue;
    if (raw === CLEAR_VALUE) {
      patch[column] = null;
      continue;
    }
    const parsed = parseNumber(option, raw);
    if (parsed.status !== "ok") return parsed;
    patch[column] = parsed.value;
  }

  return ok(patch);
}

function persist(ctx: CommandContext, store: RecordStore): void {
  if (ctx.dryRun) {
    ctx.logger.log("Dry run: no changes saved.");
    return;
  }
  ctx.file.save(store);
  ctx.logger.log(`Saved ${ctx.file.path}`);
}

/**
 * Add one record
 */
export function addCommand(ctx: CommandContext, options: AddOptions): number {
  const loaded = ctx.file.load();
  if (loaded.status !== "ok") return report(loaded, ctx.logger);

  let timestamp = Math.floor(ctx.now() / 60000) * 60000;
  if (options.at !== undefined) {
    const at = parseDate(options.at, ctx.config);
    if (at.status !== "ok") return report(at, ctx.logger);
    timestamp = at.value;
  }

  const values = readMeasurements(options);
  if (values.status !== "ok") return report(values, ctx.logger);

  const session = createVitalsSession(loaded.value);
  const result = session.add({ timestamp, ...values.value });
  if (result.status === "ok") persist(ctx, session.current());
  return report(result, ctx.logger);
}

/**
 * Find the record to act on: the only record of the date, or the one picked
 */
async function chooseRecord(
  ctx: CommandContext,
  store: RecordStore,
  dateText: string
): Promise<Result<RecordSelection | null>> {
  const date = parseDate(dateText, ctx.config);
  if (date.status !== "ok") return date;

  const candidates = locateCandidates(store, date.value);
  if (candidates.status !== "ok") return candidates;

  const { positions } = candidates.value;
  if (positions.length === 1) {
    return ok({ date: date.value, position: positions[0] });
  }

  const index = await ctx.prompt.pick(
    positions.map((position) => describeRecord(store.records[position], ctx.config)),
    candidates.message
  );
  if (index === null) return ok(null);
  return ok({ date: date.value, position: positions[index] });
}

/**
 * Edit a record of the given date
 */
export async function editCommand(
  ctx: CommandContext,
  dateText: string,
  options: EditOptions
): Promise<number> {
  const loaded = ctx.file.load();
  if (loaded.status !== "ok") return report(loaded, ctx.logger);
  const store = loaded.value;

  const chosen = await chooseRecord(ctx, store, dateText);
  if (chosen.status !== "ok") return report(chosen, ctx.logger);

  const session = createVitalsSession(store);
  const selection = chosen.value;
  let patch: RecordPatch = {};
  if (selection !== null) {
    const read = readPatch(options, store.records[selection.position].timestamp, ctx.config);
    if (read.status !== "ok") return report(read, ctx.logger);
    patch = read.value;
  }

  const result = session.edit(selection, patch);
  if (result.status === "ok") persist(ctx, session.current());
  return report(result, ctx.logger);
}

/**
 * Remove a record of the given date, asking first unless --yes
 */
export async function removeCommand(
  ctx: CommandContext,
  dateText: string,
  options: RemoveOptions
): Promise<number> {
  const loaded = ctx.file.load();
  if (loaded.status !== "ok") return report(loaded, ctx.logger);
  const store = loaded.value;

  const chosen = await chooseRecord(ctx, store, dateText);
  if (chosen.status !== "ok") return report(chosen, ctx.logger);

  const selection = chosen.value;
  let confirmed = options.yes ?? false;
  if (selection !== null && !confirmed) {
    const record = store.records[selection.position];
    confirmed = await ctx.prompt.confirm(
      `Remove the record for ${formatDateKey(record.timestamp, ctx.config.timezone)} ${describeRecord(record, ctx.config)}?`
    );
  }

  const session = createVitalsSession(store);
  const result = session.remove(selection, confirmed);
  if (result.status === "ok") persist(ctx, session.current());
  return report(result, ctx.logger);
}
