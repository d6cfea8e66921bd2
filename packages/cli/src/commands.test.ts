import { describe, it, expect, vi, beforeEach } from "vitest";
import type { RecordStore, VitalsRecord } from "@vitals/core";
import { DEFAULT_CONFIG, buildStore, ok } from "@vitals/core";
import type { CommandContext } from "./commands.js";
import {
  addCommand,
  buildTimeframeRequest,
  editCommand,
  removeCommand,
  showCommand,
  summaryCommand,
} from "./commands.js";

const RECORDS: VitalsRecord[] = [
  { timestamp: Date.UTC(2024, 0, 5, 8, 0), systolic: 120, diastolic: 80 },
  { timestamp: Date.UTC(2024, 0, 5, 20, 0), glucose: 6.1 },
  { timestamp: Date.UTC(2024, 1, 10, 7, 30), pulse: 64 },
];

function createContext(records: VitalsRecord[] = RECORDS) {
  let saved: RecordStore | null = null;
  const log = vi.fn();
  const error = vi.fn();
  const confirm = vi.fn(async () => true);
  const pick = vi.fn(async (): Promise<number | null> => 1);

  const ctx: CommandContext = {
    config: DEFAULT_CONFIG,
    file: {
      path: "vitals.csv",
      load: () => ok(buildStore(records, DEFAULT_CONFIG)),
      save: (store) => {
        saved = store;
      },
    },
    prompt: { confirm, pick },
    logger: { log, error },
    dryRun: false,
    now: () => Date.UTC(2024, 2, 1, 9, 30, 45),
  };

  return { ctx, log, error, confirm, pick, saved: () => saved };
}

function logged(log: { mock: { calls: unknown[][] } }): unknown[] {
  return log.mock.calls.map((call) => call[0]);
}

describe("buildTimeframeRequest", () => {
  const store = buildStore(RECORDS, DEFAULT_CONFIG);

  it("selects everything without a date", () => {
    expect(buildTimeframeRequest(store, {})).toEqual(ok({ mode: "all" }));
  });

  it("anchors on the latest record", () => {
    expect(buildTimeframeRequest(store, { latest: true, before: "2" })).toEqual(
      ok({ mode: "before", position: 2, count: 2 })
    );
  });

  it("anchors on the looked-up date", () => {
    expect(buildTimeframeRequest(store, { date: "2024-02-10", month: true })).toEqual(
      ok({ mode: "same_month", position: 2 })
    );
  });

  it("reports an unreadable date", () => {
    const result = buildTimeframeRequest(store, { date: "soon" });
    expect(result.status === "error" && result.message).toBe('Please enter a valid date, got "soon".');
  });
});

describe("showCommand", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("prints the records of a day", () => {
    const { ctx, log } = createContext();

    const code = showCommand(ctx, { date: "05/01/2024", day: true, columns: "glucose" });

    expect(code).toBe(0);
    expect(logged(log)).toEqual([
      "2 record(s) will be shown.",
      "Date/Time        Glucose",
      "2024-01-05 20:00     6.1",
    ]);
  });

  it("says so when the columns leave nothing to show", () => {
    const { ctx, log } = createContext();

    const code = showCommand(ctx, { latest: true, columns: "glucose" });

    expect(code).toBe(0);
    expect(logged(log)).toEqual(["1 record(s) will be shown.", "There are no records to show."]);
  });

  it("fails for a date without records", () => {
    const { ctx, error } = createContext();

    expect(showCommand(ctx, { date: "2024-01-06" })).toBe(1);
    expect(error).toHaveBeenCalledWith("No record found for 2024-01-06.");
  });

  it("fails for an unknown column preset", () => {
    const { ctx, error } = createContext();

    expect(showCommand(ctx, { columns: "weight" })).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'Unknown column preset "weight". Choose one of: all, glucose, blood_pressure, pulse, blood_pressure_pulse.'
    );
  });

  it("fails when the file cannot be loaded", () => {
    const { ctx, error } = createContext();
    ctx.file.load = () => ({ status: "error", kind: "DUPLICATE", message: "broken" });

    expect(showCommand(ctx, {})).toBe(1);
    expect(error).toHaveBeenCalledWith("broken");
  });
});

describe("summaryCommand", () => {
  it("prints the summary of the window", () => {
    const { ctx, log } = createContext();

    expect(summaryCommand(ctx, { columns: "blood_pressure" })).toBe(0);
    expect(logged(log)).toEqual([
      "3 record(s) will be shown.",
      "Records: 1 (2024-01-05 08:00 to 2024-01-05 08:00)",
      "Sys: min 120, max 120, mean 120 (1 readings)",
      "Dia: min 80, max 80, mean 80 (1 readings)",
      "Hypertensive readings: 0",
      "Tachycardic readings: 0",
    ]);
  });
});

describe("addCommand", () => {
  it("adds a record and saves the file", () => {
    const { ctx, log, saved } = createContext();

    const code = addCommand(ctx, { at: "2024-01-20 09:15", sys: "128", dia: "84" });

    expect(code).toBe(0);
    expect(saved()?.records[2]).toEqual({
      timestamp: Date.UTC(2024, 0, 20, 9, 15),
      systolic: 128,
      diastolic: 84,
    });
    expect(logged(log)).toEqual([
      "Saved vitals.csv",
      "The record for 2024-01-20 09:15 has been successfully added.",
    ]);
  });

  it("uses the current minute without --at", () => {
    const { ctx, saved } = createContext();

    addCommand(ctx, { glucose: "5.4" });

    expect(saved()?.records[3]).toEqual({ timestamp: Date.UTC(2024, 2, 1, 9, 30), glucose: 5.4 });
  });

  it("does not save on a dry run", () => {
    const { ctx, log, saved } = createContext();
    ctx.dryRun = true;

    expect(addCommand(ctx, { at: "2024-01-20 09:15", pulse: "70" })).toBe(0);
    expect(saved()).toBeNull();
    expect(logged(log)[0]).toBe("Dry run: no changes saved.");
  });

  it("rejects a duplicate without saving", () => {
    const { ctx, error, saved } = createContext();

    expect(addCommand(ctx, { at: "2024-01-05 08:00", pulse: "70" })).toBe(1);
    expect(error).toHaveBeenCalledWith("A record for 2024-01-05 08:00 already exists.");
    expect(saved()).toBeNull();
  });

  it("treats a time with seconds as its minute", () => {
    const { ctx, error, saved } = createContext();

    expect(addCommand(ctx, { at: "2024-01-05 08:00:30", pulse: "70" })).toBe(1);
    expect(error).toHaveBeenCalledWith("A record for 2024-01-05 08:00 already exists.");
    expect(saved()).toBeNull();
  });

  it("rejects a value that is not a number", () => {
    const { ctx, error } = createContext();

    expect(addCommand(ctx, { at: "2024-01-20 09:15", pulse: "fast" })).toBe(1);
    expect(error).toHaveBeenCalledWith('Please enter a number for --pulse, got "fast".');
  });
});

describe("editCommand", () => {
  it("asks which record to edit when the date has several", async () => {
    const { ctx, pick, saved } = createContext();

    const code = await editCommand(ctx, "2024-01-05", { glucose: "6.4", newTime: "21:00" });

    expect(code).toBe(0);
    expect(pick).toHaveBeenCalledWith(
      ["08:00  Sys 120, Dia 80", "20:00  Glucose 6.1"],
      "These are the entries for 2024-01-05:"
    );
    expect(saved()?.records[1]).toEqual({ timestamp: Date.UTC(2024, 0, 5, 21, 0), glucose: 6.4 });
  });

  it("edits the only record of a date without asking", async () => {
    const { ctx, pick, saved } = createContext();

    const code = await editCommand(ctx, "2024-02-10", { pulse: "none", sys: "118", newDate: "2024-02-11" });

    expect(code).toBe(0);
    expect(pick).not.toHaveBeenCalled();
    expect(saved()?.records[2]).toEqual({ timestamp: Date.UTC(2024, 1, 11, 7, 30), systolic: 118 });
  });

  it("makes no changes when nothing is picked", async () => {
    const { ctx, pick, log, saved } = createContext();
    pick.mockResolvedValueOnce(null);

    expect(await editCommand(ctx, "2024-01-05", { pulse: "70" })).toBe(0);
    expect(logged(log)).toEqual(["No selection made. No changes will be made."]);
    expect(saved()).toBeNull();
  });

  it("refuses to clear the last measurement", async () => {
    const { ctx, error } = createContext();

    expect(await editCommand(ctx, "2024-02-10", { pulse: "none" })).toBe(1);
    expect(error).toHaveBeenCalledWith("A valid record must contain at least one entry.");
  });
});

describe("removeCommand", () => {
  it("removes after confirmation", async () => {
    const { ctx, confirm, saved } = createContext();

    const code = await removeCommand(ctx, "2024-02-10", {});

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledWith("Remove the record for 2024-02-10 07:30  Pulse 64?");
    expect(saved()?.records).toEqual([RECORDS[0], RECORDS[1]]);
  });

  it("skips the question with --yes", async () => {
    const { ctx, confirm, saved } = createContext();

    expect(await removeCommand(ctx, "2024-02-10", { yes: true })).toBe(0);
    expect(confirm).not.toHaveBeenCalled();
    expect(saved()?.records).toHaveLength(2);
  });

  it("keeps the record when the answer is no", async () => {
    const { ctx, confirm, log, saved } = createContext();
    confirm.mockResolvedValueOnce(false);

    expect(await removeCommand(ctx, "2024-02-10", {})).toBe(0);
    expect(logged(log)).toEqual([
      "The record for 2024-02-10 07:30 will not be removed. No changes will be made.",
    ]);
    expect(saved()).toBeNull();
  });
});
