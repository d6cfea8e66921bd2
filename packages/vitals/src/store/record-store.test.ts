import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../models/config.js";
import { utc, THREE_RECORDS, storeOf } from "../test/fixtures.js";
import {
  createStore,
  emptyStore,
  latestPosition,
  recordAt,
  snapshot,
  toRecords,
} from "./record-store.js";

describe("createStore", () => {
  it("sorts records by timestamp without touching the input", () => {
    const input = [THREE_RECORDS[2], THREE_RECORDS[0], THREE_RECORDS[1]];
    const result = createStore(input, DEFAULT_CONFIG);

    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.message).toBe("Records loaded successfully.");
    expect(result.value.records).toEqual(THREE_RECORDS);
    expect(input[0]).toBe(THREE_RECORDS[2]);
  });

  it("reports duplicate timestamps", () => {
    const result = createStore(
      [...THREE_RECORDS, { timestamp: utc(2024, 1, 5, 8, 0), pulse: 90 }],
      DEFAULT_CONFIG
    );
    expect(result).toEqual({
      status: "error",
      kind: "DUPLICATE",
      message: "More than one record exists for 2024-01-05 08:00.",
      timestamp: utc(2024, 1, 5, 8, 0),
    });
  });

  it("reports records without measurements", () => {
    const result = createStore([{ timestamp: utc(2024, 3, 2, 8, 0) }], DEFAULT_CONFIG);
    expect(result.status === "error" && result.kind).toBe("EMPTY_RECORD");
  });

  it("reports implausible values", () => {
    const result = createStore([{ timestamp: utc(2024, 3, 2, 8, 0), pulse: 400 }], DEFAULT_CONFIG);
    expect(result.status === "error" && result.kind).toBe("INVALID_VALUE");
  });

  it("cuts timestamps to the minute", () => {
    const result = createStore([{ timestamp: utc(2024, 3, 2, 8, 0) + 42 * 1000, pulse: 70 }], DEFAULT_CONFIG);
    expect(result.status === "ok" && result.value.records).toEqual([
      { timestamp: utc(2024, 3, 2, 8, 0), pulse: 70 },
    ]);
  });

  it("accepts an empty set of records", () => {
    const result = createStore([], DEFAULT_CONFIG);
    expect(result.status === "ok" && result.value.records).toEqual([]);
  });
});

describe("snapshot", () => {
  it("does not share records with the original", () => {
    const store = storeOf(THREE_RECORDS);
    const copy = snapshot(store);

    copy.records[0].pulse = 99;

    expect(store.records[0].pulse).toBe(70);
    expect(copy.records).not.toBe(store.records);
  });
});

describe("recordAt", () => {
  it("returns a copy of the record at a position", () => {
    const store = storeOf(THREE_RECORDS);
    const record = recordAt(store, 1);
    expect(record).toEqual(THREE_RECORDS[1]);
    expect(record).not.toBe(store.records[1]);
  });

  it("returns undefined outside the store", () => {
    const store = storeOf(THREE_RECORDS);
    expect(recordAt(store, 3)).toBeUndefined();
    expect(recordAt(store, -1)).toBeUndefined();
    expect(recordAt(store, 0.5)).toBeUndefined();
  });
});

describe("latestPosition", () => {
  it("selects the last record", () => {
    expect(latestPosition(storeOf(THREE_RECORDS))).toEqual({
      status: "ok",
      value: 2,
      message: "The record for 2024-02-10 07:30 has been selected.",
    });
  });

  it("reports an empty store", () => {
    const result = latestPosition(emptyStore(DEFAULT_CONFIG));
    expect(result.status === "error" && result.kind).toBe("NOT_FOUND");
  });
});

describe("toRecords", () => {
  it("returns copies in store order", () => {
    const store = storeOf(THREE_RECORDS);
    const records = toRecords(store);
    expect(records).toEqual(THREE_RECORDS);
    expect(records[0]).not.toBe(store.records[0]);
  });
});
