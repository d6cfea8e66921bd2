/**
 * Add, edit and remove with duplicate detection and all-or-nothing commits.
 *
 * Each operation takes a snapshot of the incoming store before it starts.
 * On any failure or abort the snapshot is returned, so a caller never sees a
 * half-applied change. On success a freshly sorted store is returned.
 * Timestamps are cut to the minute before duplicate checks.
 */

import type { Measurements, MeasurementColumn, VitalsRecord } from "../models/record.js";
import { MEASUREMENT_COLUMNS } from "../models/record.js";
import type { Result } from "../models/result.js";
import { ok, fail, aborted } from "../models/result.js";
import { formatTimestamp, truncateToMinute } from "../parsers/datetime.js";
import { hasMeasurement, normalizeMeasurements } from "../parsers/validation.js";
import type { RecordStore } from "../store/record-store.js";
import { buildStore, copyRecord, snapshot } from "../store/record-store.js";
import { searchByDate } from "../store/date-search.js";
import { locateCandidates } from "../selection/timeframe.js";

/**
 * A record to add
 */
export interface NewRecord extends Measurements {
  timestamp: number;
}

/**
 * Field-by-field changes to a record. Undefined keeps a value, null clears it.
 */
export type RecordPatch = {
  timestamp?: number;
} & {
  [K in MeasurementColumn]?: number | null;
};

/**
 * A record picked by date and then by position among that date's records
 */
export interface RecordSelection {
  date: number;
  position: number;
}

export interface MutationOutcome {
  /** The store after the operation: the new store on success, the snapshot otherwise */
  store: RecordStore;
  result: Result<VitalsRecord>;
}

const NO_CHANGES = "No changes will be made.";

function describe(store: RecordStore, timestamp: number): string {
  return formatTimestamp(timestamp, store.config.timezone);
}

function rollback(backup: RecordStore, result: Result<VitalsRecord>): MutationOutcome {
  return { store: backup, result };
}

/**
 * Position of another record with exactly this timestamp, if any
 */
function findCollision(store: RecordStore, timestamp: number): Result<number> {
  return searchByDate(store, { timestamp, precision: "datetime" });
}

function resolveSelection(
  store: RecordStore,
  selection: RecordSelection,
  action: "editing" | "removal"
): Result<number> {
  const candidates = locateCandidates(store, selection.date);
  if (candidates.status === "error" && candidates.kind === "INTERNAL_LIMIT") {
    return candidates;
  }
  if (candidates.status !== "ok" || !candidates.value.positions.includes(selection.position)) {
    return fail("NOT_FOUND", `No record can be found for ${action}.`, selection.date);
  }
  return ok(selection.position);
}

/**
 * Insert a new record. A null input means the caller cancelled.
 */
export function addRecord(store: RecordStore, input: NewRecord | null): MutationOutcome {
  const backup = snapshot(store);

  if (input === null) {
    return rollback(backup, aborted(`Action disrupted. ${NO_CHANGES}`));
  }
  if (!Number.isFinite(input.timestamp)) {
    return rollback(backup, fail("INVALID_VALUE", "Please enter a valid date and time."));
  }

  const timestamp = truncateToMinute(input.timestamp);
  const when = describe(store, timestamp);
  const collision = findCollision(store, timestamp);
  if (collision.status === "ok") {
    return rollback(
      backup,
      fail("DUPLICATE", `A record for ${when} already exists.`, timestamp)
    );
  }
  if (collision.status === "error" && collision.kind === "INTERNAL_LIMIT") {
    return rollback(backup, collision);
  }

  const record = copyRecord(input);
  if (!hasMeasurement(record)) {
    return rollback(
      backup,
      fail("EMPTY_RECORD", "A valid record must contain at least one detail.", timestamp)
    );
  }

  const normalized = normalizeMeasurements(record, store.config);
  if (normalized.status !== "ok") {
    return rollback(backup, normalized);
  }

  const added: VitalsRecord = { timestamp, ...normalized.value };
  return {
    store: buildStore([...backup.records, added], store.config),
    result: ok(added, `The record for ${when} has been successfully added.`),
  };
}

/**
 * Apply a patch to the selected record. A null selection means the caller backed out.
 */
export function editRecord(
  store: RecordStore,
  selection: RecordSelection | null,
  patch: RecordPatch
): MutationOutcome {
  const backup = snapshot(store);

  if (selection === null) {
    return rollback(backup, aborted(`No selection made. ${NO_CHANGES}`));
  }
  if (store.records.length === 0) {
    return rollback(backup, fail("NOT_FOUND", "No records for editing."));
  }

  const resolved = resolveSelection(store, selection, "editing");
  if (resolved.status !== "ok") {
    return rollback(backup, resolved);
  }

  const position = resolved.value;
  const original = backup.records[position];
  const working = copyRecord(original);

  if (patch.timestamp !== undefined) {
    if (!Number.isFinite(patch.timestamp)) {
      return rollback(backup, fail("INVALID_VALUE", "Please enter a valid date and time."));
    }
    working.timestamp = truncateToMinute(patch.timestamp);
  }
  for (const column of MEASUREMENT_COLUMNS) {
    const change = patch[column];
    if (change === null) {
      delete working[column];
    } else if (change !== undefined) {
      working[column] = change;
    }
  }

  if (!hasMeasurement(working)) {
    return rollback(
      backup,
      fail("EMPTY_RECORD", "A valid record must contain at least one entry.", working.timestamp)
    );
  }

  const normalized = normalizeMeasurements(working, store.config);
  if (normalized.status !== "ok") {
    return rollback(backup, normalized);
  }

  if (working.timestamp !== original.timestamp) {
    const collision = findCollision(store, working.timestamp);
    if (collision.status === "ok" && collision.value !== position) {
      return rollback(
        backup,
        fail(
          "DUPLICATE",
          `A record for ${describe(store, working.timestamp)} already exists.`,
          working.timestamp
        )
      );
    }
    if (collision.status === "error" && collision.kind === "INTERNAL_LIMIT") {
      return rollback(backup, collision);
    }
  }

  const edited: VitalsRecord = { timestamp: working.timestamp, ...normalized.value };
  const records = backup.records.map((record, i) => (i === position ? edited : record));
  return {
    store: buildStore(records, store.config),
    result: ok(
      edited,
      `The record for ${describe(store, original.timestamp)} has been successfully edited.`
    ),
  };
}

/**
 * Delete the selected record once the caller has confirmed.
 * A null selection means the caller backed out.
 */
export function removeRecord(
  store: RecordStore,
  selection: RecordSelection | null,
  confirmed: boolean
): MutationOutcome {
  const backup = snapshot(store);

  if (selection === null) {
    return rollback(backup, aborted(`No selection made. ${NO_CHANGES}`));
  }
  if (store.records.length === 0) {
    return rollback(backup, fail("NOT_FOUND", "No records for removing."));
  }

  const resolved = resolveSelection(store, selection, "removal");
  if (resolved.status !== "ok") {
    return rollback(backup, resolved);
  }

  const position = resolved.value;
  const removed = copyRecord(backup.records[position]);
  const when = describe(store, removed.timestamp);

  if (!confirmed) {
    return rollback(backup, aborted(`The record for ${when} will not be removed. ${NO_CHANGES}`));
  }

  const records = backup.records.filter((_, i) => i !== position);
  return {
    store: buildStore(records, store.config),
    result: ok(removed, `The record for ${when} has been successfully deleted.`),
  };
}
