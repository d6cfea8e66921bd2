/**
 * Editing session over a loaded store.
 *
 * Keeps the load-time snapshot so every change of the session can be
 * reverted at once, and routes each operation through the mutation engine.
 */

import type { VitalsRecord } from "../models/record.js";
import type { Result } from "../models/result.js";
import { ok } from "../models/result.js";
import type { RecordStore } from "../store/record-store.js";
import { snapshot, toRecords } from "../store/record-store.js";
import type { NewRecord, RecordPatch, RecordSelection, MutationOutcome } from "./engine.js";
import { addRecord, editRecord, removeRecord } from "./engine.js";

export interface VitalsSession {
  /** Copy of the current store */
  current: () => RecordStore;
  /** Number of successful mutations since load or the last undo */
  changeCount: () => number;
  add: (input: NewRecord | null) => Result<VitalsRecord>;
  edit: (selection: RecordSelection | null, patch: RecordPatch) => Result<VitalsRecord>;
  remove: (selection: RecordSelection | null, confirmed: boolean) => Result<VitalsRecord>;
  /** Restore the store as it was when the session was opened */
  undoAll: () => Result<RecordStore>;
  /** Records in store order, for persistence */
  save: () => VitalsRecord[];
}

/**
 * Open a session over a loaded store
 */
export function createVitalsSession(loaded: RecordStore): VitalsSession {
  const sessionBackup = snapshot(loaded);
  let store = snapshot(loaded);
  let changes = 0;

  const apply = (outcome: MutationOutcome): Result<VitalsRecord> => {
    store = outcome.store;
    if (outcome.result.status === "ok") changes++;
    return outcome.result;
  };

  return {
    current: () => snapshot(store),

    changeCount: () => changes,

    add: (input) => apply(addRecord(store, input)),

    edit: (selection, patch) => apply(editRecord(store, selection, patch)),

    remove: (selection, confirmed) => apply(removeRecord(store, selection, confirmed)),

    undoAll: () => {
      store = snapshot(sessionBackup);
      changes = 0;
      return ok(
        snapshot(store),
        "All changes have been undone. The original records have been restored."
      );
    },

    save: () => toRecords(store),
  };
}
