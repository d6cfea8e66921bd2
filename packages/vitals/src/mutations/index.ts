/**
 * @vitals/core - Mutations
 */

export {
  addRecord,
  editRecord,
  removeRecord,
  type NewRecord,
  type RecordPatch,
  type RecordSelection,
  type MutationOutcome,
} from "./engine.js";

export { createVitalsSession, type VitalsSession } from "./session.js";
