/**
 * Result variants returned by store, selection and mutation operations
 */

/**
 * Recoverable failure kinds
 */
export type ErrorKind =
  | "NOT_FOUND"
  | "DUPLICATE"
  | "EMPTY_RECORD"
  | "INVALID_VALUE"
  | "INTERNAL_LIMIT";

export interface Ok<T> {
  status: "ok";
  value: T;
  /** Short status line for the caller to display */
  message: string;
}

export interface Failure {
  status: "error";
  kind: ErrorKind;
  message: string;
  /** Colliding or missing timestamp, when the failure concerns one */
  timestamp?: number;
}

/**
 * The caller backed out of a selection step. Not an error.
 */
export interface Aborted {
  status: "aborted";
  kind: "NO_SELECTION";
  message: string;
}

export type Result<T> = Ok<T> | Failure | Aborted;

export function ok<T>(value: T, message = ""): Ok<T> {
  return { status: "ok", value, message };
}

export function fail(kind: ErrorKind, message: string, timestamp?: number): Failure {
  return timestamp === undefined
    ? { status: "error", kind, message }
    : { status: "error", kind, message, timestamp };
}

export function aborted(message: string): Aborted {
  return { status: "aborted", kind: "NO_SELECTION", message };
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
  return result.status === "ok";
}
