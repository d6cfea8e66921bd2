/**
 * Reading and writing the vitals CSV file
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import type { RecordStore, Result, VitalsConfig } from "@vitals/core";
import {
  VITALS_HEADERS,
  createStore,
  emptyStore,
  fail,
  ok,
  parseVitalsCsv,
  serializeVitalsCsv,
  toRecords,
} from "@vitals/core";

/**
 * Load the file into a store. A missing file is created with just the header,
 * unless `create` is false (dry runs). Unreadable lines make the whole load fail.
 */
export function loadVitalsFile(
  path: string,
  config: VitalsConfig,
  create = true
): Result<RecordStore> {
  if (!existsSync(path)) {
    if (!create) {
      return ok(emptyStore(config), `${path} does not exist yet.`);
    }
    writeFileSync(path, `${VITALS_HEADERS.join(",")}\n`);
    return ok(emptyStore(config), `Created ${path}.`);
  }

  const { records, errors } = parseVitalsCsv(readFileSync(path, "utf-8"), config);
  if (errors.length > 0) {
    return fail("INVALID_VALUE", [`Could not read ${path}:`, ...errors.map((e) => `  ${e}`)].join("\n"));
  }

  return createStore(records, config);
}

/**
 * Write the store back, replacing the file
 */
export function saveVitalsFile(path: string, store: RecordStore): void {
  writeFileSync(path, serializeVitalsCsv(toRecords(store), store.config));
}
