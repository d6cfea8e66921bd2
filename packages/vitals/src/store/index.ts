/**
 * @vitals/core - Store
 *
 * Sorted record store, date search and range crawling
 */

// Record store
export {
  copyRecord,
  sortRecords,
  buildStore,
  emptyStore,
  createStore,
  snapshot,
  storeSize,
  recordAt,
  isPosition,
  latestPosition,
  toRecords,
  type RecordStore,
} from "./record-store.js";

// Date search
export { searchByDate } from "./date-search.js";

// Range crawling
export { groupKey, crawl, crawlRange } from "./range-crawler.js";
