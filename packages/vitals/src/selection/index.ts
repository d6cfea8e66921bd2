/**
 * @vitals/core - Selection
 *
 * Timeframe windows and column projection
 */

export {
  selectTimeframe,
  locateCandidates,
  type TimeframeRequest,
  type TimeframeMode,
  type Window,
} from "./timeframe.js";

export {
  projectRows,
  selectColumns,
  type ProjectedRow,
  type ColumnView,
} from "./column-filter.js";
