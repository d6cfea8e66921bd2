/**
 * @vitals/core
 *
 * Date-ordered store of blood pressure, pulse and blood glucose readings
 *
 * @example
 * ```typescript
 * import {
 *   createConfig,
 *   createStore,
 *   searchByDate,
 *   selectTimeframe,
 *   selectColumns,
 * } from "@vitals/core";
 * ```
 */

// Models - Types, results and configuration
export * from "./models/index.js";

// Parsers - Flat-file codec, calendar helpers and validation
export * from "./parsers/index.js";

// Store - Sorted records, date search and crawling
export * from "./store/index.js";

// Selection - Timeframe windows and column projection
export * from "./selection/index.js";

// Mutations - Add, edit, remove and sessions
export * from "./mutations/index.js";

// Analysis - Window summaries
export * from "./analysis/index.js";
