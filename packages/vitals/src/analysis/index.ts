/**
 * @vitals/core - Analysis
 */

export {
  classifyGlucose,
  summarizeVitals,
  type GlucoseBand,
  type ColumnStats,
  type VitalsSummary,
} from "./summary.js";
