/**
 * Health Module - Public API
 */

// Types
export type {
  HealthBreakdown,
  HealthInput,
  HealthIssues,
  HealthStatus,
  HistoryPoint,
  StatusClass,
} from "./schema.js";
export type { OutlierDetector, OutlierReport } from "./outlier.js";
export type { TrendOutcome } from "./trend.js";

// Pure transformations
export {
  computeHealth,
  scoreElectrical,
  scoreThermal,
  scoreMechanical,
  scorePredictive,
  scoreEfficiency,
  classifyStatus,
} from "./transform.js";
export { createZScoreDetector } from "./outlier.js";
export { evaluateTrend } from "./trend.js";
