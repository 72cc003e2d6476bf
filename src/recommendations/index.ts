/**
 * Recommendations Module - Public API
 */

// Types
export type { Connectivity, Recommendation, Severity } from "./schema.js";

// Constants
export { SEVERITY_RANK } from "./schema.js";

// Pure transformations
export { generateRecommendations, rankRecommendations } from "./transform.js";
