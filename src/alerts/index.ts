/**
 * Alerts Module - Public API
 */

// Types
export type { PromotionSummary } from "./schema.js";

// Constants
export { ALERT_DEDUP_WINDOW_MS } from "./schema.js";

// Service functions (side effects)
export { promoteAlerts } from "./service.js";

// Pure transformations
export { isPromotable, toAlertEvent } from "./transform.js";
