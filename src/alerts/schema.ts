/**
 * Alerts Module - Schemas and Types
 */
import type { Alert, StoreError } from "../store/index.js";

/** Same-type alerts are not re-raised while an open one is this recent. */
export const ALERT_DEDUP_WINDOW_MS = 30 * 60 * 1000;

/** Confidence must exceed this for a recommendation to become an alert. */
export const PROMOTION_CONFIDENCE = 0.8;

export type PromotionSummary = Readonly<{
  raised: readonly Alert[];
  suppressed: number;
  failures: readonly StoreError[];
}>;
