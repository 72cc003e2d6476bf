/**
 * Alerts Module - Pure Transformations
 */
import type { Recommendation } from "../recommendations/index.js";
import type { MaintenanceAlertEvent } from "../sse/index.js";
import type { Alert, NewAlert } from "../store/index.js";
import { PROMOTION_CONFIDENCE } from "./schema.js";

/**
 * HIGH or CRITICAL with confidence above 0.8.
 */
export function isPromotable(recommendation: Recommendation): boolean {
  return (
    (recommendation.severity === "HIGH" || recommendation.severity === "CRITICAL") &&
    recommendation.confidence > PROMOTION_CONFIDENCE
  );
}

export function toNewAlert(recommendation: Recommendation, now: number): NewAlert {
  return {
    createdAt: now,
    type: recommendation.type,
    category: recommendation.category,
    severity: recommendation.severity,
    priority: recommendation.priority,
    description: recommendation.description,
    action: recommendation.action,
    confidence: recommendation.confidence,
  };
}

export function toAlertEvent(alert: Alert): MaintenanceAlertEvent {
  return {
    type: "maintenance_alert",
    alertId: alert.id,
    alertType: alert.type,
    severity: alert.severity,
    message: alert.description,
    confidence: alert.confidence,
  };
}
