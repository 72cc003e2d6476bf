/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types pushed to live subscribers.
 */
import type { HealthBreakdown } from "../health/index.js";
import type { Device } from "../liveness/index.js";
import type { Recommendation, Severity } from "../recommendations/index.js";
import type { SensorSnapshot, SystemStatus } from "../state/schema.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Latest sensor snapshot after a push reading.
 */
export type SensorUpdateEvent = Readonly<{
  type: "sensor_update";
  snapshot: SensorSnapshot;
}>;

/**
 * Health breakdown from the latest cycle (null before the first one).
 */
export type HealthUpdateEvent = Readonly<{
  type: "health_update";
  health: HealthBreakdown | null;
}>;

export type RecommendationsUpdateEvent = Readonly<{
  type: "recommendations_update";
  recommendations: readonly Recommendation[];
}>;

/**
 * A device went from connected to disconnected.
 */
export type ConnectionLostEvent = Readonly<{
  type: "connection_lost";
  component: Device;
  message: string;
  elapsedSeconds: number;
}>;

export type StatusUpdateEvent = Readonly<{
  type: "status_update";
  status: SystemStatus;
}>;

/**
 * A recommendation was promoted to a persisted alert.
 */
export type MaintenanceAlertEvent = Readonly<{
  type: "maintenance_alert";
  alertId: number;
  alertType: string;
  severity: Severity;
  message: string;
  confidence: number;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | SensorUpdateEvent
  | HealthUpdateEvent
  | RecommendationsUpdateEvent
  | ConnectionLostEvent
  | StatusUpdateEvent
  | MaintenanceAlertEvent;
