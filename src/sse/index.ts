/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  ConnectionLostEvent,
  HealthUpdateEvent,
  MaintenanceAlertEvent,
  RecommendationsUpdateEvent,
  SensorUpdateEvent,
  SseEvent,
  StatusUpdateEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  createSseStream,
  disconnectAllClients,
  encodeEvent,
  getClientCount,
} from "./service.js";
