/**
 * Ingest Module - Public API
 */

// Types
export type {
  AlarmState,
  RelayState,
  SensorPatch,
  SensorPayload,
} from "./schema.js";
export type { IngestError } from "./errors.js";

// Error utilities
export { formatIngestError } from "./errors.js";

// Service functions (side effects)
export { ingestSensorPayload } from "./service.js";

// Pure transformations
export {
  parseSensorPayload,
  parseMeasurement,
  parseNumericValue,
  parseRelayState,
  parseAlarmState,
} from "./transform.js";
