/**
 * Liveness Module - Public API
 */

// Types
export type {
  ConnectionLost,
  Device,
  DeviceLiveness,
  Liveness,
  LivenessTimeouts,
} from "./schema.js";

// Constants
export { DEVICES, INITIAL_LIVENESS } from "./schema.js";

// Pure transformations
export { evaluateLiveness, markLost, markSeen } from "./transform.js";
