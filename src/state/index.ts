/**
 * State Module - Public API
 */

// Types
export type {
  AnalysisStatus,
  MonitorState,
  SensorSnapshot,
  StateUpdate,
  SystemStatus,
} from "./schema.js";

// Constants
export { EMPTY_SNAPSHOT, INITIAL_STATE } from "./schema.js";

// Service functions (side effects)
export { dispatch, getState, getSystemStatus, resetState } from "./service.js";

// Pure transformations
export {
  clearDeviceFields,
  healthInputOf,
  historicalReadingOf,
  powerKwOf,
  reduceState,
  systemStatusOf,
} from "./transform.js";
