/**
 * Controller Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  ControllerReading,
  ControllerTarget,
  RawControllerReading,
} from "./schema.js";
export type { ControllerError } from "./errors.js";

// Error utilities
export { formatControllerError } from "./errors.js";

// Service functions (side effects)
export { readControllerRegisters, readControllerValues } from "./service.js";

// Pure transformations
export {
  voltageFromRaw,
  temperatureFromRaw,
  toControllerReading,
  encodeBatchReadRequest,
  decodeBatchReadResponse,
} from "./transform.js";
