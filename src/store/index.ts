/**
 * Store Module - Public API
 */

// Types
export type {
  Alert,
  EventSeverity,
  HistoricalReading,
  MonitoringStore,
  NewAlert,
  NewHistoricalReading,
  NewSystemEvent,
  SystemEvent,
} from "./schema.js";
export type { StoreError } from "./errors.js";
export type { MemoryStoreOptions } from "./memory.js";
export { MEMORY_MAX_ALERTS, MEMORY_MAX_EVENTS, MEMORY_RETENTION_MS } from "./schema.js";

// Error utilities
export { formatStoreError } from "./errors.js";

// Implementations
export { createMemoryStore } from "./memory.js";
export type { SqliteStoreOptions } from "./sqlite.js";
export { openSqliteStore } from "./sqlite.js";
export type { StoreOptions } from "./service.js";
export { openStore } from "./service.js";
