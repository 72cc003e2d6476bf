/**
 * Store Module - Schemas and Types
 *
 * Persisted records and the MonitoringStore contract shared by the
 * in-memory and SQLite implementations.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { AlarmState, RelayState } from "../ingest/index.js";
import type { Severity } from "../recommendations/index.js";
import type { StoreError } from "./errors.js";

// =============================================================================
// Memory Store Limits
// =============================================================================

export const MEMORY_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;
export const MEMORY_MAX_ALERTS = 1000;
export const MEMORY_MAX_EVENTS = 1000;

// =============================================================================
// Historical Readings
// =============================================================================

/**
 * One row of history: the snapshot, connectivity and the health scores
 * current when it was written (null before the first health cycle).
 */
export type NewHistoricalReading = Readonly<{
  recordedAt: number;
  current: number | null;
  voltage: number | null;
  rpm: number | null;
  ambientTempC: number | null;
  humidity: number | null;
  ambientTempF: number | null;
  heatIndexC: number | null;
  heatIndexF: number | null;
  relay1: RelayState | null;
  relay2: RelayState | null;
  relay3: RelayState | null;
  alarm: AlarmState | null;
  controllerTemp: number | null;
  controllerVoltage: number | null;
  sensorConnected: boolean;
  controllerConnected: boolean;
  overallHealth: number | null;
  electricalHealth: number | null;
  thermalHealth: number | null;
  mechanicalHealth: number | null;
  predictiveHealth: number | null;
  efficiencyScore: number | null;
  powerKw: number;
}>;

export type HistoricalReading = NewHistoricalReading & Readonly<{ id: number }>;

// =============================================================================
// Alerts
// =============================================================================

export type NewAlert = Readonly<{
  createdAt: number;
  type: string;
  category: string;
  severity: Severity;
  priority: Severity;
  description: string;
  action: string;
  confidence: number;
}>;

export type Alert = NewAlert &
  Readonly<{
    id: number;
    acknowledged: boolean;
  }>;

// =============================================================================
// System Events
// =============================================================================

export const EventSeveritySchema = z.enum(["INFO", "WARNING", "ERROR"]);
export type EventSeverity = z.infer<typeof EventSeveritySchema>;

export type NewSystemEvent = Readonly<{
  createdAt: number;
  eventType: string;
  component: string;
  message: string;
  severity: EventSeverity;
}>;

export type SystemEvent = NewSystemEvent & Readonly<{ id: number }>;

// =============================================================================
// Store Contract
// =============================================================================

export type StoreResult<T> = Promise<Result<T, StoreError>>;

export interface MonitoringStore {
  appendReading(reading: NewHistoricalReading): StoreResult<HistoricalReading>;
  /** Readings recorded after `now - windowMs`, newest first. */
  recentReadings(windowMs: number, now: number): StoreResult<HistoricalReading[]>;
  /** Newest unacknowledged alert of `type` created after `since`. */
  findUnacknowledgedAlert(type: string, since: number): StoreResult<Alert | null>;
  appendAlert(alert: NewAlert): StoreResult<Alert>;
  acknowledgeAlert(id: number): StoreResult<Alert>;
  /** Unacknowledged alerts, newest first. */
  listActiveAlerts(limit: number): StoreResult<Alert[]>;
  logSystemEvent(event: NewSystemEvent): StoreResult<SystemEvent>;
  close(): Promise<void>;
}
