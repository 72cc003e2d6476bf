/**
 * State Module - Schemas and Types
 *
 * The single in-memory container shared by the ingestion endpoint and
 * the scheduler loops, and the typed updates that mutate it.
 */
import type { ControllerReading } from "../controller/index.js";
import type { HealthBreakdown } from "../health/index.js";
import type { AlarmState, RelayState, SensorPatch } from "../ingest/index.js";
import type {
  Device,
  DeviceLiveness,
  Liveness,
  LivenessTimeouts,
} from "../liveness/index.js";
import { INITIAL_LIVENESS } from "../liveness/index.js";
import type { Recommendation } from "../recommendations/index.js";

// =============================================================================
// Sensor Snapshot
// =============================================================================

/**
 * Latest known value per metric. Each field is independently nullable;
 * null means "no current reading".
 */
export type SensorSnapshot = Readonly<{
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
}>;

export const EMPTY_SNAPSHOT: SensorSnapshot = {
  current: null,
  voltage: null,
  rpm: null,
  ambientTempC: null,
  humidity: null,
  ambientTempF: null,
  heatIndexC: null,
  heatIndexF: null,
  relay1: null,
  relay2: null,
  relay3: null,
  alarm: null,
  controllerTemp: null,
  controllerVoltage: null,
};

/**
 * Snapshot fields owned by each device; cleared when it disconnects.
 */
export const DEVICE_FIELDS: Readonly<Record<Device, ReadonlyArray<keyof SensorSnapshot>>> = {
  sensor: [
    "current",
    "voltage",
    "rpm",
    "ambientTempC",
    "humidity",
    "ambientTempF",
    "heatIndexC",
    "heatIndexF",
    "relay1",
    "relay2",
    "relay3",
    "alarm",
  ] satisfies ReadonlyArray<keyof SensorPatch>,
  controller: ["controllerTemp", "controllerVoltage"],
};

// =============================================================================
// System Status
// =============================================================================

export type AnalysisStatus =
  | "Initializing"
  | "Waiting for data"
  | "Active"
  | "Degraded"
  | "Error";

export type SystemStatus = Readonly<{
  sensor: DeviceLiveness;
  controller: DeviceLiveness;
  lastUpdate: number | null;
  analysisStatus: AnalysisStatus;
}>;

// =============================================================================
// Monitor State
// =============================================================================

export type MonitorState = Readonly<{
  snapshot: SensorSnapshot;
  liveness: Liveness;
  lastUpdate: number | null;
  analysisStatus: AnalysisStatus;
  health: HealthBreakdown | null;
  recommendations: readonly Recommendation[];
}>;

export const INITIAL_STATE: MonitorState = {
  snapshot: EMPTY_SNAPSHOT,
  liveness: INITIAL_LIVENESS,
  lastUpdate: null,
  analysisStatus: "Initializing",
  health: null,
  recommendations: [],
};

// =============================================================================
// Updates
// =============================================================================

/**
 * Every write to the state container is one of these.
 */
export type StateUpdate =
  | { readonly type: "sensor_reading"; readonly patch: SensorPatch; readonly at: number }
  | {
      readonly type: "controller_reading";
      readonly reading: ControllerReading;
      readonly at: number;
    }
  | { readonly type: "controller_read_failed"; readonly message: string; readonly at: number }
  | { readonly type: "liveness_sweep"; readonly timeouts: LivenessTimeouts; readonly at: number }
  | {
      readonly type: "health_computed";
      readonly health: HealthBreakdown;
      readonly recommendations: readonly Recommendation[];
      readonly analysisStatus: AnalysisStatus;
    }
  | { readonly type: "analysis_status"; readonly status: AnalysisStatus };
