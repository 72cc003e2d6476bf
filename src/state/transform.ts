/**
 * State Module - Pure Transformations
 *
 * The reducer behind `dispatch`: applies one update to the monitor state
 * and returns the outbound events that update causes.
 */
import type { HealthInput } from "../health/index.js";
import {
  type Device,
  evaluateLiveness,
  markLost,
  markSeen,
} from "../liveness/index.js";
import type { SseEvent } from "../sse/schema.js";
import type { NewHistoricalReading } from "../store/index.js";
import {
  DEVICE_FIELDS,
  type MonitorState,
  type SensorSnapshot,
  type StateUpdate,
  type SystemStatus,
} from "./schema.js";

// =============================================================================
// Derived Views
// =============================================================================

export function systemStatusOf(state: MonitorState): SystemStatus {
  return {
    sensor: state.liveness.sensor,
    controller: state.liveness.controller,
    lastUpdate: state.lastUpdate,
    analysisStatus: state.analysisStatus,
  };
}

export function healthInputOf(snapshot: SensorSnapshot): HealthInput {
  return {
    current: snapshot.current,
    voltage: snapshot.voltage,
    controllerVoltage: snapshot.controllerVoltage,
    controllerTemp: snapshot.controllerTemp,
    ambientTempC: snapshot.ambientTempC,
    humidity: snapshot.humidity,
    rpm: snapshot.rpm,
  };
}

/**
 * current x voltage / 1000, using the controller voltage when the sensor
 * has none. 0 when either is missing.
 */
export function powerKwOf(snapshot: SensorSnapshot): number {
  const voltage = snapshot.voltage ?? snapshot.controllerVoltage;
  if (snapshot.current === null || voltage === null) {
    return 0;
  }
  return (snapshot.current * voltage) / 1000;
}

/**
 * History row for the current snapshot. Health columns carry the latest
 * breakdown, null until the first health cycle.
 */
export function historicalReadingOf(state: MonitorState, at: number): NewHistoricalReading {
  const { snapshot, health } = state;
  return {
    recordedAt: at,
    ...snapshot,
    sensorConnected: state.liveness.sensor.connected,
    controllerConnected: state.liveness.controller.connected,
    overallHealth: health?.overallHealth ?? null,
    electricalHealth: health?.electricalHealth ?? null,
    thermalHealth: health?.thermalHealth ?? null,
    mechanicalHealth: health?.mechanicalHealth ?? null,
    predictiveHealth: health?.predictiveHealth ?? null,
    efficiencyScore: health?.efficiencyScore ?? null,
    powerKw: powerKwOf(snapshot),
  };
}

/**
 * Null out every field owned by a device.
 */
export function clearDeviceFields(snapshot: SensorSnapshot, device: Device): SensorSnapshot {
  return DEVICE_FIELDS[device].reduce<SensorSnapshot>(
    (acc, field) => ({ ...acc, [field]: null }),
    snapshot,
  );
}

// =============================================================================
// Reducer
// =============================================================================

export type Reduction = Readonly<{
  state: MonitorState;
  events: readonly SseEvent[];
}>;

export function reduceState(state: MonitorState, update: StateUpdate): Reduction {
  switch (update.type) {
    case "sensor_reading": {
      const snapshot = { ...state.snapshot, ...update.patch };
      return {
        state: {
          ...state,
          snapshot,
          liveness: markSeen(state.liveness, "sensor", update.at),
          lastUpdate: update.at,
        },
        events: [{ type: "sensor_update", snapshot }],
      };
    }

    case "controller_reading":
      return {
        state: {
          ...state,
          snapshot: {
            ...state.snapshot,
            controllerVoltage: update.reading.voltage,
            controllerTemp: update.reading.temperature,
          },
          liveness: markSeen(state.liveness, "controller", update.at),
        },
        events: [],
      };

    case "controller_read_failed": {
      // Stale controller values are dropped on every failure
      const snapshot = clearDeviceFields(state.snapshot, "controller");
      const transition = markLost(state.liveness, "controller", update.message, update.at);
      if (!transition) {
        return { state: { ...state, snapshot }, events: [] };
      }
      return {
        state: { ...state, snapshot, liveness: transition.liveness },
        events: [{ type: "connection_lost", ...transition.lost }],
      };
    }

    case "liveness_sweep": {
      const { liveness, lost } = evaluateLiveness(state.liveness, update.timeouts, update.at);
      const snapshot = lost.reduce(
        (acc, entry) => clearDeviceFields(acc, entry.component),
        state.snapshot,
      );
      const next = { ...state, snapshot, liveness };
      return {
        state: next,
        events: [
          ...lost.map((entry) => ({ type: "connection_lost" as const, ...entry })),
          { type: "status_update", status: systemStatusOf(next) },
        ],
      };
    }

    case "health_computed":
      return {
        state: {
          ...state,
          health: update.health,
          recommendations: update.recommendations,
          analysisStatus: update.analysisStatus,
        },
        events: [
          { type: "health_update", health: update.health },
          { type: "recommendations_update", recommendations: update.recommendations },
        ],
      };

    case "analysis_status":
      return { state: { ...state, analysisStatus: update.status }, events: [] };
  }
}
