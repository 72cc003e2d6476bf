/**
 * Scheduler Module - Pure Transformations
 */
import type { HistoryPoint } from "../health/index.js";
import type { HistoricalReading } from "../store/index.js";

export function historyPointOf(reading: HistoricalReading): HistoryPoint {
  return {
    current: reading.current,
    voltage: reading.voltage ?? reading.controllerVoltage,
    rpm: reading.rpm,
    motorTemp: reading.controllerTemp,
    ambientTemp: reading.ambientTempC,
    overallHealth: reading.overallHealth,
  };
}

/**
 * The store returns newest first; trend analysis needs oldest first.
 */
export function chronologicalHistory(readings: readonly HistoricalReading[]): HistoryPoint[] {
  return [...readings].reverse().map(historyPointOf);
}
