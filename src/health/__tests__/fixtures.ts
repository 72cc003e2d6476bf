import type { HealthInput, HistoryPoint } from "../schema.js";

export const NOMINAL_INPUT: HealthInput = {
  current: 6.25,
  voltage: 24,
  controllerVoltage: null,
  controllerTemp: 35,
  ambientTempC: 25,
  humidity: 50,
  rpm: 2750,
};

export const EMPTY_INPUT: HealthInput = {
  current: null,
  voltage: null,
  controllerVoltage: null,
  controllerTemp: null,
  ambientTempC: null,
  humidity: null,
  rpm: null,
};

export const EMPTY_POINT: HistoryPoint = {
  current: null,
  voltage: null,
  rpm: null,
  motorTemp: null,
  ambientTemp: null,
  overallHealth: null,
};

/**
 * Build `count` history points, oldest first, from a per-index factory.
 */
export function historyOf(
  count: number,
  build: (i: number) => Partial<HistoryPoint>,
): HistoryPoint[] {
  return Array.from({ length: count }, (_, i) => ({ ...EMPTY_POINT, ...build(i) }));
}
