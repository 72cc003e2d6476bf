/**
 * Alerts Service Tests
 *
 * Promotion and the 30-minute dedup window against the in-memory store.
 */
import { err } from "neverthrow";
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

vi.mock("../../sse/index.js", () => ({
  broadcast: vi.fn(),
}));

import type { Recommendation } from "../../recommendations/index.js";
import { broadcast } from "../../sse/index.js";
import { createMemoryStore } from "../../store/index.js";
import { queryFailed } from "../../store/errors.js";
import { promoteAlerts } from "../service.js";
import { isPromotable } from "../transform.js";

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

const CRITICAL: Recommendation = {
  type: "Critical Alert",
  category: "Health",
  severity: "CRITICAL",
  priority: "CRITICAL",
  title: "Motor Health Critical",
  description: "Overall health: 48% - Immediate attention required",
  action: "Stop motor and perform immediate inspection",
  confidence: 0.95,
};

const SENSOR_DOWN: Recommendation = {
  type: "Connection Alert",
  category: "System",
  severity: "HIGH",
  priority: "HIGH",
  title: "Sensor Module Disconnected",
  description: "Sensor module not responding",
  action: "Check sensor module power and network connectivity",
  confidence: 1,
};

const CONTROLLER_DOWN: Recommendation = {
  ...SENSOR_DOWN,
  title: "Controller Disconnected",
  description: "Controller not responding to register reads",
};

const THERMAL: Recommendation = {
  type: "Temperature Warning",
  category: "Thermal",
  severity: "MEDIUM",
  priority: "MEDIUM",
  title: "Thermal Issues",
  description: "Temperature above optimal levels",
  action: "Improve ventilation and check cooling system",
  confidence: 0.85,
};

describe("Alerts", () => {
  beforeEach(() => {
    vi.mocked(broadcast).mockClear();
  });

  describe("isPromotable", () => {
    test("promotes HIGH and CRITICAL above 0.8 confidence", () => {
      expect(isPromotable(CRITICAL)).toBe(true);
      expect(isPromotable(SENSOR_DOWN)).toBe(true);
    });

    test("rejects MEDIUM and confidence of exactly 0.8", () => {
      expect(isPromotable(THERMAL)).toBe(false);
      expect(isPromotable({ ...SENSOR_DOWN, confidence: 0.8 })).toBe(false);
    });
  });

  describe("promoteAlerts", () => {
    test("raises an alert and broadcasts it", async () => {
      // Arrange
      const store = createMemoryStore();

      // Act
      const summary = await promoteAlerts([CRITICAL, THERMAL], store, T0);

      // Assert
      expect(summary.raised).toHaveLength(1);
      expect(summary.suppressed).toBe(0);
      expect(broadcast).toHaveBeenCalledWith({
        type: "maintenance_alert",
        alertId: summary.raised[0]?.id,
        alertType: "Critical Alert",
        severity: "CRITICAL",
        message: "Overall health: 48% - Immediate attention required",
        confidence: 0.95,
      });
    });

    test("suppresses the same type within 30 minutes and raises it again after", async () => {
      const store = createMemoryStore();

      await promoteAlerts([CRITICAL], store, T0);
      const repeat = await promoteAlerts([CRITICAL], store, T0 + 10 * MINUTE);
      const later = await promoteAlerts([CRITICAL], store, T0 + 31 * MINUTE);

      expect(repeat).toEqual({ raised: [], suppressed: 1, failures: [] });
      expect(later.raised).toHaveLength(1);
      expect((await store.listActiveAlerts(10))._unsafeUnwrap()).toHaveLength(2);
    });

    test("raises again once the open alert is acknowledged", async () => {
      const store = createMemoryStore();
      const first = await promoteAlerts([CRITICAL], store, T0);
      const id = first.raised[0]?.id ?? -1;

      await store.acknowledgeAlert(id);
      const second = await promoteAlerts([CRITICAL], store, T0 + MINUTE);

      expect(second.raised).toHaveLength(1);
    });

    test("treats both connection alerts as one type", async () => {
      const store = createMemoryStore();

      const summary = await promoteAlerts([SENSOR_DOWN, CONTROLLER_DOWN], store, T0);

      expect(summary.raised.map((a) => a.description)).toEqual(["Sensor module not responding"]);
      expect(summary.suppressed).toBe(1);
    });

    test("reports store failures and keeps going", async () => {
      const memory = createMemoryStore();
      let calls = 0;
      const store = {
        ...memory,
        findUnacknowledgedAlert: async (type: string, since: number) => {
          calls++;
          if (calls === 1) {
            return err(queryFailed("findUnacknowledgedAlert", new Error("disk I/O error")));
          }
          return memory.findUnacknowledgedAlert(type, since);
        },
      };

      const summary = await promoteAlerts([CRITICAL, SENSOR_DOWN], store, T0);

      expect(summary.failures.map((f) => f.message)).toEqual(["disk I/O error"]);
      expect(summary.raised.map((a) => a.type)).toEqual(["Connection Alert"]);
      expect(broadcast).toHaveBeenCalledTimes(1);
    });
  });
});
