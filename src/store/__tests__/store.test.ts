/**
 * Store Tests
 *
 * The same contract runs against the in-memory store and SQLite in
 * :memory: mode.
 */
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import { createMemoryStore } from "../memory.js";
import type { MonitoringStore, NewAlert, NewHistoricalReading } from "../schema.js";
import { openSqliteStore } from "../sqlite.js";

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

function reading(recordedAt: number, current: number | null = 6.25): NewHistoricalReading {
  return {
    recordedAt,
    current,
    voltage: 24,
    rpm: 2750,
    ambientTempC: 25,
    humidity: 50,
    ambientTempF: 77,
    heatIndexC: null,
    heatIndexF: null,
    relay1: "ON",
    relay2: "OFF",
    relay3: null,
    alarm: "NOR",
    controllerTemp: 35.5,
    controllerVoltage: 23.8,
    sensorConnected: true,
    controllerConnected: false,
    overallHealth: null,
    electricalHealth: null,
    thermalHealth: null,
    mechanicalHealth: null,
    predictiveHealth: null,
    efficiencyScore: null,
    powerKw: 0.15,
  };
}

function alert(type: string, createdAt: number): NewAlert {
  return {
    createdAt,
    type,
    category: "System",
    severity: "HIGH",
    priority: "HIGH",
    description: "Sensor module not responding",
    action: "Check sensor module power and network connectivity",
    confidence: 1,
  };
}

const implementations: ReadonlyArray<{ name: string; open: () => Promise<MonitoringStore> }> = [
  { name: "memory", open: async () => createMemoryStore() },
  { name: "sqlite", open: async () => (await openSqliteStore(":memory:"))._unsafeUnwrap() },
];

describe.each(implementations)("$name store", ({ open }) => {
  let store: MonitoringStore;

  beforeEach(async () => {
    store = await open();
  });

  afterEach(async () => {
    await store.close();
  });

  // ===========================================================================
  // Readings
  // ===========================================================================

  describe("readings", () => {
    test("round-trips every column", async () => {
      const saved = (await store.appendReading(reading(T0)))._unsafeUnwrap();

      const [row] = (await store.recentReadings(MINUTE, T0 + 1))._unsafeUnwrap();

      expect(row).toEqual({ ...reading(T0), id: saved.id });
    });

    test("returns readings inside the window, newest first", async () => {
      await store.appendReading(reading(T0 - 3 * MINUTE, 1));
      await store.appendReading(reading(T0 - MINUTE, 2));
      await store.appendReading(reading(T0, 3));
      await store.appendReading(reading(T0 - 2 * MINUTE, 4));

      const rows = (await store.recentReadings(2 * MINUTE, T0))._unsafeUnwrap();

      // T0 - 2min sits on the boundary and is excluded
      expect(rows.map((r) => r.current)).toEqual([3, 2]);
    });
  });

  // ===========================================================================
  // Alerts
  // ===========================================================================

  describe("alerts", () => {
    test("finds an open alert of the same type after the cutoff", async () => {
      const saved = (await store.appendAlert(alert("Connection Alert", T0)))._unsafeUnwrap();

      const found = await store.findUnacknowledgedAlert("Connection Alert", T0 - MINUTE);

      expect(found._unsafeUnwrap()).toEqual({
        ...alert("Connection Alert", T0),
        id: saved.id,
        acknowledged: false,
      });
    });

    test("ignores other types, older alerts and acknowledged alerts", async () => {
      await store.appendAlert(alert("Critical Alert", T0));
      await store.appendAlert(alert("Connection Alert", T0 - 40 * MINUTE));
      const acked = (await store.appendAlert(alert("Connection Alert", T0)))._unsafeUnwrap();
      await store.acknowledgeAlert(acked.id);

      const found = await store.findUnacknowledgedAlert("Connection Alert", T0 - 30 * MINUTE);

      expect(found._unsafeUnwrap()).toBeNull();
    });

    test("acknowledges an alert", async () => {
      const saved = (await store.appendAlert(alert("Critical Alert", T0)))._unsafeUnwrap();

      const updated = await store.acknowledgeAlert(saved.id);

      expect(updated._unsafeUnwrap().acknowledged).toBe(true);
      expect((await store.listActiveAlerts(10))._unsafeUnwrap()).toEqual([]);
    });

    test("returns NOT_FOUND for an unknown alert", async () => {
      const result = await store.acknowledgeAlert(9999);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NOT_FOUND",
        entity: "Alert",
        id: 9999,
        message: "Alert 9999 not found",
      });
    });

    test("lists open alerts newest first up to the limit", async () => {
      await store.appendAlert(alert("A", T0));
      await store.appendAlert(alert("B", T0 + 2 * MINUTE));
      await store.appendAlert(alert("C", T0 + MINUTE));

      const active = (await store.listActiveAlerts(2))._unsafeUnwrap();

      expect(active.map((a) => a.type)).toEqual(["B", "C"]);
    });
  });

  // ===========================================================================
  // System Events
  // ===========================================================================

  describe("logSystemEvent", () => {
    test("stores the event with an id", async () => {
      const event = {
        createdAt: T0,
        eventType: "Manual Control",
        component: "Motor",
        message: "Command: start",
        severity: "INFO" as const,
      };

      const saved = (await store.logSystemEvent(event))._unsafeUnwrap();

      expect(saved).toEqual({ ...event, id: saved.id });
      expect(saved.id).toBeGreaterThan(0);
    });
  });
});

// =============================================================================
// Memory store limits
// =============================================================================

describe("createMemoryStore limits", () => {
  test("drops readings older than the retention window", async () => {
    const store = createMemoryStore({ retentionMs: 10 * MINUTE });
    await store.appendReading(reading(T0, 1));
    await store.appendReading(reading(T0 + 5 * MINUTE, 2));

    await store.appendReading(reading(T0 + 12 * MINUTE, 3));

    const rows = (await store.recentReadings(60 * MINUTE, T0 + 13 * MINUTE))._unsafeUnwrap();
    expect(rows.map((r) => r.current)).toEqual([3, 2]);
  });

  test("keeps only the newest alerts past the cap", async () => {
    const store = createMemoryStore({ maxAlerts: 2 });
    await store.appendAlert(alert("A", T0));
    await store.appendAlert(alert("B", T0 + MINUTE));
    const newest = (await store.appendAlert(alert("C", T0 + 2 * MINUTE)))._unsafeUnwrap();

    const active = (await store.listActiveAlerts(10))._unsafeUnwrap();

    expect(active.map((a) => a.type)).toEqual(["C", "B"]);
    expect((await store.acknowledgeAlert(newest.id))._unsafeUnwrap().acknowledged).toBe(true);
  });

  test("returns NOT_FOUND for an alert dropped by the cap", async () => {
    const store = createMemoryStore({ maxAlerts: 1 });
    const dropped = (await store.appendAlert(alert("A", T0)))._unsafeUnwrap();
    await store.appendAlert(alert("B", T0 + MINUTE));

    const result = await store.acknowledgeAlert(dropped.id);

    expect(result._unsafeUnwrapErr().type).toBe("NOT_FOUND");
  });
});

// =============================================================================
// SQLite file persistence
// =============================================================================

describe("openSqliteStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "motor-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("returns OPEN_FAILED for an unusable path", async () => {
    const result = await openSqliteStore("/dev/null/motor.db");

    expect(result._unsafeUnwrapErr().type).toBe("OPEN_FAILED");
  });

  test("writes the database on close and reloads it on open", async () => {
    // Arrange
    const path = join(dir, "nested", "motor.db");
    const first = (await openSqliteStore(path, { flushIntervalMs: 0 }))._unsafeUnwrap();
    await first.appendReading(reading(T0, 4.5));
    await first.appendAlert(alert("Critical Alert", T0));

    // Act
    await first.close();
    const second = (await openSqliteStore(path, { flushIntervalMs: 0 }))._unsafeUnwrap();

    // Assert
    const rows = (await second.recentReadings(MINUTE, T0 + 1))._unsafeUnwrap();
    expect(rows.map((r) => r.current)).toEqual([4.5]);
    const active = (await second.listActiveAlerts(10))._unsafeUnwrap();
    expect(active.map((a) => a.type)).toEqual(["Critical Alert"]);
    await second.close();
  });

  test("writes the database on the flush interval while open", async () => {
    const path = join(dir, "motor.db");
    const live = (await openSqliteStore(path, { flushIntervalMs: 10 }))._unsafeUnwrap();
    await live.appendReading(reading(T0, 7.25));

    await new Promise((resolve) => setTimeout(resolve, 100));
    const copy = (await openSqliteStore(path, { flushIntervalMs: 0 }))._unsafeUnwrap();

    const rows = (await copy.recentReadings(MINUTE, T0 + 1))._unsafeUnwrap();
    expect(rows.map((r) => r.current)).toEqual([7.25]);
    await copy.close();
    await live.close();
  });

  test("closing twice is harmless", async () => {
    const store = (await openSqliteStore(join(dir, "motor.db")))._unsafeUnwrap();

    await store.close();

    await expect(store.close()).resolves.toBeUndefined();
  });
});
