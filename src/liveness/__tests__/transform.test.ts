/**
 * Liveness Transform Tests
 */
import { describe, expect, it } from "vitest";
import { INITIAL_LIVENESS } from "../schema.js";
import { evaluateLiveness, markLost, markSeen } from "../transform.js";

const TIMEOUTS = { sensor: 30_000, controller: 60_000 };
const T0 = 1_700_000_000_000;

describe("Liveness Transform", () => {
  describe("markSeen", () => {
    it("connects the device and stamps lastSeen", () => {
      const liveness = markSeen(INITIAL_LIVENESS, "sensor", T0);

      expect(liveness).toEqual({
        sensor: { connected: true, lastSeen: T0 },
        controller: { connected: false, lastSeen: null },
      });
    });
  });

  describe("evaluateLiveness", () => {
    it("keeps a device connected at exactly the timeout", () => {
      const liveness = markSeen(INITIAL_LIVENESS, "sensor", T0);

      const result = evaluateLiveness(liveness, TIMEOUTS, T0 + 30_000);

      expect(result.lost).toEqual([]);
      expect(result.liveness.sensor.connected).toBe(true);
    });

    it("disconnects once the timeout is exceeded", () => {
      const liveness = markSeen(INITIAL_LIVENESS, "sensor", T0);

      const result = evaluateLiveness(liveness, TIMEOUTS, T0 + 31_000);

      expect(result.lost).toEqual([
        { component: "sensor", message: "Sensor module connection timeout", elapsedSeconds: 31 },
      ]);
      expect(result.liveness.sensor).toEqual({ connected: false, lastSeen: T0 });
    });

    it("fires exactly once per transition", () => {
      const liveness = markSeen(INITIAL_LIVENESS, "sensor", T0);

      const first = evaluateLiveness(liveness, TIMEOUTS, T0 + 31_000);
      const second = evaluateLiveness(first.liveness, TIMEOUTS, T0 + 41_000);

      expect(first.lost).toHaveLength(1);
      expect(second.lost).toEqual([]);
    });

    it("applies independent timeouts per device", () => {
      let liveness = markSeen(INITIAL_LIVENESS, "sensor", T0);
      liveness = markSeen(liveness, "controller", T0);

      const result = evaluateLiveness(liveness, TIMEOUTS, T0 + 45_000);

      expect(result.lost.map((l) => l.component)).toEqual(["sensor"]);
      expect(result.liveness.controller.connected).toBe(true);
    });

    it("ignores devices never seen", () => {
      const result = evaluateLiveness(INITIAL_LIVENESS, TIMEOUTS, T0);

      expect(result).toEqual({ liveness: INITIAL_LIVENESS, lost: [] });
    });

    it("reconnects after a fresh read", () => {
      const lost = evaluateLiveness(markSeen(INITIAL_LIVENESS, "sensor", T0), TIMEOUTS, T0 + 31_000);

      const liveness = markSeen(lost.liveness, "sensor", T0 + 32_000);

      expect(liveness.sensor).toEqual({ connected: true, lastSeen: T0 + 32_000 });
    });
  });

  describe("markLost", () => {
    it("disconnects with the given reason", () => {
      const liveness = markSeen(INITIAL_LIVENESS, "controller", T0);

      const result = markLost(liveness, "controller", "Timeout: No response within 3000ms", T0 + 5_000);

      expect(result).toEqual({
        liveness: {
          sensor: { connected: false, lastSeen: null },
          controller: { connected: false, lastSeen: T0 },
        },
        lost: {
          component: "controller",
          message: "Timeout: No response within 3000ms",
          elapsedSeconds: 5,
        },
      });
    });

    it("returns null for an already disconnected device", () => {
      expect(markLost(INITIAL_LIVENESS, "controller", "down", T0)).toBeNull();
    });
  });
});
