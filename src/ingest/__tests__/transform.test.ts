/**
 * Ingest Transform Tests
 */
import { describe, expect, it } from "vitest";
import {
  parseAlarmState,
  parseMeasurement,
  parseNumericValue,
  parseRelayState,
  parseSensorPayload,
} from "../transform.js";

const FULL_PAYLOAD = {
  TYPE: "ADU_TEXT",
  VAL1: "6.25",
  VAL2: "24.1",
  VAL3: "2750",
  VAL4: "26.5",
  VAL5: "55",
  VAL6: "79.7",
  VAL7: "27.1",
  VAL8: "80.8",
  VAL9: "ON",
  VAL10: "off",
  VAL11: "On",
  VAL12: "BUZ",
};

describe("Ingest Transform", () => {
  describe("parseMeasurement", () => {
    it("keeps zero as a real reading", () => {
      expect(parseMeasurement("0")).toBe(0);
      expect(parseMeasurement("0.0")).toBe(0);
      expect(parseMeasurement(0)).toBe(0);
    });

    it("parses negative values", () => {
      expect(parseMeasurement("-3.5")).toBe(-3.5);
    });

    it("returns null for empty, missing and unparsable values", () => {
      expect(parseMeasurement("")).toBeNull();
      expect(parseMeasurement(undefined)).toBeNull();
      expect(parseMeasurement("n/a")).toBeNull();
      expect(parseMeasurement("NaN")).toBeNull();
    });
  });

  describe("parseNumericValue", () => {
    it("parses numeric strings", () => {
      expect(parseNumericValue("12.5")).toBe(12.5);
      expect(parseNumericValue(" 3 ")).toBe(3);
      expect(parseNumericValue("-4.2")).toBe(-4.2);
    });

    it("passes through finite numbers", () => {
      expect(parseNumericValue(7.5)).toBe(7.5);
    });

    it("treats zero as no reading", () => {
      expect(parseNumericValue("0")).toBeNull();
      expect(parseNumericValue("0.0")).toBeNull();
      expect(parseNumericValue(0)).toBeNull();
    });

    it("returns null for empty, missing and unparsable values", () => {
      expect(parseNumericValue("")).toBeNull();
      expect(parseNumericValue("   ")).toBeNull();
      expect(parseNumericValue(undefined)).toBeNull();
      expect(parseNumericValue(null)).toBeNull();
      expect(parseNumericValue("abc")).toBeNull();
      expect(parseNumericValue("12abc")).toBeNull();
      expect(parseNumericValue(true)).toBeNull();
    });

    it("returns null for non-finite values", () => {
      expect(parseNumericValue("Infinity")).toBeNull();
      expect(parseNumericValue(Number.NaN)).toBeNull();
    });
  });

  describe("parseRelayState", () => {
    it("accepts ON in any case", () => {
      expect(parseRelayState("ON")).toBe("ON");
      expect(parseRelayState("on")).toBe("ON");
    });

    it("defaults everything else to OFF", () => {
      expect(parseRelayState("OFF")).toBe("OFF");
      expect(parseRelayState("")).toBe("OFF");
      expect(parseRelayState(undefined)).toBe("OFF");
      expect(parseRelayState(1)).toBe("OFF");
    });
  });

  describe("parseAlarmState", () => {
    it("accepts BUZ and defaults to NOR", () => {
      expect(parseAlarmState("BUZ")).toBe("BUZ");
      expect(parseAlarmState("buz")).toBe("BUZ");
      expect(parseAlarmState("NOR")).toBe("NOR");
      expect(parseAlarmState(undefined)).toBe("NOR");
    });
  });

  describe("parseSensorPayload", () => {
    it("maps every VAL slot to its field", () => {
      const result = parseSensorPayload(FULL_PAYLOAD);

      expect(result._unsafeUnwrap()).toEqual({
        current: 6.25,
        voltage: 24.1,
        rpm: 2750,
        ambientTempC: 26.5,
        humidity: 55,
        ambientTempF: 79.7,
        heatIndexC: 27.1,
        heatIndexF: 80.8,
        relay1: "ON",
        relay2: "OFF",
        relay3: "ON",
        alarm: "BUZ",
      });
    });

    it("nulls sentinel zeros and missing fields independently", () => {
      const result = parseSensorPayload({ VAL1: "0", VAL2: "23.9", VAL3: "" });

      expect(result._unsafeUnwrap()).toEqual({
        current: null,
        voltage: 23.9,
        rpm: null,
        ambientTempC: null,
        humidity: null,
        ambientTempF: null,
        heatIndexC: null,
        heatIndexF: null,
        relay1: "OFF",
        relay2: "OFF",
        relay3: "OFF",
        alarm: "NOR",
      });
    });

    it("keeps zero for the environment slots", () => {
      const result = parseSensorPayload({
        VAL1: "0",
        VAL4: "0",
        VAL5: "0",
        VAL6: "0",
        VAL7: "0",
        VAL8: "0",
      });

      expect(result._unsafeUnwrap()).toMatchObject({
        current: null,
        ambientTempC: 0,
        humidity: 0,
        ambientTempF: 0,
        heatIndexC: 0,
        heatIndexF: 0,
      });
    });

    it("accepts a payload carrying only relay fields", () => {
      const result = parseSensorPayload({ VAL10: "ON" });

      expect(result._unsafeUnwrap().relay2).toBe("ON");
    });

    it("rejects non-object payloads", () => {
      expect(parseSensorPayload(null)._unsafeUnwrapErr().type).toBe("INVALID_PAYLOAD");
      expect(parseSensorPayload("VAL1=3").isErr()).toBe(true);
      expect(parseSensorPayload([1, 2]).isErr()).toBe(true);
      expect(parseSensorPayload(undefined).isErr()).toBe(true);
    });

    it("accepts an object with no VAL fields as an all-empty reading", () => {
      const result = parseSensorPayload({ TYPE: "ADU_TEXT" });

      expect(result._unsafeUnwrap()).toEqual({
        current: null,
        voltage: null,
        rpm: null,
        ambientTempC: null,
        humidity: null,
        ambientTempF: null,
        heatIndexC: null,
        heatIndexF: null,
        relay1: "OFF",
        relay2: "OFF",
        relay3: "OFF",
        alarm: "NOR",
      });
    });

    it("rejects an empty object", () => {
      const result = parseSensorPayload({});

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_PAYLOAD",
        message: "Payload is empty",
      });
    });
  });
});
