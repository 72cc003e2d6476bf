/**
 * Ingest Module - Pure Transformations
 *
 * Turns a raw push payload into a SensorPatch. Empty and unparsable
 * numeric values mean "no reading" and become null. Zero is also "no
 * reading" for current, voltage and rpm, but a real value for the
 * environment slots.
 */
import { type Result, err, ok } from "neverthrow";

import { type IngestError, invalidPayload } from "./errors.js";
import {
  type AlarmState,
  type RelayState,
  type SensorPatch,
  SensorPayloadSchema,
} from "./schema.js";

/**
 * Parse one environment slot. Returns null for an empty or missing value
 * and anything that is not a finite number; zero is kept.
 */
export function parseMeasurement(value: unknown): number | null {
  let parsed: number;

  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    parsed = Number(trimmed);
  } else {
    return null;
  }

  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse one electrical or speed slot, where the module sends 0 for
 * "no reading".
 */
export function parseNumericValue(value: unknown): number | null {
  const parsed = parseMeasurement(value);
  return parsed === 0 ? null : parsed;
}

/**
 * "ON" in any case is ON; everything else, including absence, is OFF.
 */
export function parseRelayState(value: unknown): RelayState {
  return typeof value === "string" && value.trim().toUpperCase() === "ON"
    ? "ON"
    : "OFF";
}

/**
 * "BUZ" in any case is BUZ; everything else is NOR.
 */
export function parseAlarmState(value: unknown): AlarmState {
  return typeof value === "string" && value.trim().toUpperCase() === "BUZ"
    ? "BUZ"
    : "NOR";
}

/**
 * Parse a sensor push payload.
 *
 * Rejects only a payload that is not an object or is an empty object.
 * Missing and bad fields degrade to null, OFF or NOR.
 */
export function parseSensorPayload(
  payload: unknown,
): Result<SensorPatch, IngestError> {
  const parsed = SensorPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return err(invalidPayload("Payload must be a JSON object"));
  }

  const data = parsed.data;
  if (Object.keys(data).length === 0) {
    return err(invalidPayload("Payload is empty"));
  }

  return ok({
    current: parseNumericValue(data.VAL1),
    voltage: parseNumericValue(data.VAL2),
    rpm: parseNumericValue(data.VAL3),
    ambientTempC: parseMeasurement(data.VAL4),
    humidity: parseMeasurement(data.VAL5),
    ambientTempF: parseMeasurement(data.VAL6),
    heatIndexC: parseMeasurement(data.VAL7),
    heatIndexF: parseMeasurement(data.VAL8),
    relay1: parseRelayState(data.VAL9),
    relay2: parseRelayState(data.VAL10),
    relay3: parseRelayState(data.VAL11),
    alarm: parseAlarmState(data.VAL12),
  });
}
