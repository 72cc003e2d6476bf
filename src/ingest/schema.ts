/**
 * Ingest Module - Schemas and Types
 *
 * Shape of the sensor module's push payload and the typed patch it is
 * parsed into. Every numeric field is independently nullable.
 */
import { z } from "zod";

// =============================================================================
// Inbound Payload
// =============================================================================

/**
 * The sensor module posts a flat object of string values keyed VAL1..VAL12
 * plus a TYPE tag. Values are kept as unknown and cleaned field by field.
 */
export const SensorPayloadSchema = z.record(z.string(), z.unknown());

export type SensorPayload = z.infer<typeof SensorPayloadSchema>;

// =============================================================================
// Parsed Reading
// =============================================================================

export const RelayStateSchema = z.enum(["ON", "OFF"]);
export type RelayState = z.infer<typeof RelayStateSchema>;

export const AlarmStateSchema = z.enum(["NOR", "BUZ"]);
export type AlarmState = z.infer<typeof AlarmStateSchema>;

/**
 * Patch applied to the sensor snapshot when a payload arrives.
 */
export type SensorPatch = Readonly<{
  current: number | null;
  voltage: number | null;
  rpm: number | null;
  ambientTempC: number | null;
  humidity: number | null;
  ambientTempF: number | null;
  heatIndexC: number | null;
  heatIndexF: number | null;
  relay1: RelayState;
  relay2: RelayState;
  relay3: RelayState;
  alarm: AlarmState;
}>;
