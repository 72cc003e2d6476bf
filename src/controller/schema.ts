/**
 * Controller Module - Schemas and Types
 *
 * Data shapes for the poll-based controller: the connection target,
 * the MC protocol 3E frame constants, and decoded register values.
 */
import { z } from "zod";

// =============================================================================
// Connection Target
// =============================================================================

export const ControllerTargetSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive(),
  timeoutMs: z.number().positive(),
  voltageRegister: z.number().int().nonnegative(),
  temperatureRegister: z.number().int().nonnegative(),
});

export type ControllerTarget = z.infer<typeof ControllerTargetSchema>;

// =============================================================================
// Register Values
// =============================================================================

/**
 * Raw register words as read from the controller, before unit conversion.
 */
export type RawControllerReading = Readonly<{
  rawVoltage: number;
  rawTemperature: number;
}>;

/**
 * Controller reading in physical units.
 */
export type ControllerReading = Readonly<{
  voltage: number;
  temperature: number;
}>;

// =============================================================================
// MC Protocol (3E binary frame)
// =============================================================================

export const MC_FRAME = {
  requestSubheader: 0x0050,
  responseSubheader: 0x00d0,
  networkNo: 0x00,
  pcNo: 0xff,
  moduleIo: 0x03ff,
  stationNo: 0x00,
  batchReadCommand: 0x0401,
  wordSubcommand: 0x0000,
  dRegisterCode: 0xa8,
  /** Monitoring timer unit is 250ms; 4 = 1s. */
  defaultMonitoringTimer: 4,
  requestLength: 21,
  /** Bytes before the data length field is known. */
  responseHeaderLength: 9,
  /** Response bytes counted by the data length field before the words. */
  endCodeLength: 2,
  maxPoints: 960,
} as const;

export type BatchReadRequest = Readonly<{
  headAddress: number;
  points: number;
  monitoringTimer?: number;
}>;

/**
 * Outcome of decoding a (possibly partial) response buffer.
 */
export type DecodeOutcome =
  | { readonly kind: "incomplete" }
  | { readonly kind: "error"; readonly message: string; readonly endCode?: number }
  | { readonly kind: "words"; readonly words: readonly number[] };
