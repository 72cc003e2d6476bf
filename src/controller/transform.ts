/**
 * Controller Module - Pure Transformations
 *
 * Unit conversion for raw register words and the MC protocol 3E
 * batch-read codec. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { type ControllerError, protocolError } from "./errors.js";
import {
  type BatchReadRequest,
  type ControllerReading,
  type DecodeOutcome,
  MC_FRAME,
  type RawControllerReading,
} from "./schema.js";

// =============================================================================
// Unit Conversion
// =============================================================================

/** Full-scale ADC count of the controller's analog input. */
const ADC_FULL_SCALE = 4095;
const VOLTAGE_FULL_SCALE = 30;
const TEMPERATURE_PER_COUNT = 0.05175;

/** Round on the exact decimal value of the double, so 31.05 (stored as 31.0499…) reads 31.0. */
function roundTo1(value: number): number {
  return Number(value.toFixed(1));
}

/**
 * Convert a raw voltage register to volts (0-30V over 0-4095).
 * Non-positive raw values read as 0.
 */
export function voltageFromRaw(raw: number): number {
  if (raw <= 0) {
    return 0;
  }
  return roundTo1((raw / ADC_FULL_SCALE) * VOLTAGE_FULL_SCALE);
}

/**
 * Convert a raw temperature register to °C.
 * Non-positive raw values read as 0.
 */
export function temperatureFromRaw(raw: number): number {
  if (raw <= 0) {
    return 0;
  }
  return roundTo1(raw * TEMPERATURE_PER_COUNT);
}

/**
 * Convert both raw registers to physical units.
 */
export function toControllerReading(
  raw: RawControllerReading,
): ControllerReading {
  return {
    voltage: voltageFromRaw(raw.rawVoltage),
    temperature: temperatureFromRaw(raw.rawTemperature),
  };
}

// =============================================================================
// Register Span
// =============================================================================

export type RegisterSpan = Readonly<{
  headAddress: number;
  points: number;
  voltageOffset: number;
  temperatureOffset: number;
}>;

/**
 * Smallest contiguous D-register range covering both registers,
 * so a single batch read returns them together.
 */
export function registerSpan(
  voltageRegister: number,
  temperatureRegister: number,
): RegisterSpan {
  const headAddress = Math.min(voltageRegister, temperatureRegister);
  return {
    headAddress,
    points: Math.abs(voltageRegister - temperatureRegister) + 1,
    voltageOffset: voltageRegister - headAddress,
    temperatureOffset: temperatureRegister - headAddress,
  };
}

/**
 * Pick the voltage and temperature words out of a decoded batch.
 */
export function extractRawReading(
  words: readonly number[],
  span: RegisterSpan,
): Result<RawControllerReading, ControllerError> {
  const rawVoltage = words[span.voltageOffset];
  const rawTemperature = words[span.temperatureOffset];

  if (rawVoltage === undefined || rawTemperature === undefined) {
    return err(
      protocolError(
        `Expected ${span.points} words, received ${words.length}`,
      ),
    );
  }

  return ok({ rawVoltage, rawTemperature });
}

// =============================================================================
// MC Protocol 3E Binary Codec
// =============================================================================

/**
 * Encode a batch word read of D registers as a 3E binary request frame.
 *
 * Layout (little-endian):
 * ```
 * subheader(2) network(1) pc(1) module-io(2) station(1) length(2)
 * timer(2) command(2) subcommand(2) head(3) device(1) points(2)
 * ```
 */
export function encodeBatchReadRequest(
  request: BatchReadRequest,
): Result<Buffer, ControllerError> {
  const { headAddress, points } = request;
  const monitoringTimer =
    request.monitoringTimer ?? MC_FRAME.defaultMonitoringTimer;

  if (!Number.isInteger(headAddress) || headAddress < 0 || headAddress > 0xffffff) {
    return err(protocolError(`Head address out of range: ${headAddress}`));
  }
  if (!Number.isInteger(points) || points < 1 || points > MC_FRAME.maxPoints) {
    return err(protocolError(`Point count out of range: ${points}`));
  }

  const frame = Buffer.alloc(MC_FRAME.requestLength);
  frame.writeUInt16LE(MC_FRAME.requestSubheader, 0);
  frame.writeUInt8(MC_FRAME.networkNo, 2);
  frame.writeUInt8(MC_FRAME.pcNo, 3);
  frame.writeUInt16LE(MC_FRAME.moduleIo, 4);
  frame.writeUInt8(MC_FRAME.stationNo, 6);
  // Everything after the length field: timer through points
  frame.writeUInt16LE(MC_FRAME.requestLength - 9, 7);
  frame.writeUInt16LE(monitoringTimer, 9);
  frame.writeUInt16LE(MC_FRAME.batchReadCommand, 11);
  frame.writeUInt16LE(MC_FRAME.wordSubcommand, 13);
  frame.writeUIntLE(headAddress, 15, 3);
  frame.writeUInt8(MC_FRAME.dRegisterCode, 18);
  frame.writeUInt16LE(points, 19);

  return ok(frame);
}

/**
 * Decode a 3E binary response to a batch word read.
 *
 * Returns `incomplete` while more bytes are needed, so callers can feed
 * the accumulated socket buffer after every chunk.
 */
export function decodeBatchReadResponse(
  buffer: Buffer,
  points: number,
): DecodeOutcome {
  if (buffer.length < MC_FRAME.responseHeaderLength) {
    return { kind: "incomplete" };
  }

  const subheader = buffer.readUInt16LE(0);
  if (subheader !== MC_FRAME.responseSubheader) {
    return {
      kind: "error",
      message: `Unexpected response subheader 0x${subheader.toString(16).padStart(4, "0")}`,
    };
  }

  const dataLength = buffer.readUInt16LE(7);
  if (dataLength < MC_FRAME.endCodeLength) {
    return { kind: "error", message: `Invalid data length ${dataLength}` };
  }
  if (buffer.length < MC_FRAME.responseHeaderLength + dataLength) {
    return { kind: "incomplete" };
  }

  const endCode = buffer.readUInt16LE(MC_FRAME.responseHeaderLength);
  if (endCode !== 0) {
    return { kind: "error", message: "Controller rejected the read", endCode };
  }

  const wordBytes = dataLength - MC_FRAME.endCodeLength;
  if (wordBytes < points * 2) {
    return {
      kind: "error",
      message: `Short response: ${wordBytes} data bytes for ${points} points`,
    };
  }

  const start = MC_FRAME.responseHeaderLength + MC_FRAME.endCodeLength;
  const words: number[] = [];
  for (let i = 0; i < points; i++) {
    words.push(buffer.readInt16LE(start + i * 2));
  }

  return { kind: "words", words };
}
