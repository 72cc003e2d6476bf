/**
 * Ingest Module - Service Layer
 *
 * Push path for the sensor module: parse, update state, append history.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type SensorSnapshot, dispatch, historicalReadingOf } from "../state/index.js";
import { type MonitoringStore, formatStoreError } from "../store/index.js";
import type { IngestError } from "./errors.js";
import { parseSensorPayload } from "./transform.js";

const log = createLogger("ingest");

/**
 * Apply one sensor payload.
 *
 * A history write failure is logged and does not fail the ingestion;
 * the live state and its event have already been updated by then.
 *
 * @returns The snapshot after the update
 */
export async function ingestSensorPayload(
  payload: unknown,
  store: MonitoringStore,
  now: number,
): Promise<Result<SensorSnapshot, IngestError>> {
  const parsed = parseSensorPayload(payload);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const state = dispatch({ type: "sensor_reading", patch: parsed.value, at: now });

  log.info(
    {
      current: state.snapshot.current,
      voltage: state.snapshot.voltage,
      rpm: state.snapshot.rpm,
    },
    "Sensor data received",
  );

  const saved = await store.appendReading(historicalReadingOf(state, now));
  if (saved.isErr()) {
    log.error({ error: formatStoreError(saved.error) }, "Failed to persist sensor reading");
  }

  return ok(state.snapshot);
}
