/**
 * Controller Module - Service Layer
 *
 * Reads the voltage and temperature registers from the controller over
 * a short-lived TCP connection speaking the MC protocol (3E binary).
 */
import { createConnection } from "node:net";
import { type Result, err, ok } from "neverthrow";

import { getControllerConfig } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type ControllerError,
  connectionFailed,
  formatControllerError,
  protocolError,
  timeout,
} from "./errors.js";
import type {
  ControllerReading,
  ControllerTarget,
  RawControllerReading,
} from "./schema.js";
import {
  decodeBatchReadResponse,
  encodeBatchReadRequest,
  extractRawReading,
  registerSpan,
  toControllerReading,
} from "./transform.js";

const log = createLogger("controller");

/**
 * Send one request frame and collect words until the response frame is
 * complete. The socket is destroyed on every exit path.
 */
function exchange(
  target: ControllerTarget,
  frame: Buffer,
  points: number,
): Promise<Result<readonly number[], ControllerError>> {
  return new Promise((resolve) => {
    let received = Buffer.alloc(0);
    let settled = false;

    const socket = createConnection({ host: target.host, port: target.port });

    const finish = (result: Result<readonly number[], ControllerError>) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(target.timeoutMs);

    socket.on("connect", () => {
      socket.write(frame);
    });

    socket.on("data", (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      const outcome = decodeBatchReadResponse(received, points);
      switch (outcome.kind) {
        case "incomplete":
          return;
        case "error":
          finish(err(protocolError(outcome.message, outcome.endCode)));
          return;
        case "words":
          finish(ok(outcome.words));
          return;
      }
    });

    socket.on("timeout", () => {
      finish(err(timeout(target.timeoutMs)));
    });

    socket.on("error", (error) => {
      finish(err(connectionFailed(error.message, error)));
    });

    socket.on("close", () => {
      finish(err(connectionFailed("Connection closed before a full response")));
    });
  });
}

/**
 * Read the raw voltage and temperature registers in one batch.
 *
 * Never throws; every failure comes back as a ControllerError.
 */
export async function readControllerRegisters(
  target: ControllerTarget = getControllerConfig(),
): Promise<Result<RawControllerReading, ControllerError>> {
  const span = registerSpan(target.voltageRegister, target.temperatureRegister);

  const frame = encodeBatchReadRequest({
    headAddress: span.headAddress,
    points: span.points,
  });
  if (frame.isErr()) {
    return err(frame.error);
  }

  log.debug(
    { host: target.host, port: target.port, head: span.headAddress, points: span.points },
    "Reading controller registers",
  );

  const words = await exchange(target, frame.value, span.points);
  if (words.isErr()) {
    log.warn(
      { host: target.host, error: formatControllerError(words.error) },
      "Controller read failed",
    );
    return err(words.error);
  }

  return extractRawReading(words.value, span);
}

/**
 * Read the controller and convert to volts and °C.
 */
export async function readControllerValues(
  target?: ControllerTarget,
): Promise<Result<ControllerReading, ControllerError>> {
  const raw = await readControllerRegisters(target);
  return raw.map(toControllerReading);
}
