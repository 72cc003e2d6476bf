/**
 * Controller Module - Error Types
 *
 * Typed error unions for controller register reads.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while reading controller registers.
 */
export type ControllerError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly message: string;
      readonly endCode?: number;
    };

/**
 * Create a CONNECTION_FAILED error.
 */
export function connectionFailed(
  message: string,
  cause?: Error,
): ControllerError {
  if (cause) {
    return { type: "CONNECTION_FAILED", message, cause };
  }
  return { type: "CONNECTION_FAILED", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(timeoutMs: number): ControllerError {
  return {
    type: "TIMEOUT",
    message: `No response within ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Create a PROTOCOL_ERROR.
 */
export function protocolError(
  message: string,
  endCode?: number,
): ControllerError {
  if (endCode !== undefined) {
    return { type: "PROTOCOL_ERROR", message, endCode };
  }
  return { type: "PROTOCOL_ERROR", message };
}

/**
 * Format a ControllerError for logging.
 */
export function formatControllerError(error: ControllerError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Connection failed: ${error.message}`;
    case "TIMEOUT":
      return `Timeout: ${error.message}`;
    case "PROTOCOL_ERROR":
      return error.endCode !== undefined
        ? `Protocol error (end code 0x${error.endCode.toString(16).padStart(4, "0")}): ${error.message}`
        : `Protocol error: ${error.message}`;
  }
}
