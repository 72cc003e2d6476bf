/**
 * Ingest Module - Error Types
 */

export type IngestError = {
  readonly type: "INVALID_PAYLOAD";
  readonly message: string;
};

/**
 * Create an INVALID_PAYLOAD error.
 */
export function invalidPayload(message: string): IngestError {
  return { type: "INVALID_PAYLOAD", message };
}

/**
 * Format an IngestError for logging.
 */
export function formatIngestError(error: IngestError): string {
  return `Invalid payload: ${error.message}`;
}
