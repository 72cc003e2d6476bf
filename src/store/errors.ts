/**
 * Store Module - Error Types
 *
 * Typed error unions for persistence operations.
 */

export type StoreError =
  | {
      readonly type: "QUERY_FAILED";
      readonly operation: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NOT_FOUND";
      readonly entity: string;
      readonly id: number;
      readonly message: string;
    }
  | {
      readonly type: "OPEN_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a QUERY_FAILED error from whatever the driver threw.
 */
export function queryFailed(operation: string, error: unknown): StoreError {
  if (error instanceof Error) {
    return { type: "QUERY_FAILED", operation, message: error.message, cause: error };
  }
  return { type: "QUERY_FAILED", operation, message: String(error) };
}

/**
 * Create a NOT_FOUND error.
 */
export function notFound(entity: string, id: number): StoreError {
  return { type: "NOT_FOUND", entity, id, message: `${entity} ${id} not found` };
}

/**
 * Create an OPEN_FAILED error.
 */
export function openFailed(path: string, error: unknown): StoreError {
  if (error instanceof Error) {
    return { type: "OPEN_FAILED", path, message: error.message, cause: error };
  }
  return { type: "OPEN_FAILED", path, message: String(error) };
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "QUERY_FAILED":
      return `Query ${error.operation} failed: ${error.message}`;
    case "NOT_FOUND":
      return `Not found: ${error.message}`;
    case "OPEN_FAILED":
      return `Could not open store at ${error.path}: ${error.message}`;
  }
}
