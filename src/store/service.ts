/**
 * Store Module - Service Layer
 *
 * Picks the store implementation from configuration.
 */
import { type Result, ok } from "neverthrow";

import { config } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { type StoreError, formatStoreError } from "./errors.js";
import { createMemoryStore } from "./memory.js";
import type { MonitoringStore } from "./schema.js";
import { openSqliteStore } from "./sqlite.js";

const log = createLogger("store");

export type StoreOptions = Readonly<{
  driver: "sqlite" | "memory";
  path: string;
  flushIntervalMs?: number;
}>;

/**
 * Open the configured store.
 */
export async function openStore(
  options: StoreOptions = {
    driver: config.STORE_DRIVER,
    path: config.DATABASE_PATH,
    flushIntervalMs: config.DATABASE_FLUSH_INTERVAL_MS,
  },
): Promise<Result<MonitoringStore, StoreError>> {
  const startTime = Date.now();
  logOperationStart(log, "openStore", { driver: options.driver });

  if (options.driver === "memory") {
    logOperationComplete(log, "openStore", startTime, { driver: "memory" });
    return ok(createMemoryStore());
  }

  const result = await openSqliteStore(options.path, { flushIntervalMs: options.flushIntervalMs });
  if (result.isErr()) {
    logOperationFailed(log, "openStore", formatStoreError(result.error), {
      path: options.path,
    });
    return result;
  }

  logOperationComplete(log, "openStore", startTime, { driver: "sqlite", path: options.path });
  return result;
}
