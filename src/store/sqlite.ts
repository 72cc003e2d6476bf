/**
 * Store Module - SQLite Implementation
 *
 * drizzle-orm over sql.js. The database lives in memory and its image is
 * written to the file on an interval and on close. Queries are
 * synchronous; every call is wrapped so a thrown driver error comes back
 * as a StoreError.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { and, desc, eq, gt } from "drizzle-orm";
import { drizzle } from "drizzle-orm/sql-js";
import { type Result, err, ok } from "neverthrow";
import sqlJs, { type Database } from "sql.js";

import { createLogger } from "../logger.js";
import {
  type StoreError,
  formatStoreError,
  notFound,
  openFailed,
  queryFailed,
} from "./errors.js";
import { SCHEMA_STATEMENTS } from "./migrations.js";
import type { MonitoringStore } from "./schema.js";
import { maintenanceAlerts, sensorReadings, systemEvents } from "./tables.js";

const log = createLogger("store");

export const IN_MEMORY_PATH = ":memory:";
export const DEFAULT_FLUSH_INTERVAL_MS = 30_000;

export type SqliteStoreOptions = Readonly<{
  /** 0 writes the file only on close. */
  flushIntervalMs?: number;
}>;

/**
 * Run one synchronous query, turning a throw into QUERY_FAILED.
 */
function attempt<T>(operation: string, run: () => T): Result<T, StoreError> {
  try {
    return ok(run());
  } catch (error) {
    const storeError = queryFailed(operation, error);
    log.error({ operation, error: formatStoreError(storeError) }, "Store query failed");
    return err(storeError);
  }
}

/**
 * Load the database image from disk, or start an empty one.
 */
async function loadDatabase(path: string): Promise<Database> {
  // The package sets `default` on its own export, so this resolves under ESM and CommonJS
  const SQL = await sqlJs.default();
  if (path !== IN_MEMORY_PATH && existsSync(path)) {
    return new SQL.Database(readFileSync(path));
  }
  return new SQL.Database();
}

/**
 * Open (or create) the database and apply the schema.
 */
export async function openSqliteStore(
  path: string,
  options: SqliteStoreOptions = {},
): Promise<Result<MonitoringStore, StoreError>> {
  const persistent = path !== IN_MEMORY_PATH;
  const flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;

  let sqlite: Database;
  try {
    if (persistent) {
      mkdirSync(dirname(path), { recursive: true });
    }
    sqlite = await loadDatabase(path);
    for (const statement of SCHEMA_STATEMENTS) {
      sqlite.exec(statement);
    }
    if (persistent) {
      writeFileSync(path, sqlite.export());
    }
  } catch (error) {
    return err(openFailed(path, error));
  }

  const db = drizzle(sqlite);
  let dirty = false;
  let closed = false;

  /**
   * Write the image to disk if anything changed since the last write.
   */
  const flush = (): Result<void, StoreError> => {
    if (!persistent || !dirty) {
      return ok(undefined);
    }
    const written = attempt("flush", () => writeFileSync(path, sqlite.export()));
    if (written.isOk()) {
      dirty = false;
    }
    return written;
  };

  const write = <T>(operation: string, run: () => T): Result<T, StoreError> => {
    const result = attempt(operation, run);
    if (result.isOk()) {
      dirty = true;
    }
    return result;
  };

  const timer =
    persistent && flushIntervalMs > 0
      ? setInterval(() => {
          const flushed = flush();
          if (flushed.isErr()) {
            log.warn({ path, error: formatStoreError(flushed.error) }, "Database flush failed");
          }
        }, flushIntervalMs)
      : null;
  timer?.unref();

  const store: MonitoringStore = {
    async appendReading(reading) {
      return write("appendReading", () =>
        db.insert(sensorReadings).values(reading).returning().get(),
      );
    },

    async recentReadings(windowMs, now) {
      return attempt("recentReadings", () =>
        db
          .select()
          .from(sensorReadings)
          .where(gt(sensorReadings.recordedAt, now - windowMs))
          .orderBy(desc(sensorReadings.recordedAt), desc(sensorReadings.id))
          .all(),
      );
    },

    async findUnacknowledgedAlert(type, since) {
      return attempt("findUnacknowledgedAlert", () => {
        const row = db
          .select()
          .from(maintenanceAlerts)
          .where(
            and(
              eq(maintenanceAlerts.type, type),
              eq(maintenanceAlerts.acknowledged, false),
              gt(maintenanceAlerts.createdAt, since),
            ),
          )
          .orderBy(desc(maintenanceAlerts.createdAt), desc(maintenanceAlerts.id))
          .limit(1)
          .get();
        return row ?? null;
      });
    },

    async appendAlert(alert) {
      return write("appendAlert", () =>
        db
          .insert(maintenanceAlerts)
          .values({ ...alert, acknowledged: false })
          .returning()
          .get(),
      );
    },

    async acknowledgeAlert(id) {
      const updated = write("acknowledgeAlert", () =>
        db
          .update(maintenanceAlerts)
          .set({ acknowledged: true })
          .where(eq(maintenanceAlerts.id, id))
          .returning()
          .get(),
      );
      return updated.andThen((row) => (row ? ok(row) : err(notFound("Alert", id))));
    },

    async listActiveAlerts(limit) {
      return attempt("listActiveAlerts", () =>
        db
          .select()
          .from(maintenanceAlerts)
          .where(eq(maintenanceAlerts.acknowledged, false))
          .orderBy(desc(maintenanceAlerts.createdAt), desc(maintenanceAlerts.id))
          .limit(limit)
          .all(),
      );
    },

    async logSystemEvent(event) {
      return write("logSystemEvent", () =>
        db.insert(systemEvents).values(event).returning().get(),
      );
    },

    async close() {
      if (closed) {
        return;
      }
      closed = true;
      if (timer) {
        clearInterval(timer);
      }
      const flushed = flush();
      if (flushed.isErr()) {
        log.error({ path, error: formatStoreError(flushed.error) }, "Final database flush failed");
      }
      sqlite.close();
    },
  };

  return ok(store);
}
