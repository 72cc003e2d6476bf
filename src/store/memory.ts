/**
 * Store Module - In-Memory Implementation
 *
 * Keeps everything in arrays in insertion order. Used by tests and by
 * STORE_DRIVER=memory, so every collection is bounded: readings by age,
 * alerts and system events by count.
 */
import { err, ok } from "neverthrow";

import { notFound } from "./errors.js";
import {
  type Alert,
  type HistoricalReading,
  MEMORY_MAX_ALERTS,
  MEMORY_MAX_EVENTS,
  MEMORY_RETENTION_MS,
  type MonitoringStore,
  type SystemEvent,
} from "./schema.js";

export type MemoryStoreOptions = Readonly<{
  /** Readings older than this, relative to the newest append, are dropped. */
  retentionMs?: number;
  maxAlerts?: number;
  maxEvents?: number;
}>;

/**
 * Drop the oldest entries past `max`.
 */
function capLength<T>(rows: T[], max: number): void {
  if (rows.length > max) {
    rows.splice(0, rows.length - max);
  }
}

export function createMemoryStore(options: MemoryStoreOptions = {}): MonitoringStore {
  const retentionMs = options.retentionMs ?? MEMORY_RETENTION_MS;
  const maxAlerts = options.maxAlerts ?? MEMORY_MAX_ALERTS;
  const maxEvents = options.maxEvents ?? MEMORY_MAX_EVENTS;

  const readings: HistoricalReading[] = [];
  const alerts: Alert[] = [];
  const events: SystemEvent[] = [];
  let nextId = 1;

  const newestFirst = <T extends { id: number }>(
    key: (row: T) => number,
  ) => (a: T, b: T) => key(b) - key(a) || b.id - a.id;

  const pruneReadings = (newest: number) => {
    const cutoff = newest - retentionMs;
    let stale = 0;
    for (const row of readings) {
      if (row.recordedAt > cutoff) break;
      stale++;
    }
    if (stale > 0) {
      readings.splice(0, stale);
    }
  };

  return {
    async appendReading(reading) {
      const row = { ...reading, id: nextId++ };
      readings.push(row);
      pruneReadings(row.recordedAt);
      return ok(row);
    },

    async recentReadings(windowMs, now) {
      const since = now - windowMs;
      return ok(
        readings
          .filter((row) => row.recordedAt > since)
          .sort(newestFirst<HistoricalReading>((row) => row.recordedAt)),
      );
    },

    async findUnacknowledgedAlert(type, since) {
      const match = alerts
        .filter((a) => a.type === type && !a.acknowledged && a.createdAt > since)
        .sort(newestFirst<Alert>((a) => a.createdAt))[0];
      return ok(match ?? null);
    },

    async appendAlert(alert) {
      const row = { ...alert, id: nextId++, acknowledged: false };
      alerts.push(row);
      capLength(alerts, maxAlerts);
      return ok(row);
    },

    async acknowledgeAlert(id) {
      const index = alerts.findIndex((a) => a.id === id);
      const existing = alerts[index];
      if (!existing) {
        return err(notFound("Alert", id));
      }
      const updated = { ...existing, acknowledged: true };
      alerts[index] = updated;
      return ok(updated);
    },

    async listActiveAlerts(limit) {
      return ok(
        alerts
          .filter((a) => !a.acknowledged)
          .sort(newestFirst<Alert>((a) => a.createdAt))
          .slice(0, limit),
      );
    },

    async logSystemEvent(event) {
      const row = { ...event, id: nextId++ };
      events.push(row);
      capLength(events, maxEvents);
      return ok(row);
    },

    async close() {
      readings.length = 0;
      alerts.length = 0;
      events.length = 0;
    },
  };
}
