/**
 * API routes for the motor health monitor.
 *
 * Routes are organized by domain:
 * - /send-data - Sensor module push endpoint
 * - /api/current-data, /api/health-details, /api/recommendations - Live state
 * - /api/historical-data - Chart rows from the history store
 * - /api/maintenance-alerts, /api/acknowledge-alert/:id - Alerts
 * - /api/motor-control - Manual control log
 * - /api/system-status, /api/health - Status
 * - /api/events - SSE stream for real-time updates
 */
import { Hono } from "hono";
import { z } from "zod";

import { getControllerConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { formatIngestError, ingestSensorPayload } from "../ingest/index.js";
import { generateRecommendations } from "../recommendations/index.js";
import { isSchedulerRunning } from "../scheduler/index.js";
import { type SseEvent, createSseStream, getClientCount } from "../sse/index.js";
import { getState, getSystemStatus } from "../state/index.js";
import {
  type Alert,
  type HistoricalReading,
  type MonitoringStore,
  formatStoreError,
} from "../store/index.js";

const log = createLogger("api");

const MAX_ACTIVE_ALERTS = 10;
const HOUR_MS = 60 * 60 * 1000;

const HistoryQuerySchema = z.object({
  hours: z.coerce.number().positive().max(24 * 365).default(24),
});

const AlertIdSchema = z.coerce.number().int().positive();

const MotorCommandSchema = z.object({
  command: z.string().trim().min(1),
});

// =============================================================================
// Response Views
// =============================================================================

function chartRowOf(row: HistoricalReading) {
  return {
    timestamp: new Date(row.recordedAt).toISOString(),
    current: row.current,
    voltage: row.voltage,
    rpm: row.rpm,
    motorTemp: row.controllerTemp,
    ambientTemp: row.ambientTempC,
    humidity: row.humidity,
    overallHealth: row.overallHealth,
    electricalHealth: row.electricalHealth,
    thermalHealth: row.thermalHealth,
    mechanicalHealth: row.mechanicalHealth,
    predictiveHealth: row.predictiveHealth,
    efficiencyScore: row.efficiencyScore,
    power: row.powerKw,
  };
}

function alertViewOf(alert: Alert) {
  return { ...alert, timestamp: new Date(alert.createdAt).toISOString() };
}

/**
 * Events a new SSE client receives before any broadcast.
 */
function initialEvents(): SseEvent[] {
  const state = getState();
  return [
    { type: "status_update", status: getSystemStatus() },
    { type: "sensor_update", snapshot: state.snapshot },
    { type: "health_update", health: state.health },
  ];
}

/**
 * Build the route table around a history store.
 */
export function createRoutes(store: MonitoringStore): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Liveness of the service itself, not of the motor.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: "1.0.0",
      schedulerRunning: isSchedulerRunning(),
      sseClients: getClientCount(),
    });
  });

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Sensor module push. Fields that fail to parse degrade to null; only a
   * body that is not a non-empty object is rejected.
   */
  routes.post("/send-data", async (c) => {
    const requestId = c.get("requestId");

    let payload: unknown = null;
    try {
      payload = await c.req.json();
    } catch (error) {
      log.warn(
        { requestId, error: error instanceof Error ? error.message : String(error) },
        "Request body is not JSON",
      );
    }

    const result = await ingestSensorPayload(payload, store, Date.now());
    if (result.isErr()) {
      log.warn({ requestId, error: formatIngestError(result.error) }, "Sensor payload rejected");
      return c.json(
        { status: "error", message: formatIngestError(result.error), requestId },
        400,
      );
    }

    return c.json({ status: "success", message: "Data received", requestId });
  });

  // ===========================================================================
  // Live State
  // ===========================================================================

  routes.get("/api/current-data", (c) => {
    const state = getState();
    return c.json({
      data: state.snapshot,
      health: state.health,
      status: getSystemStatus(),
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/api/health-details", (c) => {
    return c.json({ health: getState().health });
  });

  /**
   * Recommendations regenerated from the latest breakdown and the current
   * connectivity, so a device that dropped since the last cycle shows up.
   */
  routes.get("/api/recommendations", (c) => {
    const { health, liveness } = getState();
    const recommendations = generateRecommendations(health, {
      sensorConnected: liveness.sensor.connected,
      controllerConnected: liveness.controller.connected,
    });
    return c.json({ recommendations });
  });

  // ===========================================================================
  // History
  // ===========================================================================

  routes.get("/api/historical-data", async (c) => {
    const requestId = c.get("requestId");

    const query = HistoryQuerySchema.safeParse({ hours: c.req.query("hours") });
    if (!query.success) {
      return c.json({ error: "hours must be a positive number", requestId }, 400);
    }

    const result = await store.recentReadings(query.data.hours * HOUR_MS, Date.now());
    if (result.isErr()) {
      log.error({ requestId, error: formatStoreError(result.error) }, "Failed to read history");
      return c.json({ error: formatStoreError(result.error), requestId }, 500);
    }

    if (result.value.length === 0) {
      return c.json({ data: [], message: "No data available" });
    }
    return c.json({ data: result.value.map(chartRowOf) });
  });

  // ===========================================================================
  // Maintenance Alerts
  // ===========================================================================

  routes.get("/api/maintenance-alerts", async (c) => {
    const requestId = c.get("requestId");

    const result = await store.listActiveAlerts(MAX_ACTIVE_ALERTS);
    if (result.isErr()) {
      log.error({ requestId, error: formatStoreError(result.error) }, "Failed to list alerts");
      return c.json({ error: formatStoreError(result.error), requestId }, 500);
    }

    return c.json({ alerts: result.value.map(alertViewOf) });
  });

  routes.post("/api/acknowledge-alert/:id", async (c) => {
    const requestId = c.get("requestId");

    const id = AlertIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json({ status: "error", message: "Alert not found", requestId }, 404);
    }

    const result = await store.acknowledgeAlert(id.data);
    if (result.isErr()) {
      if (result.error.type === "NOT_FOUND") {
        return c.json({ status: "error", message: "Alert not found", requestId }, 404);
      }
      log.error(
        { requestId, alertId: id.data, error: formatStoreError(result.error) },
        "Failed to acknowledge alert",
      );
      return c.json(
        { status: "error", message: formatStoreError(result.error), requestId },
        500,
      );
    }

    log.info({ requestId, alertId: id.data }, "Alert acknowledged");
    return c.json({ status: "success", requestId });
  });

  // ===========================================================================
  // Motor Control
  // ===========================================================================

  /**
   * Record a manual control command. Nothing is written to the controller.
   */
  routes.post("/api/motor-control", async (c) => {
    const requestId = c.get("requestId");

    let body: unknown = null;
    try {
      body = await c.req.json();
    } catch (error) {
      log.warn(
        { requestId, error: error instanceof Error ? error.message : String(error) },
        "Request body is not JSON",
      );
    }

    const parsed = MotorCommandSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ status: "error", message: "command is required", requestId }, 400);
    }

    const { command } = parsed.data;
    log.info({ requestId, command }, "Motor control command received");

    const result = await store.logSystemEvent({
      createdAt: Date.now(),
      eventType: "Manual Control",
      component: "Motor",
      message: `Command: ${command}`,
      severity: "INFO",
    });
    if (result.isErr()) {
      log.error({ requestId, error: formatStoreError(result.error) }, "Failed to log command");
      return c.json(
        { status: "error", message: formatStoreError(result.error), requestId },
        500,
      );
    }

    return c.json({ status: "success", message: `Command ${command} logged`, requestId });
  });

  // ===========================================================================
  // System Status
  // ===========================================================================

  routes.get("/api/system-status", (c) => {
    const state = getState();
    const controller = getControllerConfig();

    return c.json({
      systemStatus: getSystemStatus(),
      sensorStatus: {
        ...state.liveness.sensor,
        lastUpdate: state.lastUpdate,
      },
      controllerStatus: {
        ...state.liveness.controller,
        host: controller.host,
        port: controller.port,
      },
      healthSummary: state.health,
    });
  });

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  /**
   * SSE endpoint for real-time updates. New clients get the current status,
   * snapshot and health before any broadcast.
   */
  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");

    const { stream, clientId } = createSseStream(initialEvents());

    log.info({ requestId, clientId }, "SSE client connected");

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
