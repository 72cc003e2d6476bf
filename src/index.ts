/**
 * Motor Health Monitor - Application Entry Point
 *
 * Sets up the Hono server with request ID tracing, global error handling
 * and the API routes, then starts the scheduler loops.
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import { config, getControllerConfig, getSchedulerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { defaultSchedulerDeps, startScheduler, stopScheduler } from "./scheduler/index.js";
import { disconnectAllClients } from "./sse/index.js";
import { formatStoreError, openStore } from "./store/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  MOTOR HEALTH MONITOR");
console.log("========================================");
console.log("");

const controller = getControllerConfig();
const scheduler = getSchedulerConfig();

// Log configuration summary
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    controller: `${controller.host}:${controller.port}`,
    registers: { voltage: controller.voltageRegister, temperature: controller.temperatureRegister },
    pollIntervalMs: scheduler.pollIntervalMs,
    healthIntervalMs: scheduler.healthIntervalMs,
    livenessIntervalMs: scheduler.livenessIntervalMs,
    storeDriver: config.STORE_DRIVER,
    databasePath: config.DATABASE_PATH,
  },
  "Configuration loaded",
);

if (config.ENABLE_OUTLIER_DETECTION) {
  log.info("Outlier detection: ENABLED");
} else {
  log.info("Outlier detection: DISABLED");
}

console.log("");

// =============================================================================
// PERSISTENCE
// =============================================================================

const opened = await openStore();
if (opened.isErr()) {
  log.fatal({ error: formatStoreError(opened.error) }, "Cannot open history store");
  process.exit(1);
}
const store = opened.value;

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", createRoutes(store));

// =============================================================================
// START SCHEDULER
// =============================================================================

startScheduler(defaultSchedulerDeps(store));

// =============================================================================
// START SERVER
// =============================================================================

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" }, (info) => {
  log.info(
    { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
    `🚀 ${config.APP_NAME} listening on port ${info.port}`,
  );
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop loops and wait for in-flight cycles
  await stopScheduler();

  // Close SSE connections
  disconnectAllClients();

  server.close();
  await store.close();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error) => {
    log.error({ error: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
