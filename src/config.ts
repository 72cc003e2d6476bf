/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Motor health monitor configuration covering:
 * - Server settings
 * - Controller (MC protocol) connection and register map
 * - Scheduler intervals and device liveness timeouts
 * - Persistence
 */
import "dotenv/config";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(5000).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("MotorHealthMonitor")
    .describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Controller (poll device)
  // ==========================================================================
  PLC_HOST: z
    .string()
    .min(1)
    .default("192.168.3.39")
    .describe("Controller IP address or hostname"),
  PLC_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(5007)
    .describe("Controller MC protocol TCP port"),
  PLC_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Socket timeout for a single register read (ms)"),
  PLC_VOLTAGE_REGISTER: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(100)
    .describe("D register holding the raw motor voltage"),
  PLC_TEMPERATURE_REGISTER: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(102)
    .describe("D register holding the raw motor temperature"),

  // ==========================================================================
  // Scheduler
  // ==========================================================================
  PLC_POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("Controller poll interval (ms)"),
  HEALTH_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(15000)
    .describe("Health and recommendation cycle interval (ms)"),
  LIVENESS_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Liveness sweep interval (ms)"),
  SENSOR_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(30000)
    .describe("Sensor module is marked disconnected after this silence (ms)"),
  CONTROLLER_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Controller is marked disconnected after this silence (ms)"),
  HISTORY_WINDOW_HOURS: z.coerce
    .number()
    .positive()
    .default(2)
    .describe("History window read back for trend prediction (hours)"),

  // ==========================================================================
  // Persistence
  // ==========================================================================
  STORE_DRIVER: z
    .enum(["sqlite", "memory"])
    .default("sqlite")
    .describe("Persistence backend"),
  DATABASE_PATH: z
    .string()
    .default("data/motor-monitoring.db")
    .describe("SQLite database file (or :memory:)"),
  DATABASE_FLUSH_INTERVAL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(30000)
    .describe("How often the SQLite image is written to DATABASE_PATH (0 = only on close)"),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ENABLE_OUTLIER_DETECTION: envBoolean(false).describe(
    "Let the z-score outlier detector affect the predictive score",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Controller connection and register map for the poll loop.
 */
export function getControllerConfig(): Readonly<{
  host: string;
  port: number;
  timeoutMs: number;
  voltageRegister: number;
  temperatureRegister: number;
}> {
  return {
    host: config.PLC_HOST,
    port: config.PLC_PORT,
    timeoutMs: config.PLC_TIMEOUT_MS,
    voltageRegister: config.PLC_VOLTAGE_REGISTER,
    temperatureRegister: config.PLC_TEMPERATURE_REGISTER,
  };
}

/**
 * Scheduler intervals and liveness timeouts.
 */
export function getSchedulerConfig(): Readonly<{
  pollIntervalMs: number;
  healthIntervalMs: number;
  livenessIntervalMs: number;
  historyWindowMs: number;
  timeouts: Readonly<{ sensor: number; controller: number }>;
}> {
  return {
    pollIntervalMs: config.PLC_POLL_INTERVAL_MS,
    healthIntervalMs: config.HEALTH_INTERVAL_MS,
    livenessIntervalMs: config.LIVENESS_INTERVAL_MS,
    historyWindowMs: config.HISTORY_WINDOW_HOURS * 60 * 60 * 1000,
    timeouts: {
      sensor: config.SENSOR_TIMEOUT_MS,
      controller: config.CONTROLLER_TIMEOUT_MS,
    },
  };
}
