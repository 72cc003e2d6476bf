/**
 * Scheduler Module - Service Layer
 *
 * Three independently timed loops over the shared monitor state:
 * controller poll, health cycle and liveness sweep. Each loop awaits its
 * own cycle before sleeping; all of them stop on one AbortSignal.
 */
import { config, getSchedulerConfig } from "../config.js";
import { formatControllerError, readControllerValues } from "../controller/index.js";
import { computeHealth, createZScoreDetector } from "../health/index.js";
import { promoteAlerts } from "../alerts/index.js";
import { createLogger } from "../logger.js";
import { generateRecommendations } from "../recommendations/index.js";
import { dispatch, getState, healthInputOf } from "../state/index.js";
import { type MonitoringStore, formatStoreError } from "../store/index.js";
import type { LoopName, SchedulerDeps, SchedulerOptions } from "./schema.js";
import { chronologicalHistory } from "./transform.js";

const log = createLogger("scheduler");

// =============================================================================
// Module State
// =============================================================================

let abortController: AbortController | null = null;
let running: Promise<void> | null = null;

export function isSchedulerRunning(): boolean {
  return abortController !== null;
}

/**
 * Scheduler options from configuration.
 */
export function defaultSchedulerOptions(): SchedulerOptions {
  const scheduler = getSchedulerConfig();
  return {
    ...scheduler,
    detector: config.ENABLE_OUTLIER_DETECTION ? createZScoreDetector() : undefined,
  };
}

/**
 * Production collaborators around a store.
 */
export function defaultSchedulerDeps(store: MonitoringStore): SchedulerDeps {
  return {
    store,
    readController: () => readControllerValues(),
    now: () => Date.now(),
  };
}

// =============================================================================
// Cycles
// =============================================================================

/**
 * Read the controller once and record the outcome.
 */
export async function runControllerPoll(deps: SchedulerDeps): Promise<void> {
  const result = await deps.readController();
  const at = deps.now();

  if (result.isOk()) {
    log.debug(
      { voltage: result.value.voltage, temperature: result.value.temperature },
      "Controller reading",
    );
    dispatch({ type: "controller_reading", reading: result.value, at });
    return;
  }

  const message = formatControllerError(result.error);
  log.warn({ error: message }, "Controller read failed");
  dispatch({ type: "controller_read_failed", message, at });
}

/**
 * Score health, rank recommendations and promote alerts.
 *
 * Skipped until either device has reported at least once.
 */
export async function runHealthCycle(
  deps: SchedulerDeps,
  options: SchedulerOptions,
): Promise<void> {
  const { liveness } = getState();
  if (liveness.sensor.lastSeen === null && liveness.controller.lastSeen === null) {
    dispatch({ type: "analysis_status", status: "Waiting for data" });
    return;
  }

  const now = deps.now();
  const history = await deps.store.recentReadings(options.historyWindowMs, now);
  if (history.isErr()) {
    log.error({ error: formatStoreError(history.error) }, "History unavailable, scoring without it");
  }

  // Read state after the await so the cycle scores the latest snapshot
  const state = getState();
  const health = computeHealth(
    healthInputOf(state.snapshot),
    history.isOk() ? chronologicalHistory(history.value) : [],
    options.detector,
  );
  const recommendations = generateRecommendations(health, {
    sensorConnected: state.liveness.sensor.connected,
    controllerConnected: state.liveness.controller.connected,
  });

  dispatch({
    type: "health_computed",
    health,
    recommendations,
    analysisStatus: history.isOk() ? "Active" : "Degraded",
  });

  log.debug(
    { overall: health.overallHealth, status: health.status, recommendations: recommendations.length },
    "Health cycle complete",
  );

  const summary = await promoteAlerts(recommendations, deps.store, now);
  if (summary.failures.length > 0) {
    dispatch({ type: "analysis_status", status: "Degraded" });
  }
}

/**
 * Downgrade devices that have gone quiet and publish status.
 */
export function runLivenessSweep(deps: SchedulerDeps, options: SchedulerOptions): void {
  dispatch({ type: "liveness_sweep", timeouts: options.timeouts, at: deps.now() });
}

// =============================================================================
// Loops
// =============================================================================

/**
 * Sleep that resolves early when the signal aborts.
 */
export function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const finish = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener("abort", finish, { once: true });
  });
}

async function runLoop(
  name: LoopName,
  intervalMs: number,
  cycle: () => Promise<void> | void,
  signal: AbortSignal,
  onError?: () => void,
): Promise<void> {
  log.info({ loop: name, intervalMs }, "Loop started");

  while (!signal.aborted) {
    try {
      await cycle();
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error({ loop: name, error: message }, "Error in loop cycle");
      onError?.();
    }

    await delay(intervalMs, signal);
  }

  log.info({ loop: name }, "Loop stopped");
}

/**
 * Start all three loops. They run until `stopScheduler` is called.
 */
export function startScheduler(
  deps: SchedulerDeps,
  options: SchedulerOptions = defaultSchedulerOptions(),
): void {
  if (abortController) {
    log.warn("Scheduler already running");
    return;
  }

  abortController = new AbortController();
  const { signal } = abortController;

  log.info(
    {
      pollIntervalMs: options.pollIntervalMs,
      healthIntervalMs: options.healthIntervalMs,
      livenessIntervalMs: options.livenessIntervalMs,
      outlierDetection: options.detector !== undefined,
    },
    "Starting scheduler...",
  );

  running = Promise.all([
    runLoop("controller-poll", options.pollIntervalMs, () => runControllerPoll(deps), signal),
    runLoop(
      "health",
      options.healthIntervalMs,
      () => runHealthCycle(deps, options),
      signal,
      () => dispatch({ type: "analysis_status", status: "Error" }),
    ),
    runLoop("liveness", options.livenessIntervalMs, () => runLivenessSweep(deps, options), signal),
  ]).then(() => undefined);
}

/**
 * Signal every loop to stop and wait for in-flight cycles to finish.
 */
export async function stopScheduler(): Promise<void> {
  if (!abortController) {
    log.warn("Scheduler not running");
    return;
  }

  log.info("Stopping scheduler...");
  abortController.abort();
  await running;
  abortController = null;
  running = null;
  log.info("Scheduler stopped");
}
