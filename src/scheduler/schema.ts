/**
 * Scheduler Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { ControllerError, ControllerReading } from "../controller/index.js";
import type { OutlierDetector } from "../health/index.js";
import type { LivenessTimeouts } from "../liveness/index.js";
import type { MonitoringStore } from "../store/index.js";

export type SchedulerOptions = Readonly<{
  pollIntervalMs: number;
  healthIntervalMs: number;
  livenessIntervalMs: number;
  historyWindowMs: number;
  timeouts: LivenessTimeouts;
  detector?: OutlierDetector;
}>;

/**
 * Collaborators the loops call out to.
 */
export type SchedulerDeps = Readonly<{
  store: MonitoringStore;
  readController: () => Promise<Result<ControllerReading, ControllerError>>;
  now: () => number;
}>;

export type LoopName = "controller-poll" | "health" | "liveness";
