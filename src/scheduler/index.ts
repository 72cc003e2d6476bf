/**
 * Scheduler Module - Public API
 */

// Types
export type { SchedulerDeps, SchedulerOptions } from "./schema.js";

// Service functions (side effects)
export {
  defaultSchedulerDeps,
  defaultSchedulerOptions,
  isSchedulerRunning,
  runControllerPoll,
  runHealthCycle,
  runLivenessSweep,
  startScheduler,
  stopScheduler,
} from "./service.js";
