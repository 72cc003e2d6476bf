/**
 * State Module - Service Layer
 *
 * Owns the monitor state. `dispatch` is the only way to change it; each
 * call applies one update synchronously and broadcasts what it caused.
 */
import { createLogger } from "../logger.js";
import { broadcast } from "../sse/index.js";
import { INITIAL_STATE, type MonitorState, type StateUpdate, type SystemStatus } from "./schema.js";
import { reduceState, systemStatusOf } from "./transform.js";

const log = createLogger("state");

// =============================================================================
// Module State
// =============================================================================

let state: MonitorState = INITIAL_STATE;

// =============================================================================
// State Accessors
// =============================================================================

/**
 * Get the current monitor state.
 */
export function getState(): MonitorState {
  return state;
}

/**
 * Get connectivity and analysis status.
 */
export function getSystemStatus(): SystemStatus {
  return systemStatusOf(state);
}

// =============================================================================
// Updates
// =============================================================================

/**
 * Apply an update and broadcast its events.
 *
 * @returns The state after the update
 */
export function dispatch(update: StateUpdate): MonitorState {
  const { state: next, events } = reduceState(state, update);
  state = next;

  for (const event of events) {
    if (event.type === "connection_lost") {
      log.warn(
        { component: event.component, elapsedSeconds: event.elapsedSeconds },
        event.message,
      );
    }
    broadcast(event);
  }

  return state;
}

/**
 * Reset to the initial state (for testing).
 */
export function resetState(): void {
  state = INITIAL_STATE;
}
