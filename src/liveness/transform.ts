/**
 * Liveness Module - Pure Transformations
 *
 * Devices move Disconnected -> Connected on any successful read and back
 * on a timeout or a failed read. Transitions are edge-triggered: a device
 * that is already disconnected produces no further events.
 */
import {
  type ConnectionLost,
  DEVICES,
  type Device,
  type Liveness,
  type LivenessTimeouts,
  TIMEOUT_MESSAGES,
} from "./schema.js";

/**
 * Record a successful read.
 */
export function markSeen(liveness: Liveness, device: Device, now: number): Liveness {
  return { ...liveness, [device]: { connected: true, lastSeen: now } };
}

/**
 * Take a device offline outside the timeout path (e.g. a failed read).
 * Returns null when the device was already disconnected.
 */
export function markLost(
  liveness: Liveness,
  device: Device,
  message: string,
  now: number,
): { liveness: Liveness; lost: ConnectionLost } | null {
  const entry = liveness[device];
  if (!entry.connected) {
    return null;
  }

  return {
    liveness: { ...liveness, [device]: { ...entry, connected: false } },
    lost: {
      component: device,
      message,
      elapsedSeconds: entry.lastSeen === null ? 0 : (now - entry.lastSeen) / 1000,
    },
  };
}

/**
 * Sweep every device against its timeout. A device is lost when strictly
 * more than its timeout has elapsed since it was last seen.
 */
export function evaluateLiveness(
  liveness: Liveness,
  timeouts: LivenessTimeouts,
  now: number,
): { liveness: Liveness; lost: ConnectionLost[] } {
  let next = liveness;
  const lost: ConnectionLost[] = [];

  for (const device of DEVICES) {
    const { lastSeen } = next[device];
    if (lastSeen === null || now - lastSeen <= timeouts[device]) {
      continue;
    }

    const transition = markLost(next, device, TIMEOUT_MESSAGES[device], now);
    if (transition) {
      next = transition.liveness;
      lost.push(transition.lost);
    }
  }

  return { liveness: next, lost };
}
