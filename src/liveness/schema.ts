/**
 * Liveness Module - Schemas and Types
 *
 * Per-device connectivity with independent timeouts.
 */
import { z } from "zod";

export const DeviceSchema = z.enum(["sensor", "controller"]);
export type Device = z.infer<typeof DeviceSchema>;

export const DEVICES = DeviceSchema.options;

export type DeviceLiveness = Readonly<{
  connected: boolean;
  /** Epoch ms of the last successful read, null until the first one. */
  lastSeen: number | null;
}>;

export type Liveness = Readonly<Record<Device, DeviceLiveness>>;

export type LivenessTimeouts = Readonly<Record<Device, number>>;

export const INITIAL_LIVENESS: Liveness = {
  sensor: { connected: false, lastSeen: null },
  controller: { connected: false, lastSeen: null },
};

export const TIMEOUT_MESSAGES: Readonly<Record<Device, string>> = {
  sensor: "Sensor module connection timeout",
  controller: "Controller connection timeout",
};

/**
 * Emitted once per connected-to-disconnected transition.
 */
export type ConnectionLost = Readonly<{
  component: Device;
  message: string;
  elapsedSeconds: number;
}>;
