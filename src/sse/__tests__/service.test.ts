/**
 * SSE Service Tests
 *
 * Tests SSE client management and broadcasting.
 */
import { describe, expect, test, vi, beforeEach, afterEach } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import type { SseEvent } from "../schema.js";
import {
  broadcast,
  createSseStream,
  disconnectAllClients,
  encodeEvent,
  getClientCount,
} from "../service.js";

const LOST: SseEvent = {
  type: "connection_lost",
  component: "sensor",
  message: "Sensor module connection timeout",
  elapsedSeconds: 31,
};

const LOST_WIRE =
  'event: connection_lost\ndata: {"type":"connection_lost","component":"sensor",' +
  '"message":"Sensor module connection timeout","elapsedSeconds":31}\n\n';

const HEALTH_NULL: SseEvent = { type: "health_update", health: null };
const HEALTH_NULL_WIRE = 'event: health_update\ndata: {"type":"health_update","health":null}\n\n';

async function readText(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<string> {
  const { value } = await reader.read();
  return new TextDecoder().decode(value);
}

describe("SSE Service", () => {
  beforeEach(() => {
    disconnectAllClients();
  });

  afterEach(() => {
    disconnectAllClients();
  });

  // ===========================================================================
  // Encoding
  // ===========================================================================

  describe("encodeEvent", () => {
    test("writes event name and JSON data lines", () => {
      expect(new TextDecoder().decode(encodeEvent(LOST))).toBe(LOST_WIRE);
    });
  });

  // ===========================================================================
  // Client Management
  // ===========================================================================

  describe("getClientCount", () => {
    test("returns 0 when no clients connected", () => {
      expect(getClientCount()).toBe(0);
    });

    test("returns correct count after clients connect", () => {
      createSseStream();
      createSseStream();
      createSseStream();

      expect(getClientCount()).toBe(3);
    });
  });

  describe("createSseStream", () => {
    test("increments client ID for each new client", () => {
      const client1 = createSseStream();
      const client2 = createSseStream();

      expect(client1.stream).toBeInstanceOf(ReadableStream);
      expect(client2.clientId).toBeGreaterThan(client1.clientId);
    });

    test("sends initial events in order before anything else", async () => {
      const { stream } = createSseStream([HEALTH_NULL, LOST]);
      const reader = stream.getReader();

      expect(await readText(reader)).toBe(HEALTH_NULL_WIRE);
      expect(await readText(reader)).toBe(LOST_WIRE);

      reader.releaseLock();
    });

    test("unregisters the client when the stream is cancelled", async () => {
      const { stream } = createSseStream();

      await stream.cancel();

      expect(getClientCount()).toBe(0);
    });
  });

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  describe("broadcast", () => {
    test("sends event to all connected clients", async () => {
      const reader1 = createSseStream().stream.getReader();
      const reader2 = createSseStream().stream.getReader();

      broadcast(LOST);

      expect(await readText(reader1)).toBe(LOST_WIRE);
      expect(await readText(reader2)).toBe(LOST_WIRE);

      reader1.releaseLock();
      reader2.releaseLock();
    });

    test("skips a client whose stream was cancelled", async () => {
      const cancelled = createSseStream().stream;
      const reader = createSseStream().stream.getReader();
      await cancelled.cancel();

      broadcast(HEALTH_NULL);

      expect(getClientCount()).toBe(1);
      expect(await readText(reader)).toBe(HEALTH_NULL_WIRE);

      reader.releaseLock();
    });

    test("does nothing when no clients connected", () => {
      expect(() => broadcast(LOST)).not.toThrow();
    });
  });

  describe("disconnectAllClients", () => {
    test("disconnects all connected clients", () => {
      createSseStream();
      createSseStream();

      disconnectAllClients();

      expect(getClientCount()).toBe(0);
    });
  });
});
