/**
 * Tests for SSE Transport
 */

import { Logger } from "yoguido-kernel";
import type { ServerMessage } from "yoguido-shared";
import { Registry, createApp, defineState, type UI, type YoGuidoApp } from "yoguido";
import { SSETransport, createSSETransport } from "../transports/sse";
import { asResponse, createMockResponse, parseSSEData, simulateDisconnect } from "./mocks";

beforeAll(() => {
  Logger.configure({ level: "silent" });
});

const patch: ServerMessage = {
  type: "patch",
  version: 2,
  ops: [{ op: "updateText", id: "root/text0", text: "updated" }],
};

describe("SSETransport", () => {
  let transport: SSETransport;
  let disconnected: string[];

  beforeEach(() => {
    vi.useFakeTimers();
    disconnected = [];
    transport = new SSETransport({
      heartbeatInterval: 1000,
      onDisconnect: (sessionId) => disconnected.push(sessionId),
    });
  });

  afterEach(() => {
    transport.dispose();
    vi.useRealTimers();
  });

  // ===========================================================================
  // connect
  // ===========================================================================

  describe("connect", () => {
    it("should open an event stream", () => {
      const res = createMockResponse();

      expect(transport.connect("s1", asResponse(res))).toBe(true);

      expect(res._headers).toEqual({
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
        "X-Accel-Buffering": "no",
      });
      expect(parseSSEData(res._written)).toEqual([{ type: "connected", session: "s1" }]);
      expect(transport.isConnected("s1")).toBe(true);
    });

    it("should write heartbeats", () => {
      const res = createMockResponse();
      transport.connect("s1", asResponse(res));

      vi.advanceTimersByTime(2000);

      expect(res._written.filter((chunk) => chunk === ": heartbeat\n\n")).toHaveLength(2);
    });

    it("should replace an earlier stream of the same session", () => {
      const first = createMockResponse();
      const second = createMockResponse();
      transport.connect("s1", asResponse(first));
      transport.connect("s1", asResponse(second));

      simulateDisconnect(first);

      expect(first._ended).toBe(true);
      expect(transport.isConnected("s1")).toBe(true);
      expect(transport.connectionCount).toBe(1);
      expect(disconnected).toEqual([]);
    });

    it("should refuse streams over the limit", () => {
      const limited = new SSETransport({ maxConnections: 1, heartbeatInterval: 0 });
      limited.connect("s1", asResponse(createMockResponse()));
      const res = createMockResponse();

      expect(limited.connect("s2", asResponse(res))).toBe(false);

      expect(res._statusCode).toBe(503);
      expect(res._jsonBody).toEqual({
        error: { code: "TRANSPORT_CONNECTION", message: "Too many event streams" },
      });
      expect(limited.getConnectedSessions()).toEqual(["s1"]);
      limited.dispose();
    });
  });

  // ===========================================================================
  // send / disconnect
  // ===========================================================================

  describe("send", () => {
    it("should write a server message as one frame", () => {
      const res = createMockResponse();
      transport.connect("s1", asResponse(res));

      expect(transport.send("s1", patch)).toBe(true);

      expect(res._written.at(-1)).toBe(`data: ${JSON.stringify(patch)}\n\n`);
    });

    it("should report sessions without a stream", () => {
      expect(transport.send("nobody", patch)).toBe(false);
    });
  });

  describe("disconnect", () => {
    it("should forget the stream and stop heartbeats when the client goes away", () => {
      const res = createMockResponse();
      transport.connect("s1", asResponse(res));

      simulateDisconnect(res);
      const written = res._written.length;
      vi.advanceTimersByTime(5000);

      expect(transport.isConnected("s1")).toBe(false);
      expect(disconnected).toEqual(["s1"]);
      expect(res._written).toHaveLength(written);
    });

    it("should end a stream from the server side", () => {
      const res = createMockResponse();
      transport.connect("s1", asResponse(res));

      expect(transport.close("s1")).toBe(true);
      expect(transport.close("s1")).toBe(false);

      expect(parseSSEData(res._written).at(-1)).toEqual({ type: "expired", session: "s1" });
      expect(res._ended).toBe(true);
      expect(disconnected).toEqual([]);
    });

    it("should close every stream on shutdown without reporting disconnects", () => {
      const a = createMockResponse();
      const b = createMockResponse();
      transport.connect("a", asResponse(a));
      transport.connect("b", asResponse(b));

      transport.closeAll();

      expect(parseSSEData(a._written).at(-1)).toEqual({ type: "server_shutdown" });
      expect(a._ended && b._ended).toBe(true);
      expect(transport.connectionCount).toBe(0);
      expect(disconnected).toEqual([]);
    });
  });

  // ===========================================================================
  // App binding
  // ===========================================================================

  describe("bind", () => {
    const Counter = defineState("counter", { count: 0 });
    let app: YoGuidoApp;

    beforeEach(() => {
      let ids = 0;
      app = createApp({
        registry: new Registry().page("/", (ui: UI) => {
          ui.text(`Count: ${ui.useState(Counter).get("count")}`);
        }),
        config: { logLevel: "silent", sessionTtlMs: 1000, sweepIntervalMs: 500 },
        generateSessionId: () => `s${++ids}`,
      });
      transport.bind(app);
    });

    afterEach(() => {
      app.close();
    });

    it("should stream pushed renders to their session", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));

      app.store.get(sessionId)?.getState(Counter)?.set("count", 7);
      await app.refresh(sessionId);

      expect(parseSSEData(res._written).at(-1)).toEqual({
        type: "patch",
        version: 2,
        ops: [{ op: "updateText", id: "root/text0", text: "Count: 7" }],
      });
    });

    it("should destroy the session when its stream closes", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));

      simulateDisconnect(res);

      expect(app.hasSession(sessionId)).toBe(false);
      expect(disconnected).toEqual([sessionId]);
    });

    it("should close the stream of a session swept for idleness", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));
      app.start();

      vi.advanceTimersByTime(1500);

      expect(app.hasSession(sessionId)).toBe(false);
      expect(parseSSEData(res._written).at(-1)).toEqual({ type: "expired", session: sessionId });
      expect(res._ended).toBe(true);
      expect(transport.isConnected(sessionId)).toBe(false);
      expect(disconnected).toEqual([]);

      const written = res._written.length;
      vi.advanceTimersByTime(5000);
      expect(res._written).toHaveLength(written);
    });

    it("should close the stream of a session that left", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));

      app.leave(sessionId);

      expect(parseSSEData(res._written).at(-1)).toEqual({ type: "expired", session: sessionId });
      expect(res._ended).toBe(true);
      expect(transport.connectionCount).toBe(0);
    });

    it("should announce a shutdown to open streams", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));

      app.close();

      expect(parseSSEData(res._written).at(-1)).toEqual({ type: "server_shutdown" });
      expect(res._ended).toBe(true);
    });

    it("should stop forwarding after dispose", async () => {
      const { sessionId } = await app.openSession("/");
      const res = createMockResponse();
      transport.connect(sessionId, asResponse(res));

      transport.dispose();
      app.store.get(sessionId)?.getState(Counter)?.set("count", 1);
      await app.refresh(sessionId);

      expect(parseSSEData(res._written).at(-1)).toEqual({ type: "server_shutdown" });
      expect(app.hasSession(sessionId)).toBe(true);
    });
  });
});

// =============================================================================
// Factory
// =============================================================================

describe("createSSETransport", () => {
  it("should create independent transports", () => {
    expect(createSSETransport()).not.toBe(createSSETransport());
  });
});
