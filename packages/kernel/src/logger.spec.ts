import { Logger, composeContextFields, defaultContextFields, isLogLevel } from "./logger";
import { Context } from "./context";

function captureStream(): { lines: Array<Record<string, unknown>>; write(msg: string): void } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe("Logger", () => {
  beforeEach(() => {
    Logger.reset();
  });

  describe("basic logging", () => {
    it("should support all log levels", () => {
      const log = Logger.create({ level: "silent" });

      expect(() => log.trace("trace message")).not.toThrow();
      expect(() => log.debug("debug message")).not.toThrow();
      expect(() => log.info("info message")).not.toThrow();
      expect(() => log.warn({ key: "value" }, "warn message")).not.toThrow();
      expect(() => log.error("error message")).not.toThrow();
      expect(() => log.fatal("fatal message")).not.toThrow();
    });

    it("should write structured entries to a destination", () => {
      const stream = captureStream();
      const log = Logger.create({ destination: stream });

      log.info({ version: 2 }, "render committed");

      expect(stream.lines).toHaveLength(1);
      expect(stream.lines[0]).toMatchObject({ msg: "render committed", version: 2, level: 30 });
    });
  });

  describe("configuration", () => {
    it("should configure and change the level", () => {
      Logger.configure({ level: "debug", destination: captureStream() });
      expect(Logger.level).toBe("debug");

      Logger.setLevel("warn");
      expect(Logger.level).toBe("warn");
      expect(Logger.isLevelEnabled("info")).toBe(false);
      expect(Logger.isLevelEnabled("error")).toBe(true);
    });

    it("should fall back to info after reset", () => {
      Logger.configure({ level: "debug", destination: captureStream() });
      Logger.reset();
      Logger.configure({ destination: captureStream() });

      expect(Logger.level).toBe("info");
    });

    it("should keep standalone loggers independent", () => {
      Logger.configure({ level: "info", destination: captureStream() });
      const standalone = Logger.create({ level: "error", destination: captureStream() });

      expect(Logger.level).toBe("info");
      expect(standalone.isLevelEnabled("warn")).toBe(false);
    });
  });

  describe("child loggers", () => {
    it("should bind the component name", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.for("RenderSession").info("hello");
      class EventRouter {}
      Logger.for(new EventRouter()).info("hi");

      expect(stream.lines[0].component).toBe("RenderSession");
      expect(stream.lines[1].component).toBe("EventRouter");
    });

    it("should bind custom fields", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.child({ route: "/admin" }).child({ op: "diff" }).warn("slow");

      expect(stream.lines[0]).toMatchObject({ route: "/admin", op: "diff", msg: "slow" });
    });
  });

  describe("context integration", () => {
    it("should inject request, trace and session ids", async () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });
      const ctx = Context.create({ requestId: "req-1", traceId: "trace-1", sessionId: "sess-1" });

      await Context.run(ctx, async () => {
        Logger.get().info("inside");
      });

      expect(stream.lines[0]).toMatchObject({
        request_id: "req-1",
        trace_id: "trace-1",
        session_id: "sess-1",
      });
    });

    it("should omit context fields when disabled", async () => {
      const stream = captureStream();
      Logger.configure({ destination: stream, includeContext: false });

      await Context.run(Context.create({ sessionId: "sess-1" }), async () => {
        Logger.get().info("inside");
      });

      expect(stream.lines[0].session_id).toBeUndefined();
    });

    it("should use a custom extractor", async () => {
      const stream = captureStream();
      Logger.configure({
        destination: stream,
        contextFields: composeContextFields(defaultContextFields, (ctx) => ({ route: ctx.metadata.route })),
      });

      await Context.run(Context.create({ requestId: "r", metadata: { route: "/users" } }), async () => {
        Logger.get().info("inside");
      });

      expect(stream.lines[0]).toMatchObject({ request_id: "r", route: "/users" });
    });
  });

  describe("composeContextFields", () => {
    it("should let later extractors override earlier ones", () => {
      const composed = composeContextFields(
        () => ({ key: "original" }),
        () => ({ key: "overridden" }),
      );

      expect(composed(Context.create())).toEqual({ key: "overridden" });
    });
  });

  describe("isLogLevel", () => {
    it("should accept known levels only", () => {
      expect(isLogLevel("debug")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
    });
  });
});
