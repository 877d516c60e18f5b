import { context, trace } from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createLogger } from "../factory.js";
import { Logger } from "../logger.js";
import { ConsoleTransport } from "../transports/console.js";
import { JsonTransport } from "../transports/json.js";
import { MemoryTransport } from "../transports/memory.js";

describe("Logger", () => {
  describe("level filtering", () => {
    it("drops entries below the configured level", () => {
      const transport = new MemoryTransport();
      const logger = new Logger({ level: "warn", transports: [transport] });

      logger.debug("hidden");
      logger.info("hidden");
      logger.warn("shown");
      logger.fatal("shown too");

      expect(transport.messages()).toEqual(["shown", "shown too"]);
    });

    it("applies level changes immediately", () => {
      const transport = new MemoryTransport();
      const logger = new Logger({ level: "info", transports: [transport] });

      logger.setLevel("trace");
      logger.trace("now visible", { n: 1 });

      expect(logger.getLevel()).toBe("trace");
      expect(transport.entries[0]?.level).toBe("trace");
      expect(transport.entries[0]?.data).toEqual({ n: 1 });
    });

    it("reports levels as disabled without transports", () => {
      const logger = new Logger({ level: "trace" });

      expect(logger.isLevelEnabled("error")).toBe(false);
      expect(Logger.silent().isLevelEnabled("fatal")).toBe(false);
    });
  });

  describe("child", () => {
    it("merges context and shares transports", () => {
      const transport = new MemoryTransport();
      const parent = new Logger({ context: { logger: "tessera" }, transports: [transport] });
      const child = parent.child({ provider: "ollama" });

      child.info("from child");
      const late = new MemoryTransport();
      parent.addTransport(late);
      child.info("after add");

      expect(transport.entries[0]?.context).toEqual({ logger: "tessera", provider: "ollama" });
      expect(late.messages()).toEqual(["after add"]);
    });

    it("leaves context undefined when empty", () => {
      const transport = new MemoryTransport();
      new Logger({ transports: [transport] }).info("bare");

      expect(transport.entries[0]?.context).toBeUndefined();
    });
  });

  describe("time", () => {
    it("logs the duration at debug level on end", () => {
      const transport = new MemoryTransport();
      const logger = new Logger({ level: "debug", transports: [transport] });

      const timer = logger.time("embed");
      timer.end(undefined, { count: 2 });

      const entry = transport.entries[0];
      expect(entry?.message).toBe("embed completed");
      expect(entry?.data).toEqual({ count: 2, label: "embed", durationMs: timer.duration });
      expect(timer.duration).toBeGreaterThanOrEqual(0);
    });

    it("stops without logging", () => {
      const transport = new MemoryTransport();
      const logger = new Logger({ level: "debug", transports: [transport] });

      const elapsed = logger.time("quiet").stop();

      expect(elapsed).toBeGreaterThanOrEqual(0);
      expect(transport.entries).toHaveLength(0);
    });
  });

  describe("flush and dispose", () => {
    it("reaches transports that support them", async () => {
      const flush = vi.fn(async () => {});
      const dispose = vi.fn();
      const logger = new Logger({ transports: [{ log: vi.fn(), flush, dispose }, new MemoryTransport()] });

      await logger.flush();
      logger.dispose();

      expect(flush).toHaveBeenCalledTimes(1);
      expect(dispose).toHaveBeenCalledTimes(1);
    });
  });

  describe("trace context", () => {
    let provider: NodeTracerProvider;

    beforeAll(() => {
      provider = new NodeTracerProvider();
      provider.register();
    });

    afterAll(async () => {
      await provider.shutdown();
      trace.disable();
      context.disable();
    });

    it("attaches trace and span ids inside an active span", () => {
      const transport = new MemoryTransport();
      const logger = new Logger({ transports: [transport] });

      trace.getTracer("test").startActiveSpan("span", (span) => {
        logger.info("inside");
        span.end();
      });

      expect(transport.entries[0]?.traceId).toHaveLength(32);
      expect(transport.entries[0]?.spanId).toHaveLength(16);
    });

    it("omits ids outside a span", () => {
      const transport = new MemoryTransport();
      new Logger({ transports: [transport] }).info("outside");

      expect(transport.entries[0]?.traceId).toBeUndefined();
      expect(transport.entries[0]?.spanId).toBeUndefined();
    });
  });
});

describe("ConsoleTransport", () => {
  const timestamp = new Date(Date.UTC(2025, 0, 2, 3, 4, 5));

  it("writes plain lines without colors", () => {
    const stdout = vi.fn();
    const transport = new ConsoleTransport({ colors: false, stdout, stderr: vi.fn() });

    transport.log({
      level: "info",
      message: "hello",
      timestamp,
      context: { logger: "tessera" },
      data: { a: 1 },
    });

    expect(stdout).toHaveBeenCalledWith('[2025-01-02 03:04:05] [INFO ] (tessera) hello {"a":1}');
  });

  it("colors the level tag", () => {
    const stdout = vi.fn();
    const transport = new ConsoleTransport({ colors: true, stdout });

    transport.log({ level: "debug", message: "m", timestamp, data: "raw" });

    expect(stdout).toHaveBeenCalledWith("[2025-01-02 03:04:05] \x1b[36m[DEBUG]\x1b[0m m raw");
  });

  it("sends warn and above to stderr", () => {
    const stdout = vi.fn();
    const stderr = vi.fn();
    const transport = new ConsoleTransport({ colors: false, stdout, stderr });

    transport.log({ level: "warn", message: "w", timestamp });
    transport.log({ level: "fatal", message: "f", timestamp });

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenNthCalledWith(1, "[2025-01-02 03:04:05] [WARN ] w");
    expect(stderr).toHaveBeenNthCalledWith(2, "[2025-01-02 03:04:05] [FATAL] f");
  });
});

describe("JsonTransport", () => {
  it("emits one JSON object per entry", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({
      level: "error",
      message: "failed",
      timestamp: new Date(Date.UTC(2025, 0, 2, 3, 4, 5)),
      context: { logger: "tessera" },
      data: { code: 2002 },
    });

    expect(lines).toEqual([
      '{"time":"2025-01-02T03:04:05.000Z","level":"error","context":{"logger":"tessera"},"message":"failed","data":{"code":2002}}',
    ]);
  });
});

describe("createLogger", () => {
  it("binds the logger name and writes JSON when asked", () => {
    const lines: string[] = [];
    const logger = createLogger({ name: "ingest", level: "debug", json: true, output: (line) => lines.push(line) });

    logger.debug("loaded");

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? "");
    expect(record).toMatchObject({ level: "debug", context: { logger: "ingest" }, message: "loaded" });
  });

  it("defaults to info", () => {
    expect(createLogger({ colors: false }).getLevel()).toBe("info");
  });
});
