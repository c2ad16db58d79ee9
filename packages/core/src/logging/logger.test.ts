import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, createLogger, formatJson, formatPretty, silentLogger } from "./logger.js";
import type { LogEntry } from "./logger.js";

describe("Logger", () => {
  it("logs at or above configured level", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("test", "info", (e) => entries.push(e));

    logger.debug("skip");
    logger.info("keep");
    logger.warn("keep");
    logger.error("keep");

    expect(entries.map((e) => e.level)).toEqual(["info", "warn", "error"]);
  });

  it("suppresses all logs at silent level", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("test", "silent", (e) => entries.push(e));

    logger.info("x");
    logger.error("x");

    expect(entries).toHaveLength(0);
  });

  it("includes subsystem and data in entries", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("orchestrator", "debug", (e) => entries.push(e));
    logger.info("run started", { runId: "r1" });
    expect(entries[0]!.subsystem).toBe("orchestrator");
    expect(entries[0]!.data).toEqual({ runId: "r1" });
  });

  it("creates child logger with prefixed subsystem", () => {
    const entries: LogEntry[] = [];
    const parent = new Logger("orchestrator", "debug", (e) => entries.push(e));
    parent.child("graph").info("node");
    expect(entries[0]!.subsystem).toBe("orchestrator:graph");
  });

  it("changes log level dynamically", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("test", "error", (e) => entries.push(e));
    logger.info("skip");
    logger.setLevel("debug");
    logger.info("now visible");
    expect(entries).toHaveLength(1);
  });

  it("reports whether a level is enabled", () => {
    const logger = new Logger("test", "warn", () => {});
    expect(logger.isEnabled("info")).toBe(false);
    expect(logger.isEnabled("error")).toBe(true);
    expect(logger.isEnabled("silent")).toBe(false);
  });
});

describe("formatters", () => {
  const entry: LogEntry = {
    level: "warn",
    subsystem: "core",
    message: "slow tool",
    data: { tool: "get_weather" },
    ts: "2026-01-01T00:00:00.000Z",
  };

  it("renders pretty lines", () => {
    expect(formatPretty(entry)).toBe(
      '[2026-01-01T00:00:00.000Z] [WARN] [core] slow tool {"tool":"get_weather"}',
    );
  });

  it("renders json lines with data flattened", () => {
    expect(JSON.parse(formatJson(entry))).toEqual({
      ts: "2026-01-01T00:00:00.000Z",
      level: "warn",
      subsystem: "core",
      msg: "slow tool",
      tool: "get_weather",
    });
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the json format when requested", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("core", { level: "info", format: "json" }).info("hello");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0]![0])).msg).toBe("hello");
  });

  it("honours a custom output", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("test", { level: "warn", output: (e) => entries.push(e) });
    logger.info("skip");
    logger.warn("keep");
    expect(entries).toHaveLength(1);
  });

  it("silentLogger drops everything", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger().error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });
});
