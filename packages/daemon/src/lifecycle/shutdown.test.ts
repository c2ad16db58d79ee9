import { describe, it, expect } from "vitest";
import { Logger } from "@tripwright/core";
import type { LogEntry } from "@tripwright/core";
import { GracefulShutdown } from "./shutdown.js";

describe("GracefulShutdown", () => {
  it("starts not shutting down", () => {
    const gs = new GracefulShutdown();
    expect(gs.isShuttingDown()).toBe(false);
  });

  it("registers and executes handlers in order", async () => {
    const gs = new GracefulShutdown();
    const calls: string[] = [];
    gs.register("a", () => {
      calls.push("a");
    });
    gs.register("b", () => {
      calls.push("b");
    });

    expect(await gs.executeHandlers()).toEqual([]);
    expect(calls).toEqual(["a", "b"]);
  });

  it("awaits async handlers", async () => {
    const gs = new GracefulShutdown();
    const calls: string[] = [];
    gs.register("slow", async () => {
      await new Promise((r) => setTimeout(r, 10));
      calls.push("async");
    });

    await gs.executeHandlers();
    expect(calls).toEqual(["async"]);
  });

  it("continues past a failing handler and reports it", async () => {
    const entries: LogEntry[] = [];
    const gs = new GracefulShutdown({ logger: new Logger("daemon", "debug", (e) => entries.push(e)) });
    const calls: string[] = [];
    gs.register("database", () => {
      throw new Error("already closed");
    });
    gs.register("server", () => {
      calls.push("ok");
    });

    expect(await gs.executeHandlers()).toEqual(["database"]);
    expect(calls).toEqual(["ok"]);
    expect(entries.find((e) => e.level === "warn")?.data).toEqual({ handler: "database", error: "already closed" });
  });

  it("runs the handlers only once", async () => {
    const gs = new GracefulShutdown();
    let count = 0;
    gs.register("count", () => {
      count++;
    });

    await gs.shutdown("SIGTERM");
    await gs.shutdown("SIGINT");

    expect(count).toBe(1);
    expect(gs.isShuttingDown()).toBe(true);
  });
});
