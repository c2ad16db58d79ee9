import { describe, it, expect } from "vitest";
import { envBool, envInt, envOneOf, envString } from "./env.js";

describe("envString", () => {
  it("trims the value", () => {
    expect(envString("TRIPWRIGHT_DAEMON_HOST", "", { TRIPWRIGHT_DAEMON_HOST: "  127.0.0.1 " })).toBe("127.0.0.1");
  });

  it("falls back when missing or blank", () => {
    expect(envString("TRIPWRIGHT_DAEMON_HOST", "localhost", {})).toBe("localhost");
    expect(envString("TRIPWRIGHT_DAEMON_HOST", "localhost", { TRIPWRIGHT_DAEMON_HOST: "   " })).toBe("localhost");
  });
});

describe("envInt", () => {
  it("parses an integer", () => {
    expect(envInt("TRIPWRIGHT_MAX_ITERATIONS", 10, { TRIPWRIGHT_MAX_ITERATIONS: " 4 " })).toBe(4);
  });

  it("falls back on garbage or a value below the minimum", () => {
    expect(envInt("TRIPWRIGHT_MAX_ITERATIONS", 10, { TRIPWRIGHT_MAX_ITERATIONS: "many" })).toBe(10);
    expect(envInt("TRIPWRIGHT_MAX_ITERATIONS", 10, { TRIPWRIGHT_MAX_ITERATIONS: "0" }, 1)).toBe(10);
    expect(envInt("TRIPWRIGHT_MAX_ITERATIONS", 10, {})).toBe(10);
  });
});

describe("envBool", () => {
  it.each(["1", "true", "YES"])("reads %s as true", (raw) => {
    expect(envBool("FLAG", false, { FLAG: raw })).toBe(true);
  });

  it("reads anything else as false", () => {
    expect(envBool("FLAG", true, { FLAG: "off" })).toBe(false);
  });

  it("falls back when unset", () => {
    expect(envBool("FLAG", true, {})).toBe(true);
  });
});

describe("envOneOf", () => {
  const LEVELS = ["debug", "info", "warn"] as const;

  it("matches case-insensitively", () => {
    expect(envOneOf("TRIPWRIGHT_LOG_LEVEL", LEVELS, { TRIPWRIGHT_LOG_LEVEL: "WARN" })).toBe("warn");
  });

  it("is undefined for an unknown or missing value", () => {
    expect(envOneOf("TRIPWRIGHT_LOG_LEVEL", LEVELS, { TRIPWRIGHT_LOG_LEVEL: "loud" })).toBeUndefined();
    expect(envOneOf("TRIPWRIGHT_LOG_LEVEL", LEVELS, {})).toBeUndefined();
  });
});
