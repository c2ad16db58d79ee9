import { describe, it, expect, vi, afterEach } from "vitest";
import { nowISO } from "./time.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("nowISO", () => {
  it("formats the current instant in UTC", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-05-01T09:30:00.000Z"));
    expect(nowISO()).toBe("2026-05-01T09:30:00.000Z");
  });
});
