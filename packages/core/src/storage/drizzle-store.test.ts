import { describe, it, expect } from "vitest";
import { toRunRecord } from "./drizzle-store.js";
import type { AgentRunRow } from "./schema.js";

function createRow(overrides: Partial<AgentRunRow> = {}): AgentRunRow {
  return {
    id: "6f1c1a8e-0000-4000-8000-000000000001",
    userId: "u1",
    sessionId: "s1",
    query: "Plan a 3-day trip to Lisbon",
    status: "running",
    finalResponse: null,
    timeline: [],
    toolLog: [],
    citations: [],
    error: null,
    usage: null,
    createdAt: new Date("2026-03-01T10:00:00.000Z"),
    updatedAt: new Date("2026-03-01T10:00:05.000Z"),
    endedAt: null,
    ...overrides,
  };
}

describe("toRunRecord", () => {
  it("maps an in-flight row", () => {
    expect(toRunRecord(createRow())).toEqual({
      id: "6f1c1a8e-0000-4000-8000-000000000001",
      userId: "u1",
      sessionId: "s1",
      query: "Plan a 3-day trip to Lisbon",
      status: "running",
      createdAt: "2026-03-01T10:00:00.000Z",
      updatedAt: "2026-03-01T10:00:05.000Z",
      timeline: [],
      toolLog: [],
      citations: [],
    });
  });

  it("maps terminal columns", () => {
    const record = toRunRecord(
      createRow({
        status: "failed",
        error: { kind: "reasoning_unavailable", message: "down" },
        usage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 },
        endedAt: new Date("2026-03-01T10:01:00.000Z"),
      }),
    );

    expect(record.endedAt).toBe("2026-03-01T10:01:00.000Z");
    expect(record.error).toEqual({ kind: "reasoning_unavailable", message: "down" });
    expect(record.usage).toEqual({ inputTokens: 1, outputTokens: 2, totalTokens: 3 });
    expect(record.finalResponse).toBeUndefined();
  });
});
