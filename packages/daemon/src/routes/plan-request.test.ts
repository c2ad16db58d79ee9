import { describe, it, expect } from "vitest";
import { composeQuery, parsePlanRequest } from "./plan-request.js";

describe("composeQuery", () => {
  it("writes the minimal trip", () => {
    expect(composeQuery({ destination: "Lisbon", duration: 3 })).toBe("Plan a 3-day trip to Lisbon");
  });

  it("adds group size, budget and preferences", () => {
    expect(
      composeQuery({ destination: "Kyoto", duration: 5, groupSize: 2, budget: 3000, preferences: ["temples", "food"] }),
    ).toBe("Plan a 5-day trip to Kyoto for 2 people with a budget of $3000. Preferences: temples, food");
  });

  it("leaves out a party of one", () => {
    expect(composeQuery({ destination: "Porto", duration: 1, groupSize: 1 })).toBe("Plan a 1-day trip to Porto");
  });
});

describe("parsePlanRequest", () => {
  it("accepts a free-form query with session and context", () => {
    expect(
      parsePlanRequest({ query: "  Weekend in Rome  ", sessionId: "s-1", context: { budget: 800 } }, "traveller-1"),
    ).toEqual({
      ok: true,
      request: { query: "Weekend in Rome", userId: "traveller-1", sessionId: "s-1", context: { budget: 800 } },
    });
  });

  it("turns the structured form into a query and keeps the trip as context", () => {
    expect(parsePlanRequest({ destination: "Lisbon", duration: 3, budget: 1500 }, "traveller-1")).toEqual({
      ok: true,
      request: {
        query: "Plan a 3-day trip to Lisbon with a budget of $1500",
        userId: "traveller-1",
        sessionId: undefined,
        context: { destination: "Lisbon", duration: 3, budget: 1500 },
      },
    });
  });

  it("reports an empty query", () => {
    expect(parsePlanRequest({ query: "" }, "u")).toEqual({ ok: false, issues: ["query: query must not be empty"] });
  });

  it("reports every bad trip field", () => {
    const parsed = parsePlanRequest({ destination: "Lisbon", duration: 0, groupSize: 100 }, "u");
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.issues).toHaveLength(2);
    expect(parsed.issues[0]?.startsWith("duration: ")).toBe(true);
    expect(parsed.issues[1]?.startsWith("groupSize: ")).toBe(true);
  });

  it("treats a non-object body as an empty trip", () => {
    const parsed = parsePlanRequest("Lisbon", "u");
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.issues.map((i) => i.split(":")[0])).toEqual(["destination", "duration"]);
  });
});
