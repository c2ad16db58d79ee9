import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryRunRecordStore } from "./memory-store.js";
import { PersistenceError } from "../errors.js";
import type { NodeEvent } from "@tripwright/shared";

const NEW_RUN = { userId: "u1", sessionId: "s1", query: "Plan a 3-day trip to Lisbon" };

const EVENT: NodeEvent = {
  node: "reasoning",
  iteration: 0,
  status: "success",
  startedAt: 1,
  endedAt: 5,
  durationMs: 4,
};

let store: InMemoryRunRecordStore;

beforeEach(() => {
  store = new InMemoryRunRecordStore();
});

describe("InMemoryRunRecordStore", () => {
  it("creates pending records", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    const record = await store.getRunRecord(id);

    expect(record).toMatchObject({ id, userId: "u1", sessionId: "s1", status: "pending", timeline: [] });
    expect(record?.endedAt).toBeUndefined();
  });

  it("returns undefined for unknown id", async () => {
    expect(await store.getRunRecord("nope")).toBeUndefined();
  });

  it("updates status and progress", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    await store.updateRunRecord(id, "running", { timeline: [EVENT] });

    const record = await store.getRunRecord(id);
    expect(record?.status).toBe("running");
    expect(record?.timeline).toEqual([EVENT]);
  });

  it("completes a run with its final response", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    await store.completeRunRecord(id, {
      status: "completed",
      finalResponse: { answer: "Day 1: Alfama", itinerary: null },
      timeline: [EVENT],
      toolLog: [],
      citations: [],
    });

    const record = await store.getRunRecord(id);
    expect(record?.status).toBe("completed");
    expect(record?.finalResponse).toEqual({ answer: "Day 1: Alfama", itinerary: null });
    expect(record?.endedAt).toBeTruthy();
  });

  it("records failures with their error", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    await store.completeRunRecord(id, {
      status: "failed",
      error: { kind: "max_iterations", message: "too many" },
      timeline: [],
      toolLog: [],
      citations: [],
    });

    expect((await store.getRunRecord(id))?.error).toEqual({ kind: "max_iterations", message: "too many" });
  });

  it("refuses to change terminal records", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    await store.completeRunRecord(id, {
      status: "failed",
      error: { kind: "cancelled", message: "Run cancelled" },
      timeline: [],
      toolLog: [],
      citations: [],
    });

    await expect(store.updateRunRecord(id, "running", {})).rejects.toBeInstanceOf(PersistenceError);
    await expect(
      store.completeRunRecord(id, {
        status: "completed",
        finalResponse: { answer: "late", itinerary: null },
        timeline: [],
        toolLog: [],
        citations: [],
      }),
    ).rejects.toThrow(`Persistence failed during completeRunRecord: run ${id} is already failed`);
  });

  it("rejects terminal statuses through updateRunRecord", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    await expect(store.updateRunRecord(id, "completed", {})).rejects.toBeInstanceOf(PersistenceError);
  });

  it("rejects updates to unknown runs", async () => {
    await expect(store.updateRunRecord("missing", "running", {})).rejects.toThrow(
      "Persistence failed during updateRunRecord: run missing not found",
    );
  });

  it("hands out copies", async () => {
    const id = await store.createRunRecord(NEW_RUN);
    const record = await store.getRunRecord(id);
    record!.timeline.push(EVENT);

    expect((await store.getRunRecord(id))?.timeline).toEqual([]);
  });

  it("lists records filtered by user", async () => {
    await store.createRunRecord(NEW_RUN);
    await store.createRunRecord({ ...NEW_RUN, userId: "u2" });

    expect(await store.listRunRecords()).toHaveLength(2);
    expect((await store.listRunRecords({ userId: "u2" })).map((r) => r.userId)).toEqual(["u2"]);
    expect(await store.listRunRecords({ limit: 1 })).toHaveLength(1);
  });

  it("evicts terminal records before active ones", async () => {
    const bounded = new InMemoryRunRecordStore({ maxRuns: 2 });
    const done = await bounded.createRunRecord(NEW_RUN);
    await bounded.completeRunRecord(done, {
      status: "completed",
      finalResponse: { answer: "ok", itinerary: null },
      timeline: [],
      toolLog: [],
      citations: [],
    });
    const active = await bounded.createRunRecord(NEW_RUN);
    const newest = await bounded.createRunRecord(NEW_RUN);

    expect(bounded.count()).toBe(2);
    expect(await bounded.getRunRecord(done)).toBeUndefined();
    expect(await bounded.getRunRecord(active)).toBeDefined();
    expect(await bounded.getRunRecord(newest)).toBeDefined();
  });
});
