import { TERMINAL_RUN_STATUSES, generateId, nowISO } from "@tripwright/shared";
import type { NewRunRecord, RunOutcome, RunProgress, RunRecord, RunRecordStatus } from "@tripwright/shared";
import { PersistenceError } from "../errors.js";
import type { RunRecordQuery, RunRecordStore } from "./run-record-store.js";

const DEFAULT_MAX_RUNS = 2_000;
const DEFAULT_LIST_LIMIT = 50;

export type InMemoryRunRecordStoreOptions = {
  maxRuns?: number;
};

function toEpochMs(value: string | undefined): number {
  if (!value) return 0;
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Process-local store. Records are copied in and out so callers never share references. */
export class InMemoryRunRecordStore implements RunRecordStore {
  private runs = new Map<string, RunRecord>();
  private readonly maxRuns: number;

  constructor(opts?: InMemoryRunRecordStoreOptions) {
    this.maxRuns = Math.max(1, opts?.maxRuns ?? DEFAULT_MAX_RUNS);
  }

  async createRunRecord(initial: NewRunRecord): Promise<string> {
    const now = nowISO();
    const record: RunRecord = {
      id: generateId(),
      userId: initial.userId,
      sessionId: initial.sessionId,
      query: initial.query,
      status: "pending",
      createdAt: now,
      updatedAt: now,
      timeline: [],
      toolLog: [],
      citations: [],
    };
    this.runs.set(record.id, record);
    this.compact();
    return record.id;
  }

  async updateRunRecord(id: string, status: RunRecordStatus, partial: Partial<RunProgress>): Promise<void> {
    const record = this.requireOpen("updateRunRecord", id);
    if (TERMINAL_RUN_STATUSES.has(status)) {
      throw new PersistenceError("updateRunRecord", new Error(`use completeRunRecord to mark run ${id} ${status}`));
    }
    record.status = status;
    record.updatedAt = nowISO();
    applyProgress(record, partial);
  }

  async completeRunRecord(id: string, final: RunOutcome): Promise<void> {
    const record = this.requireOpen("completeRunRecord", id);
    const now = nowISO();
    record.status = final.status;
    record.updatedAt = now;
    record.endedAt = now;
    applyProgress(record, final);
    if (final.status === "completed") {
      record.finalResponse = structuredClone(final.finalResponse);
    } else {
      record.error = { ...final.error };
    }
    this.compact();
  }

  async getRunRecord(id: string): Promise<RunRecord | undefined> {
    const record = this.runs.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async listRunRecords(query: RunRecordQuery = {}): Promise<RunRecord[]> {
    const all = Array.from(this.runs.values())
      .filter((r) => !query.userId || r.userId === query.userId)
      .sort((a, b) => toEpochMs(b.createdAt) - toEpochMs(a.createdAt));
    return structuredClone(all.slice(0, query.limit ?? DEFAULT_LIST_LIMIT));
  }

  count(): number {
    return this.runs.size;
  }

  private requireOpen(operation: string, id: string): RunRecord {
    const record = this.runs.get(id);
    if (!record) {
      throw new PersistenceError(operation, new Error(`run ${id} not found`));
    }
    if (TERMINAL_RUN_STATUSES.has(record.status)) {
      throw new PersistenceError(operation, new Error(`run ${id} is already ${record.status}`));
    }
    return record;
  }

  /** Drops the oldest terminal records first; active runs go only when nothing else is left. */
  private compact(): void {
    if (this.runs.size <= this.maxRuns) return;

    const byOldest = (a: RunRecord, b: RunRecord) =>
      toEpochMs(a.updatedAt || a.createdAt) - toEpochMs(b.updatedAt || b.createdAt);
    const terminal: RunRecord[] = [];
    const active: RunRecord[] = [];
    for (const run of this.runs.values()) {
      if (TERMINAL_RUN_STATUSES.has(run.status)) terminal.push(run);
      else active.push(run);
    }

    const victims = [...terminal.sort(byOldest), ...active.sort(byOldest)];
    let excess = this.runs.size - this.maxRuns;
    for (const run of victims) {
      if (excess <= 0) break;
      this.runs.delete(run.id);
      excess--;
    }
  }
}

function applyProgress(record: RunRecord, partial: Partial<RunProgress>): void {
  if (partial.timeline) record.timeline = structuredClone(partial.timeline);
  if (partial.toolLog) record.toolLog = structuredClone(partial.toolLog);
  if (partial.citations) record.citations = structuredClone(partial.citations);
  if (partial.usage) record.usage = { ...partial.usage };
}
