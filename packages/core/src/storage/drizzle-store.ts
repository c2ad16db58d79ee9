import { and, desc, eq, notInArray } from "drizzle-orm";
import type { NewRunRecord, RunOutcome, RunProgress, RunRecord, RunRecordStatus } from "@tripwright/shared";
import { PersistenceError } from "../errors.js";
import type { Database } from "./connection.js";
import { agentRuns } from "./schema.js";
import type { AgentRunRow } from "./schema.js";
import type { RunRecordQuery, RunRecordStore } from "./run-record-store.js";

const TERMINAL: RunRecordStatus[] = ["completed", "failed"];
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** PostgreSQL-backed store over the `agent_runs` table. */
export class DrizzleRunRecordStore implements RunRecordStore {
  constructor(private readonly db: Database) {}

  async createRunRecord(initial: NewRunRecord): Promise<string> {
    const rows = await this.guard("createRunRecord", () =>
      this.db
        .insert(agentRuns)
        .values({ userId: initial.userId, sessionId: initial.sessionId, query: initial.query, status: "pending" })
        .returning({ id: agentRuns.id }),
    );
    const row = rows[0];
    if (!row) throw new PersistenceError("createRunRecord", new Error("insert returned no row"));
    return row.id;
  }

  async updateRunRecord(id: string, status: RunRecordStatus, partial: Partial<RunProgress>): Promise<void> {
    if (TERMINAL.includes(status)) {
      throw new PersistenceError("updateRunRecord", new Error(`use completeRunRecord to mark run ${id} ${status}`));
    }
    const rows = await this.guard("updateRunRecord", () =>
      this.db
        .update(agentRuns)
        .set({ status, updatedAt: new Date(), ...progressColumns(partial) })
        .where(and(eq(agentRuns.id, id), notInArray(agentRuns.status, TERMINAL)))
        .returning({ id: agentRuns.id }),
    );
    if (rows.length === 0) throw new PersistenceError("updateRunRecord", new Error(`run ${id} not found or terminal`));
  }

  async completeRunRecord(id: string, final: RunOutcome): Promise<void> {
    const now = new Date();
    const outcome =
      final.status === "completed"
        ? { finalResponse: final.finalResponse, error: null }
        : { finalResponse: null, error: final.error };
    const rows = await this.guard("completeRunRecord", () =>
      this.db
        .update(agentRuns)
        .set({ status: final.status, updatedAt: now, endedAt: now, ...outcome, ...progressColumns(final) })
        .where(and(eq(agentRuns.id, id), notInArray(agentRuns.status, TERMINAL)))
        .returning({ id: agentRuns.id }),
    );
    if (rows.length === 0) throw new PersistenceError("completeRunRecord", new Error(`run ${id} not found or terminal`));
  }

  async getRunRecord(id: string): Promise<RunRecord | undefined> {
    if (!UUID.test(id)) return undefined;
    const rows = await this.guard("getRunRecord", () =>
      this.db.select().from(agentRuns).where(eq(agentRuns.id, id)).limit(1),
    );
    const row = rows[0];
    return row ? toRunRecord(row) : undefined;
  }

  async listRunRecords(query: RunRecordQuery = {}): Promise<RunRecord[]> {
    const limit = query.limit ?? 50;
    const rows = await this.guard("listRunRecords", () =>
      query.userId
        ? this.db
            .select()
            .from(agentRuns)
            .where(eq(agentRuns.userId, query.userId))
            .orderBy(desc(agentRuns.createdAt))
            .limit(limit)
        : this.db.select().from(agentRuns).orderBy(desc(agentRuns.createdAt)).limit(limit),
    );
    return rows.map(toRunRecord);
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw err instanceof PersistenceError ? err : new PersistenceError(operation, err);
    }
  }
}

function progressColumns(partial: Partial<RunProgress>) {
  return {
    ...(partial.timeline ? { timeline: partial.timeline } : {}),
    ...(partial.toolLog ? { toolLog: partial.toolLog } : {}),
    ...(partial.citations ? { citations: partial.citations } : {}),
    ...(partial.usage ? { usage: partial.usage } : {}),
  };
}

export function toRunRecord(row: AgentRunRow): RunRecord {
  const record: RunRecord = {
    id: row.id,
    userId: row.userId,
    sessionId: row.sessionId,
    query: row.query,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    timeline: row.timeline,
    toolLog: row.toolLog,
    citations: row.citations,
  };
  if (row.endedAt) record.endedAt = row.endedAt.toISOString();
  if (row.finalResponse) record.finalResponse = row.finalResponse;
  if (row.error) record.error = row.error;
  if (row.usage) record.usage = row.usage;
  return record;
}
