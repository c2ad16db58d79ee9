import type { NewRunRecord, RunOutcome, RunProgress, RunRecord, RunRecordStatus } from "@tripwright/shared";

export type RunRecordQuery = {
  userId?: string;
  limit?: number;
};

/**
 * Where run records live. Implementations wrap their own failures in PersistenceError and
 * refuse to change a record once it is terminal.
 */
export interface RunRecordStore {
  /** Stores a `pending` record and returns its id. */
  createRunRecord(initial: NewRunRecord): Promise<string>;
  updateRunRecord(id: string, status: RunRecordStatus, partial: Partial<RunProgress>): Promise<void>;
  completeRunRecord(id: string, final: RunOutcome): Promise<void>;
  getRunRecord(id: string): Promise<RunRecord | undefined>;
  listRunRecords(query?: RunRecordQuery): Promise<RunRecord[]>;
}
