import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export type Database = PostgresJsDatabase<typeof schema>;

export type DatabaseHandle = {
  db: Database;
  /** Round-trips a trivial query; rejects when the server is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
};

export function createDatabase(connectionString: string, opts: { max?: number } = {}): DatabaseHandle {
  const client = postgres(connectionString, { max: opts.max ?? 10 });
  return {
    db: drizzle(client, { schema }),
    ping: async () => {
      await client`select 1`;
    },
    close: () => client.end(),
  };
}
