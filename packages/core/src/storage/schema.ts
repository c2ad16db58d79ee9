import { pgTable, uuid, varchar, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type {
  Citation,
  ErrorInfo,
  Itinerary,
  NodeEvent,
  RunRecordStatus,
  TokenUsage,
  ToolInvocation,
} from "@tripwright/shared";

export const agentRuns = pgTable("agent_runs", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: varchar("user_id", { length: 128 }).notNull(),
  sessionId: varchar("session_id", { length: 128 }).notNull(),
  query: text("query").notNull(),
  status: varchar("status", { length: 16 }).$type<RunRecordStatus>().notNull().default("pending"),
  finalResponse: jsonb("final_response").$type<{ answer: string; itinerary: Itinerary | null }>(),
  timeline: jsonb("timeline").$type<NodeEvent[]>().notNull().default([]),
  toolLog: jsonb("tool_log").$type<ToolInvocation[]>().notNull().default([]),
  citations: jsonb("citations").$type<Citation[]>().notNull().default([]),
  error: jsonb("error").$type<ErrorInfo>(),
  usage: jsonb("usage").$type<TokenUsage>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  endedAt: timestamp("ended_at", { withTimezone: true }),
}, (table) => [
  index("agent_runs_user_id_idx").on(table.userId),
  index("agent_runs_status_idx").on(table.status),
]);

export type AgentRunRow = typeof agentRuns.$inferSelect;
