import type { ConversationEntry, TokenUsage } from "./conversation.js";

export const RUN_RECORD_STATUSES = ["pending", "running", "completed", "failed"] as const;

export type RunRecordStatus = (typeof RUN_RECORD_STATUSES)[number];

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunRecordStatus> = new Set(["completed", "failed"]);

export const GRAPH_NODES = ["reasoning", "tool_dispatch"] as const;

export type GraphNode = (typeof GRAPH_NODES)[number];

export type NodeStatus = "success" | "error";

export type NodeEvent = {
  node: GraphNode;
  iteration: number;
  status: NodeStatus;
  startedAt: number;
  endedAt: number;
  durationMs: number;
  error?: string;
};

export type ToolInvocation = {
  id: string;
  name: string;
  arguments: unknown;
  result?: unknown;
  success: boolean;
  error?: string;
  startedAt: number;
  endedAt: number;
  durationMs: number;
  iteration: number;
};

export type Citation = {
  source: string;
  snippet: string;
  title?: string;
  toolInvocationId?: string;
};

export type ErrorInfo = {
  kind: string;
  message: string;
};

export type ItineraryItem = {
  title: string;
  start?: string;
  end?: string;
  location?: string;
  notes?: string;
  costUsd?: number;
};

export type ItineraryDay = {
  day: number;
  date?: string;
  items: ItineraryItem[];
};

export type Itinerary = {
  destination: string;
  durationDays: number;
  totalCostUsd?: number;
  days: ItineraryDay[];
  recommendations: string[];
};

export type FinalResult = {
  runId: string;
  sessionId: string;
  answer: string;
  itinerary: Itinerary | null;
  citations: Citation[];
  toolInvocations: ToolInvocation[];
  timeline: NodeEvent[];
  messages: ConversationEntry[];
  iterations: number;
  usage?: TokenUsage;
  createdAt: string;
  completedAt: string;
};

export type FailedRunResult = {
  status: "failed";
  runId: string;
  sessionId: string;
  error: ErrorInfo;
  timeline: NodeEvent[];
  toolInvocations: ToolInvocation[];
  createdAt: string;
  failedAt: string;
};

export type RunResult = ({ status: "completed" } & FinalResult) | FailedRunResult;

/** Persistence-facing projection of a run. */
export type RunRecord = {
  id: string;
  userId: string;
  sessionId: string;
  query: string;
  status: RunRecordStatus;
  createdAt: string;
  updatedAt: string;
  endedAt?: string;
  finalResponse?: { answer: string; itinerary: Itinerary | null };
  timeline: NodeEvent[];
  toolLog: ToolInvocation[];
  citations: Citation[];
  error?: ErrorInfo;
  usage?: TokenUsage;
};

export type NewRunRecord = {
  userId: string;
  sessionId: string;
  query: string;
};

export type RunProgress = {
  timeline: NodeEvent[];
  toolLog: ToolInvocation[];
  citations: Citation[];
  usage?: TokenUsage;
};

export type RunOutcome = RunProgress &
  (
    | { status: "completed"; finalResponse: { answer: string; itinerary: Itinerary | null } }
    | { status: "failed"; error: ErrorInfo }
  );
