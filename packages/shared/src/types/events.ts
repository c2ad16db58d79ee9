import type { ErrorInfo, FinalResult, GraphNode, NodeEvent, NodeStatus } from "./runs.js";

export const STREAM_EVENT_TYPES = [
  "node-started",
  "node-finished",
  "tool-call-started",
  "tool-call-finished",
  "message-delta",
  "final-result",
  "error",
] as const;

export type StreamEventType = (typeof STREAM_EVENT_TYPES)[number];

export type GraphEvent =
  | { type: "node-started"; node: GraphNode; iteration: number }
  | { type: "node-finished"; node: GraphNode; iteration: number; status: NodeStatus; durationMs: number; error?: string }
  | { type: "tool-call-started"; callId: string; name: string; arguments: unknown; iteration: number }
  | {
      type: "tool-call-finished";
      callId: string;
      name: string;
      success: boolean;
      result?: unknown;
      error?: string;
      durationMs: number;
      iteration: number;
    }
  | { type: "message-delta"; text: string; iteration: number };

/** `persistenceError` is set when the outcome was reached but could not be stored. */
export type TerminalEvent =
  | { type: "final-result"; result: FinalResult; persistenceError?: ErrorInfo }
  | { type: "error"; error: ErrorInfo; timeline: NodeEvent[]; persistenceError?: ErrorInfo };

export type EventEnvelope = {
  /** Empty when the run was refused before a record existed. */
  runId: string;
  seq: number;
  at: string;
};

export type StreamEvent = EventEnvelope & (GraphEvent | TerminalEvent);
