import type {
  Citation,
  ConversationEntry,
  GraphNode,
  MessageRole,
  NodeEvent,
  NodeStatus,
  TokenUsage,
  ToolInvocation,
  ToolRequest,
} from "@tripwright/shared";
import { nowISO } from "@tripwright/shared";
import { AlreadyFinalizedError, OrchestrationError, RunStateClosedError } from "../errors.js";

export type RunOutput = {
  answer: string;
};

export type RunStateInit = {
  runId: string;
  userId: string;
  sessionId: string;
  query: string;
  clock?: () => number;
};

export type ToolOutcome = {
  success: boolean;
  result?: unknown;
  error?: string;
  startedAt: number;
  endedAt: number;
};

export type RunSnapshot = {
  runId: string;
  userId: string;
  sessionId: string;
  query: string;
  createdAt: string;
  messages: ConversationEntry[];
  toolInvocations: ToolInvocation[];
  citations: Citation[];
  timeline: NodeEvent[];
  iteration: number;
  usage?: TokenUsage;
  output?: RunOutput;
};

/** Epoch milliseconds that never step backwards with the wall clock. */
function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

/**
 * Mutable record of a single run. Graph nodes are its only writers. Every collection is
 * append-only and the terminal output can be set once.
 */
export class RunState {
  readonly runId: string;
  readonly userId: string;
  readonly sessionId: string;
  readonly query: string;
  readonly createdAt: string;

  private messages: ConversationEntry[] = [];
  private toolInvocations: ToolInvocation[] = [];
  private citations: Citation[] = [];
  private timeline: NodeEvent[] = [];
  private cycles = 0;
  private usage?: TokenUsage;
  private output?: RunOutput;
  private closed = false;
  private clock: () => number;

  constructor(init: RunStateInit) {
    this.runId = init.runId;
    this.userId = init.userId;
    this.sessionId = init.sessionId;
    this.query = init.query;
    this.clock = init.clock ?? monotonicNow;
    this.createdAt = nowISO();
  }

  /** Completed reasoning/tool cycles. */
  get iteration(): number {
    return this.cycles;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get finalOutput(): RunOutput | undefined {
    return this.output;
  }

  appendMessage(role: MessageRole, content: string, toolCalls?: ToolRequest[]): ConversationEntry {
    this.assertOpen();
    const entry: ConversationEntry = { role, content, at: this.clock() };
    if (toolCalls && toolCalls.length > 0) {
      entry.toolCalls = structuredClone(toolCalls);
    }
    this.messages.push(entry);
    return entry;
  }

  appendToolResult(callId: string, toolName: string, content: string, success: boolean): ConversationEntry {
    this.assertOpen();
    const entry: ConversationEntry = {
      role: "tool",
      content,
      at: this.clock(),
      toolCallId: callId,
      toolName,
      success,
    };
    this.messages.push(entry);
    return entry;
  }

  recordToolResult(call: ToolRequest, outcome: ToolOutcome): ToolInvocation {
    this.assertOpen();
    const invocation: ToolInvocation = {
      id: call.id,
      name: call.name,
      arguments: structuredClone(call.arguments),
      success: outcome.success,
      startedAt: outcome.startedAt,
      endedAt: outcome.endedAt,
      durationMs: Math.max(0, outcome.endedAt - outcome.startedAt),
      iteration: this.cycles,
    };
    if (outcome.result !== undefined) invocation.result = outcome.result;
    if (outcome.error !== undefined) invocation.error = outcome.error;
    this.toolInvocations.push(invocation);
    return invocation;
  }

  recordCitation(source: string, snippet: string, ref: { title?: string; toolInvocationId?: string } = {}): Citation {
    this.assertOpen();
    const citation: Citation = { source, snippet };
    if (ref.title !== undefined) citation.title = ref.title;
    if (ref.toolInvocationId !== undefined) citation.toolInvocationId = ref.toolInvocationId;
    this.citations.push(citation);
    return citation;
  }

  recordNodeEvent(node: GraphNode, status: NodeStatus, startedAt: number, endedAt: number, error?: string): NodeEvent {
    this.assertOpen();
    const previous = this.timeline[this.timeline.length - 1];
    if (previous && startedAt < previous.startedAt) {
      throw new OrchestrationError(
        "internal",
        `Node event for ${node} starts at ${startedAt}, before the previous event at ${previous.startedAt}`,
      );
    }
    if (endedAt < startedAt) {
      throw new OrchestrationError("internal", `Node event for ${node} ends before it starts`);
    }
    const event: NodeEvent = {
      node,
      iteration: this.cycles,
      status,
      startedAt,
      endedAt,
      durationMs: endedAt - startedAt,
    };
    if (error !== undefined) event.error = error;
    this.timeline.push(event);
    return event;
  }

  finalize(output: RunOutput): void {
    if (this.output) {
      throw new AlreadyFinalizedError(this.runId);
    }
    this.assertOpen();
    this.output = { ...output };
  }

  completeCycle(): number {
    this.assertOpen();
    this.cycles += 1;
    return this.cycles;
  }

  addUsage(usage: TokenUsage): void {
    this.assertOpen();
    const current = this.usage ?? { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
    this.usage = {
      inputTokens: current.inputTokens + usage.inputTokens,
      outputTokens: current.outputTokens + usage.outputTokens,
      totalTokens: current.totalTokens + usage.totalTokens,
    };
  }

  close(): void {
    this.closed = true;
  }

  now(): number {
    return this.clock();
  }

  snapshot(): RunSnapshot {
    const snapshot: RunSnapshot = {
      runId: this.runId,
      userId: this.userId,
      sessionId: this.sessionId,
      query: this.query,
      createdAt: this.createdAt,
      messages: structuredClone(this.messages),
      toolInvocations: structuredClone(this.toolInvocations),
      citations: structuredClone(this.citations),
      timeline: structuredClone(this.timeline),
      iteration: this.cycles,
    };
    if (this.usage) snapshot.usage = { ...this.usage };
    if (this.output) snapshot.output = { ...this.output };
    return snapshot;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new RunStateClosedError(this.runId);
    }
  }
}
