import type {
  GraphEvent,
  GraphNode,
  ReasoningCapability,
  ReasoningDecision,
  ReasoningInput,
  ToolManifestEntry,
  ToolRequest,
} from "@tripwright/shared";
import { generateCallId } from "@tripwright/shared";
import type { AgentSettings } from "../config/types.js";
import {
  CapabilityValidationError,
  DeadlineExceededError,
  MaxIterationsExceededError,
  OrchestrationError,
  ReasoningUnavailableError,
  RunCancelledError,
  ToolExecutionError,
  ToolTimeoutError,
  UnknownCapabilityError,
  describeError,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RunOutput, RunState } from "../state/run-state.js";
import type { CapabilityCallable, CapabilityCitation } from "../tools/types.js";
import { abortReason, raceAbort, throwIfAborted, withDeadline } from "./deadline.js";
import type { Deadline } from "./deadline.js";
import { nextState } from "./routing.js";
import type { GraphState } from "./routing.js";

export type GraphSettings = Pick<
  AgentSettings,
  "maxIterations" | "reasoningTimeoutMs" | "toolTimeoutMs" | "toolConcurrency" | "maxToolResultChars"
>;

export type ExecutionGraphDeps = {
  /** Tool signatures offered to the reasoning step. */
  manifest: readonly ToolManifestEntry[];
  /** Dispatch table from `CapabilityRegistry.createCallables()`. */
  callables: ReadonlyMap<string, CapabilityCallable>;
  reasoning: ReasoningCapability;
  settings: GraphSettings;
  logger: Logger;
};

type ToolCallOutcome = {
  request: ToolRequest;
  success: boolean;
  result?: unknown;
  error?: string;
  citations: CapabilityCitation[];
  startedAt: number;
  endedAt: number;
};

/**
 * Alternates reasoning and tool dispatch over a RunState until the reasoning step answers
 * without requesting tools. Progress is reported as GraphEvents; the generator's return
 * value is the run's terminal output.
 */
export class ExecutionGraph {
  private manifest: readonly ToolManifestEntry[];
  private callables: ReadonlyMap<string, CapabilityCallable>;
  private reasoning: ReasoningCapability;
  private settings: GraphSettings;
  private logger: Logger;

  constructor(deps: ExecutionGraphDeps) {
    this.manifest = deps.manifest;
    this.callables = deps.callables;
    this.reasoning = deps.reasoning;
    this.settings = deps.settings;
    this.logger = deps.logger;
  }

  async *execute(state: RunState, signal: AbortSignal): AsyncGenerator<GraphEvent, RunOutput, undefined> {
    let current: GraphState = nextState("START");
    let pending: ToolRequest[] = [];

    while (current !== "END") {
      throwIfAborted(signal);

      if (current === "REASONING") {
        if (state.iteration >= this.settings.maxIterations) {
          throw new MaxIterationsExceededError(this.settings.maxIterations);
        }
        const decision: ReasoningDecision = yield* this.reasoningNode(state, signal);
        pending = decision.kind === "tool-requests" ? decision.requests : [];
        current = nextState(current, decision);
      } else if (current === "TOOL_DISPATCH") {
        yield* this.toolDispatchNode(state, pending, signal);
        state.completeCycle();
        current = nextState(current);
      }
    }

    const output = state.finalOutput;
    if (!output) {
      throw new OrchestrationError("internal", "Graph reached END without a final answer");
    }
    return output;
  }

  private async *reasoningNode(
    state: RunState,
    signal: AbortSignal,
  ): AsyncGenerator<GraphEvent, ReasoningDecision, undefined> {
    const iteration = state.iteration;
    const startedAt = state.now();
    yield { type: "node-started", node: "reasoning", iteration };

    let decision: ReasoningDecision;
    try {
      decision = yield* this.callReasoning(state, signal, iteration);
      if (decision.usage) state.addUsage(decision.usage);
      if (decision.kind === "final-answer") {
        state.appendMessage("assistant", decision.text);
        state.finalize({ answer: decision.text });
      } else {
        state.appendMessage("assistant", decision.text ?? "", decision.requests);
      }
    } catch (err) {
      yield* this.failNode(state, "reasoning", iteration, startedAt, err);
      throw err;
    }

    yield* this.finishNode(state, "reasoning", iteration, startedAt);
    return decision;
  }

  private async *callReasoning(
    state: RunState,
    signal: AbortSignal,
    iteration: number,
  ): AsyncGenerator<GraphEvent, ReasoningDecision, undefined> {
    const timeoutMs = this.settings.reasoningTimeoutMs;
    const deadline = withDeadline(signal, timeoutMs);
    const input: ReasoningInput = {
      messages: state.snapshot().messages,
      tools: [...this.manifest],
      signal: deadline.signal,
    };

    try {
      if (this.reasoning.stream) {
        const iterator = this.reasoning.stream(input)[Symbol.asyncIterator]();
        let decision: ReasoningDecision | undefined;
        let exhausted = false;
        try {
          while (!exhausted) {
            const step = await raceAbort(iterator.next(), deadline.signal);
            if (step.done) {
              exhausted = true;
            } else if (step.value.type === "delta") {
              if (step.value.text) yield { type: "message-delta", text: step.value.text, iteration };
            } else {
              decision = step.value.decision;
            }
          }
        } finally {
          if (!exhausted) this.closeStream(iterator);
        }
        if (!decision) {
          throw new ReasoningUnavailableError("stream ended without a decision");
        }
        return normalizeDecision(decision);
      }

      const decision = normalizeDecision(await raceAbort(this.reasoning.decide(input), deadline.signal));
      if (decision.text) yield { type: "message-delta", text: decision.text, iteration };
      return decision;
    } catch (err) {
      throw reasoningFailure(err, signal, deadline, timeoutMs);
    } finally {
      deadline.dispose();
    }
  }

  private closeStream(iterator: AsyncIterator<unknown>): void {
    if (!iterator.return) return;
    iterator.return().then(
      () => undefined,
      (err: unknown) => this.logger.debug("Reasoning stream did not close cleanly", { error: describeError(err) }),
    );
  }

  private async *toolDispatchNode(
    state: RunState,
    requests: ToolRequest[],
    signal: AbortSignal,
  ): AsyncGenerator<GraphEvent, void, undefined> {
    const iteration = state.iteration;
    const startedAt = state.now();
    yield { type: "node-started", node: "tool_dispatch", iteration };

    try {
      const outcomes: ToolCallOutcome[] = [];
      const parallel = this.settings.toolConcurrency === "parallel";
      const launched = parallel ? requests.map((r) => this.invokeTool(state, r, signal)) : [];

      for (let i = 0; i < requests.length; i++) {
        const request = requests[i];
        if (!request) continue;
        yield { type: "tool-call-started", callId: request.id, name: request.name, arguments: request.arguments, iteration };
        const outcome = await (launched[i] ?? this.invokeTool(state, request, signal));
        outcomes.push(outcome);
        yield {
          type: "tool-call-finished",
          callId: request.id,
          name: request.name,
          success: outcome.success,
          result: outcome.result,
          error: outcome.error,
          durationMs: outcome.endedAt - outcome.startedAt,
          iteration,
        };
      }

      for (const outcome of outcomes) {
        this.recordOutcome(state, outcome);
      }
    } catch (err) {
      yield* this.failNode(state, "tool_dispatch", iteration, startedAt, err);
      throw err;
    }

    yield* this.finishNode(state, "tool_dispatch", iteration, startedAt);
  }

  /** Never rejects: every failure becomes a failed outcome. */
  private async invokeTool(state: RunState, request: ToolRequest, signal: AbortSignal): Promise<ToolCallOutcome> {
    const startedAt = state.now();
    const fail = (error: OrchestrationError): ToolCallOutcome => {
      this.logger.warn("Tool call failed", { runId: state.runId, tool: request.name, kind: error.kind, error: error.message });
      return { request, success: false, error: error.message, citations: [], startedAt, endedAt: state.now() };
    };

    const call = this.callables.get(request.name);
    if (!call) {
      return fail(new UnknownCapabilityError(request.name));
    }
    const timeoutMs = call.timeoutMs ?? this.settings.toolTimeoutMs;
    const deadline = withDeadline(signal, timeoutMs);

    try {
      const result = await raceAbort(
        call(request.arguments, {
          runId: state.runId,
          callId: request.id,
          signal: deadline.signal,
          logger: this.logger.child(request.name),
        }),
        deadline.signal,
      );
      if (!result.success) {
        this.logger.warn("Tool reported failure", { runId: state.runId, tool: request.name, error: result.error });
        return { request, success: false, error: result.error, citations: [], startedAt, endedAt: state.now() };
      }
      return {
        request,
        success: true,
        result: result.data,
        citations: result.citations ?? [],
        startedAt,
        endedAt: state.now(),
      };
    } catch (err) {
      if (err instanceof CapabilityValidationError) return fail(err);
      if (deadline.timedOut()) return fail(new ToolTimeoutError(request.name, timeoutMs));
      if (signal.aborted) {
        const reason = abortReason(signal);
        if (reason instanceof DeadlineExceededError) {
          return fail(new ToolTimeoutError(request.name, state.now() - startedAt));
        }
        return fail(reason);
      }
      return fail(new ToolExecutionError(request.name, err));
    } finally {
      deadline.dispose();
    }
  }

  private recordOutcome(state: RunState, outcome: ToolCallOutcome): void {
    const { request } = outcome;
    state.recordToolResult(request, outcome);
    const content = outcome.success ? renderJson(outcome.result) : renderJson({ error: outcome.error });
    state.appendToolResult(
      request.id,
      request.name,
      truncate(content, this.settings.maxToolResultChars),
      outcome.success,
    );
    for (const citation of outcome.citations) {
      state.recordCitation(citation.source, citation.snippet, { title: citation.title, toolInvocationId: request.id });
    }
  }

  private async *finishNode(
    state: RunState,
    node: GraphNode,
    iteration: number,
    startedAt: number,
  ): AsyncGenerator<GraphEvent, void, undefined> {
    const event = state.recordNodeEvent(node, "success", startedAt, state.now());
    yield { type: "node-finished", node, iteration, status: "success", durationMs: event.durationMs };
  }

  private async *failNode(
    state: RunState,
    node: GraphNode,
    iteration: number,
    startedAt: number,
    err: unknown,
  ): AsyncGenerator<GraphEvent, void, undefined> {
    const message = describeError(err);
    if (state.isClosed) return;
    const event = state.recordNodeEvent(node, "error", startedAt, state.now(), message);
    yield { type: "node-finished", node, iteration, status: "error", durationMs: event.durationMs, error: message };
  }
}

function reasoningFailure(err: unknown, signal: AbortSignal, deadline: Deadline, timeoutMs: number): OrchestrationError {
  if (signal.aborted) {
    const reason = abortReason(signal);
    if (reason instanceof RunCancelledError) return reason;
    if (reason instanceof DeadlineExceededError) return new ReasoningUnavailableError(reason.message, reason);
    return reason;
  }
  if (deadline.timedOut()) {
    return new ReasoningUnavailableError(`no decision within ${timeoutMs}ms`);
  }
  if (err instanceof OrchestrationError) return err;
  return new ReasoningUnavailableError(describeError(err), err);
}

/** Checks provider output and fills in missing call ids. */
export function normalizeDecision(decision: ReasoningDecision): ReasoningDecision {
  if (decision.kind === "final-answer") {
    if (typeof decision.text !== "string") {
      throw new ReasoningUnavailableError("final answer without text");
    }
    return decision;
  }
  if (decision.kind !== "tool-requests" || !Array.isArray(decision.requests)) {
    throw new ReasoningUnavailableError("malformed decision");
  }
  if (decision.requests.length === 0) {
    const text = decision.text ?? "";
    return decision.usage ? { kind: "final-answer", text, usage: decision.usage } : { kind: "final-answer", text };
  }
  const seen = new Set<string>();
  const requests = decision.requests.map((request) => {
    if (typeof request.name !== "string" || !request.name) {
      throw new ReasoningUnavailableError("tool request without a name");
    }
    const id = request.id && !seen.has(request.id) ? request.id : generateCallId();
    seen.add(id);
    return { id, name: request.name, arguments: request.arguments };
  });
  return { ...decision, requests };
}

function renderJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "null";
  } catch {
    return String(value);
  }
}

export function truncate(content: string, maxChars: number): string {
  if (content.length <= maxChars) return content;
  return `${content.slice(0, maxChars)}\n[truncated ${content.length - maxChars} chars]`;
}
