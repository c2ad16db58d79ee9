import type {
  FailedRunResult,
  FinalResult,
  GraphEvent,
  Itinerary,
  ReasoningCapability,
  RunResult,
  StreamEvent,
  TerminalEvent,
  ToolManifestEntry,
} from "@tripwright/shared";
import { generateId, nowISO } from "@tripwright/shared";
import { DEFAULT_AGENT_SETTINGS } from "../config/schema.js";
import type { AgentSettings } from "../config/types.js";
import {
  DeadlineExceededError,
  OrchestrationError,
  PersistenceError,
  RunCancelledError,
  describeError,
  toErrorInfo,
} from "../errors.js";
import type { EventBus } from "../events/event-bus.js";
import type { ItineraryFormatter } from "../format/itinerary.js";
import { ExecutionGraph } from "../graph/execution-graph.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { RunState } from "../state/run-state.js";
import type { RunOutput, RunSnapshot } from "../state/run-state.js";
import type { RunRecordStore } from "../storage/run-record-store.js";
import type { CapabilityRegistry } from "../tools/registry.js";
import type { CapabilityCallable } from "../tools/types.js";

export type RunRequest = {
  query: string;
  userId: string;
  sessionId?: string;
  /** Extra facts about the trip, handed to the reasoning step as a system entry. */
  context?: Record<string, unknown>;
};

export type RunOptions = {
  signal?: AbortSignal;
  deadlineMs?: number;
};

export type OrchestratorSettings = AgentSettings & {
  systemPrompt?: string;
};

export type OrchestratorDeps = {
  registry: CapabilityRegistry;
  reasoning: ReasoningCapability;
  store: RunRecordStore;
  formatter?: ItineraryFormatter;
  eventBus?: EventBus;
  logger?: Logger;
  settings?: Partial<OrchestratorSettings>;
};

/** What the batch fold needs beyond the public events. */
type DriveSink = {
  snapshot?: RunSnapshot;
  persistenceError?: PersistenceError;
  rejected?: OrchestrationError;
};

export class Orchestrator {
  private manifest: readonly ToolManifestEntry[];
  private callables: ReadonlyMap<string, CapabilityCallable>;
  private reasoning: ReasoningCapability;
  private store: RunRecordStore;
  private formatter?: ItineraryFormatter;
  private eventBus?: EventBus;
  private logger: Logger;
  readonly settings: OrchestratorSettings;

  constructor(deps: OrchestratorDeps) {
    this.callables = deps.registry.createCallables();
    this.manifest = [...deps.registry.listManifest()];
    this.reasoning = deps.reasoning;
    this.store = deps.store;
    this.formatter = deps.formatter;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? silentLogger();
    this.settings = { ...DEFAULT_AGENT_SETTINGS, ...deps.settings };
  }

  /**
   * Runs a request and yields its progress. Not restartable: every call is a new run.
   * Stopping iteration early cancels the run and records it as failed.
   */
  stream(request: RunRequest, options: RunOptions = {}): AsyncGenerator<StreamEvent, void, undefined> {
    return this.drive(request, options, {});
  }

  /** Runs a request to completion. Throws PersistenceError, carrying the result, when it cannot be stored. */
  async run(request: RunRequest, options: RunOptions = {}): Promise<RunResult> {
    const sink: DriveSink = {};
    let result: RunResult | undefined;

    for await (const event of this.drive(request, options, sink)) {
      if (result) continue;
      if (event.type === "final-result") {
        result = { status: "completed", ...event.result };
      } else if (event.type === "error") {
        result = failedResult(event.runId, event.error, sink.snapshot);
      }
    }

    if (sink.rejected) {
      throw sink.rejected;
    }
    if (!result) {
      throw new OrchestrationError("internal", "Run ended without a terminal event");
    }
    if (sink.persistenceError) {
      throw sink.persistenceError.withResult(result);
    }
    return result;
  }

  private async *drive(
    request: RunRequest,
    options: RunOptions,
    sink: DriveSink,
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const refuse = (err: OrchestrationError): StreamEvent => {
      sink.rejected = err;
      this.logger.warn("Run refused", { kind: err.kind, message: err.message });
      return { runId: "", seq: 1, at: nowISO(), type: "error", error: toErrorInfo(err), timeline: [] };
    };

    const query = request.query.trim();
    if (!query) {
      yield refuse(new OrchestrationError("validation", "query must not be empty"));
      return;
    }
    const sessionId = request.sessionId ?? generateId();
    let runId: string;
    try {
      runId = await this.store.createRunRecord({ userId: request.userId, sessionId, query });
    } catch (err) {
      yield refuse(asPersistenceError("createRunRecord", err));
      return;
    }
    const log = this.logger.child(runId.slice(0, 8));

    const controller = new AbortController();
    const deadlineMs = options.deadlineMs ?? this.settings.runDeadlineMs;
    const deadline = setTimeout(() => controller.abort(new DeadlineExceededError(deadlineMs)), deadlineMs);
    const onCallerAbort = () => controller.abort(new RunCancelledError());
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const state = new RunState({ runId, userId: request.userId, sessionId, query });
    if (this.settings.systemPrompt) state.appendMessage("system", this.settings.systemPrompt);
    if (request.context && Object.keys(request.context).length > 0) {
      state.appendMessage("system", `Trip context: ${JSON.stringify(request.context)}`);
    }
    state.appendMessage("user", query);

    let seq = 0;
    const envelope = (event: GraphEvent | TerminalEvent): StreamEvent => {
      const wrapped: StreamEvent = { runId, seq: ++seq, at: nowISO(), ...event };
      this.publish(wrapped, log);
      return wrapped;
    };

    const graph = new ExecutionGraph({
      manifest: this.manifest,
      callables: this.callables,
      reasoning: this.reasoning,
      settings: this.settings,
      logger: log.child("graph"),
    });
    const execution = graph.execute(state, controller.signal);
    let terminal = false;

    try {
      await this.store.updateRunRecord(runId, "running", {});
      log.info("Run started", { userId: request.userId, sessionId, provider: this.reasoning.id });

      let step = await execution.next();
      while (!step.done) {
        const event = step.value;
        yield envelope(event);
        if (event.type === "node-finished") await this.checkpoint(state, log);
        step = await execution.next();
      }

      state.close();
      const snapshot = state.snapshot();
      sink.snapshot = snapshot;
      terminal = true;

      const answer = step.value.answer;
      const itinerary = this.formatItinerary(answer, snapshot, log);
      const result: FinalResult = {
        runId,
        sessionId,
        answer,
        itinerary,
        citations: snapshot.citations,
        toolInvocations: snapshot.toolInvocations,
        timeline: snapshot.timeline,
        messages: snapshot.messages,
        iterations: snapshot.iteration,
        usage: snapshot.usage,
        createdAt: snapshot.createdAt,
        completedAt: nowISO(),
      };

      try {
        await this.store.completeRunRecord(runId, {
          status: "completed",
          finalResponse: { answer, itinerary },
          ...progressOf(snapshot),
        });
      } catch (err) {
        sink.persistenceError = asPersistenceError("completeRunRecord", err);
        log.error("Failed to persist completed run", { error: sink.persistenceError.message });
      }

      log.info("Run completed", { iterations: snapshot.iteration, tools: snapshot.toolInvocations.length });
      const persistenceError = sink.persistenceError ? toErrorInfo(sink.persistenceError) : undefined;
      yield envelope(
        persistenceError ? { type: "final-result", result, persistenceError } : { type: "final-result", result },
      );
    } catch (err) {
      if (terminal) throw err;
      terminal = true;
      state.close();
      const snapshot = state.snapshot();
      sink.snapshot = snapshot;
      const error = toErrorInfo(err);

      if (error.kind === "cancelled") {
        log.info("Run cancelled", { message: error.message });
      } else {
        log.warn("Run failed", { kind: error.kind, message: error.message });
      }

      try {
        await this.store.completeRunRecord(runId, { status: "failed", error, ...progressOf(snapshot) });
      } catch (persistErr) {
        sink.persistenceError = asPersistenceError("completeRunRecord", persistErr);
        log.error("Failed to persist failed run", { error: sink.persistenceError.message });
      }

      const persistenceError = sink.persistenceError ? toErrorInfo(sink.persistenceError) : undefined;
      yield envelope(
        persistenceError
          ? { type: "error", error, timeline: snapshot.timeline, persistenceError }
          : { type: "error", error, timeline: snapshot.timeline },
      );
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", onCallerAbort);
      if (!terminal) {
        controller.abort(new RunCancelledError("Run abandoned by its consumer"));
        await this.abandon(state, execution, log);
      }
    }
  }

  private async checkpoint(state: RunState, log: Logger): Promise<void> {
    try {
      await this.store.updateRunRecord(state.runId, "running", progressOf(state.snapshot()));
    } catch (err) {
      log.warn("Checkpoint failed", { error: describeError(err) });
    }
  }

  /** Best-effort cleanup when the consumer stops reading before a terminal event. */
  private async abandon(
    state: RunState,
    execution: AsyncGenerator<GraphEvent, RunOutput, undefined>,
    log: Logger,
  ): Promise<void> {
    state.close();
    try {
      await execution.return({ answer: "" });
    } catch (err) {
      log.debug("Graph did not unwind cleanly", { error: describeError(err) });
    }

    const snapshot = state.snapshot();
    const error = toErrorInfo(new RunCancelledError("Run abandoned by its consumer"));
    try {
      await this.store.completeRunRecord(state.runId, { status: "failed", error, ...progressOf(snapshot) });
      log.info("Run abandoned", { nodes: snapshot.timeline.length });
    } catch (err) {
      log.error("Failed to persist abandoned run", { error: describeError(err) });
    }
  }

  private formatItinerary(answer: string, snapshot: RunSnapshot, log: Logger): Itinerary | null {
    if (!this.formatter) return null;
    try {
      return this.formatter.format(answer, snapshot);
    } catch (err) {
      log.warn("Itinerary formatting failed", { error: describeError(err) });
      return null;
    }
  }

  private publish(event: StreamEvent, log: Logger): void {
    if (!this.eventBus) return;
    try {
      this.eventBus.publish(event);
    } catch (err) {
      log.warn("Event subscriber threw", { type: event.type, error: describeError(err) });
    }
  }
}

function progressOf(snapshot: RunSnapshot) {
  return {
    timeline: snapshot.timeline,
    toolLog: snapshot.toolInvocations,
    citations: snapshot.citations,
    ...(snapshot.usage ? { usage: snapshot.usage } : {}),
  };
}

function asPersistenceError(operation: string, err: unknown): PersistenceError {
  return err instanceof PersistenceError ? err : new PersistenceError(operation, err);
}

function failedResult(
  runId: string,
  error: { kind: string; message: string },
  snapshot: RunSnapshot | undefined,
): FailedRunResult {
  const now = nowISO();
  return {
    status: "failed",
    runId,
    sessionId: snapshot?.sessionId ?? "",
    error,
    timeline: snapshot?.timeline ?? [],
    toolInvocations: snapshot?.toolInvocations ?? [],
    createdAt: snapshot?.createdAt ?? now,
    failedAt: now,
  };
}
