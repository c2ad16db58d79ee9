import type { ErrorInfo, RunResult } from "@tripwright/shared";

export type ErrorKind =
  | "duplicate_capability"
  | "registry_locked"
  | "unknown_capability"
  | "validation"
  | "tool_execution"
  | "tool_timeout"
  | "reasoning_unavailable"
  | "max_iterations"
  | "cancelled"
  | "persistence"
  | "already_finalized"
  | "run_state_closed"
  | "internal";

export class OrchestrationError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "OrchestrationError";
    this.kind = kind;
  }
}

export class DuplicateCapabilityError extends OrchestrationError {
  constructor(name: string) {
    super("duplicate_capability", `Capability "${name}" already registered`);
    this.name = "DuplicateCapabilityError";
  }
}

export class RegistryLockedError extends OrchestrationError {
  constructor(name: string) {
    super("registry_locked", `Cannot register "${name}": capability registry is locked`);
    this.name = "RegistryLockedError";
  }
}

export class UnknownCapabilityError extends OrchestrationError {
  readonly capability: string;

  constructor(name: string) {
    super("unknown_capability", `Unknown capability "${name}"`);
    this.name = "UnknownCapabilityError";
    this.capability = name;
  }
}

export class CapabilityValidationError extends OrchestrationError {
  readonly issues: string[];

  constructor(name: string, issues: string[]) {
    super("validation", `Invalid arguments for "${name}": ${issues.join("; ")}`);
    this.name = "CapabilityValidationError";
    this.issues = issues;
  }
}

export class ToolExecutionError extends OrchestrationError {
  constructor(name: string, cause: unknown) {
    super("tool_execution", `Tool "${name}" failed: ${describeError(cause)}`, cause);
    this.name = "ToolExecutionError";
  }
}

export class ToolTimeoutError extends OrchestrationError {
  constructor(name: string, timeoutMs: number) {
    super("tool_timeout", `Tool "${name}" timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export class ReasoningUnavailableError extends OrchestrationError {
  constructor(detail: string, cause?: unknown) {
    super("reasoning_unavailable", `Reasoning capability unavailable: ${detail}`, cause);
    this.name = "ReasoningUnavailableError";
  }
}

export class MaxIterationsExceededError extends OrchestrationError {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super("max_iterations", `Run exceeded the maximum of ${maxIterations} reasoning/tool cycles`);
    this.name = "MaxIterationsExceededError";
    this.maxIterations = maxIterations;
  }
}

export class RunCancelledError extends OrchestrationError {
  constructor(reason = "Run cancelled") {
    super("cancelled", reason);
    this.name = "RunCancelledError";
  }
}

export class DeadlineExceededError extends OrchestrationError {
  constructor(deadlineMs: number) {
    super("reasoning_unavailable", `Run deadline of ${deadlineMs}ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

export class PersistenceError extends OrchestrationError {
  readonly operation: string;
  /** Result already computed when a terminal write failed. */
  readonly result?: RunResult;

  constructor(operation: string, cause: unknown, result?: RunResult) {
    const root = cause instanceof PersistenceError ? cause.cause : cause;
    super("persistence", `Persistence failed during ${operation}: ${describeError(root)}`, root);
    this.name = "PersistenceError";
    this.operation = operation;
    this.result = result;
  }

  withResult(result: RunResult): PersistenceError {
    return new PersistenceError(this.operation, this, result);
  }
}

export class AlreadyFinalizedError extends OrchestrationError {
  constructor(runId: string) {
    super("already_finalized", `Run ${runId} already has a terminal output`);
    this.name = "AlreadyFinalizedError";
  }
}

export class RunStateClosedError extends OrchestrationError {
  constructor(runId: string) {
    super("run_state_closed", `Run ${runId} is closed and can no longer be modified`);
    this.name = "RunStateClosedError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof OrchestrationError) return { kind: err.kind, message: err.message };
  return { kind: "internal", message: describeError(err) };
}
