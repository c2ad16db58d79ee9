import { OrchestrationError, RunCancelledError } from "../errors.js";

export type Deadline = {
  /** Aborts when the parent aborts or the timeout elapses, whichever is first. */
  readonly signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
};

export class DeadlineElapsed extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "DeadlineElapsed";
  }
}

export function withDeadline(parent: AbortSignal, timeoutMs: number): Deadline {
  const controller = new AbortController();
  let elapsed = false;

  const onParentAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    elapsed = true;
    controller.abort(new DeadlineElapsed(timeoutMs));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => elapsed,
    dispose() {
      clearTimeout(timer);
      parent.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Settles with `work`, or rejects with the signal's reason as soon as it aborts. Work that
 * ignores the signal keeps running in the background; its late outcome is dropped.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/** The error a run should fail with once `signal` has aborted. */
export function abortReason(signal: AbortSignal): OrchestrationError {
  const reason: unknown = signal.reason;
  return reason instanceof OrchestrationError ? reason : new RunCancelledError();
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw abortReason(signal);
}
