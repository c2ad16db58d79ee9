import { describe, it, expect, vi, afterEach } from "vitest";
import { DeadlineElapsed, abortReason, raceAbort, throwIfAborted, withDeadline } from "./deadline.js";
import { MaxIterationsExceededError, RunCancelledError } from "../errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("withDeadline", () => {
  it("aborts after the timeout", () => {
    vi.useFakeTimers();
    const deadline = withDeadline(new AbortController().signal, 50);

    vi.advanceTimersByTime(49);
    expect(deadline.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineElapsed);
  });

  it("follows the parent signal", () => {
    const parent = new AbortController();
    const deadline = withDeadline(parent.signal, 10_000);
    const reason = new RunCancelledError();

    parent.abort(reason);

    expect(deadline.signal.reason).toBe(reason);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  it("starts aborted when the parent already is", () => {
    const parent = new AbortController();
    parent.abort(new RunCancelledError());
    const deadline = withDeadline(parent.signal, 10_000);
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it("dispose stops the timer", () => {
    vi.useFakeTimers();
    const deadline = withDeadline(new AbortController().signal, 50);
    deadline.dispose();
    vi.advanceTimersByTime(100);
    expect(deadline.signal.aborted).toBe(false);
  });
});

describe("raceAbort", () => {
  it("resolves with the work", async () => {
    await expect(raceAbort(Promise.resolve(7), new AbortController().signal)).resolves.toBe(7);
  });

  it("rejects with the abort reason when the signal wins", async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => {}), controller.signal);
    const reason = new RunCancelledError("stop");
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });

  it("propagates work rejections", async () => {
    await expect(raceAbort(Promise.reject(new Error("boom")), new AbortController().signal)).rejects.toThrow("boom");
  });
});

describe("abortReason", () => {
  it("keeps orchestration errors and maps anything else to cancellation", () => {
    const a = new AbortController();
    const max = new MaxIterationsExceededError(3);
    a.abort(max);
    expect(abortReason(a.signal)).toBe(max);

    const b = new AbortController();
    b.abort();
    expect(abortReason(b.signal)).toBeInstanceOf(RunCancelledError);
  });

  it("throwIfAborted is a no-op on live signals", () => {
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });
});
