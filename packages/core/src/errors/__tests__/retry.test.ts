import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AbortError, abortableSleep, isAbortError, throwIfAborted } from "../retry.js";

describe("abortableSleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    const done = vi.fn();
    const sleep = abortableSleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await sleep;
    expect(done).toHaveBeenCalledOnce();
  });

  it("rejects immediately when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(1000, controller.signal)).rejects.toBeInstanceOf(AbortError);
  });

  it("rejects when aborted mid-sleep", async () => {
    const controller = new AbortController();
    const sleep = abortableSleep(5000, controller.signal);

    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await expect(sleep).rejects.toThrow("Operation aborted");
  });
});

describe("abort helpers", () => {
  it("recognizes both abort error shapes", () => {
    expect(isAbortError(new AbortError())).toBe(true);
    expect(isAbortError(new DOMException("aborted", "AbortError"))).toBe(true);
    expect(isAbortError(new Error("other"))).toBe(false);
  });

  it("throwIfAborted only throws for an aborted signal", () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal)).toThrow(AbortError);
  });
});
