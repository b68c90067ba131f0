import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createDeferred } from "../test-utils";
import { withTimeout } from "./timeout";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("settles with the promise when it wins", async () => {
    const onTimeout = vi.fn(() => new Error("late"));

    await expect(withTimeout(Promise.resolve(42), 100, { onTimeout })).resolves.toBe(42);
    await vi.advanceTimersByTimeAsync(200);

    expect(onTimeout).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("passes rejections through", async () => {
    const failure = new Error("refused");

    await expect(
      withTimeout(Promise.reject(failure), 100, { onTimeout: () => new Error("late") })
    ).rejects.toBe(failure);
  });

  it("rejects with the timeout error once the deadline passes", async () => {
    const pending = createDeferred<string>();
    const timeoutError = new Error("deadline");

    const assertion = expect(
      withTimeout(pending.promise, 100, { onTimeout: () => timeoutError })
    ).rejects.toBe(timeoutError);
    await vi.advanceTimersByTimeAsync(100);

    await assertion;
  });

  it("hands a late result to onLateResult", async () => {
    const pending = createDeferred<string>();
    const onLateResult = vi.fn();

    const assertion = expect(
      withTimeout(pending.promise, 50, { onTimeout: () => new Error("deadline"), onLateResult })
    ).rejects.toThrow("deadline");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    pending.resolve("handle");
    await vi.advanceTimersByTimeAsync(0);

    expect(onLateResult).toHaveBeenCalledWith("handle");
  });

  it("hands a late failure to onLateError", async () => {
    const pending = createDeferred<string>();
    const onLateError = vi.fn();
    const failure = new Error("gone");

    const assertion = expect(
      withTimeout(pending.promise, 50, { onTimeout: () => new Error("deadline"), onLateError })
    ).rejects.toThrow("deadline");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    pending.reject(failure);
    await vi.advanceTimersByTimeAsync(0);

    expect(onLateError).toHaveBeenCalledWith(failure);
  });
});
