import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { takeUntilIdle } from "./bounded-sequence";

const scriptedSource = (items: string[], { hangAfter = false, failWith }: {
  hangAfter?: boolean;
  failWith?: Error;
} = {}) => {
  let index = 0;
  const source = {
    next: vi.fn((): Promise<IteratorResult<string>> => {
      const value = items[index];
      if (value !== undefined) {
        index += 1;
        const step: IteratorResult<string> = { done: false, value };
        return Promise.resolve(step);
      }
      if (failWith) {
        return Promise.reject(failWith);
      }
      if (hangAfter) {
        return new Promise(() => undefined);
      }
      const end: IteratorResult<string> = { done: true, value: undefined };
      return Promise.resolve(end);
    }),
    return: vi.fn(async (): Promise<IteratorResult<string>> => ({ done: true, value: undefined })),
  };
  return source;
};

const collect = async (sequence: AsyncIterable<string>) => {
  const seen: string[] = [];
  for await (const item of sequence) {
    seen.push(item);
  }
  return seen;
};

const asIterable = <T>(iterator: AsyncGenerator<T, void, undefined>): AsyncIterable<T> => ({
  [Symbol.asyncIterator]: () => iterator,
});

describe("takeUntilIdle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("yields everything from a source that completes", async () => {
    const source = scriptedSource(["a", "b", "c"]);

    await expect(collect(asIterable(takeUntilIdle(source, { idleTimeoutMs: 100 })))).resolves.toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(source.return).toHaveBeenCalledTimes(1);
  });

  it("ends on the first idle gap and releases the source", async () => {
    const source = scriptedSource(["a", "b"], { hangAfter: true });

    const result = collect(asIterable(takeUntilIdle(source, { idleTimeoutMs: 100 })));
    await vi.advanceTimersByTimeAsync(100);

    await expect(result).resolves.toEqual(["a", "b"]);
    expect(source.next).toHaveBeenCalledTimes(3);
    expect(source.return).toHaveBeenCalledTimes(1);
  });

  it("ends when the signal aborts and uses the custom stop", async () => {
    const source = scriptedSource(["a"], { hangAfter: true });
    const controller = new AbortController();
    const stop = vi.fn();

    const result = collect(
      asIterable(takeUntilIdle(source, { idleTimeoutMs: 60_000, signal: controller.signal, stop }))
    );
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    await expect(result).resolves.toEqual(["a"]);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(source.return).not.toHaveBeenCalled();
  });

  it("yields nothing when the signal is already aborted", async () => {
    const source = scriptedSource(["a"]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      collect(asIterable(takeUntilIdle(source, { idleTimeoutMs: 100, signal: controller.signal })))
    ).resolves.toEqual([]);
    expect(source.next).not.toHaveBeenCalled();
    expect(source.return).toHaveBeenCalledTimes(1);
  });

  it("propagates source failures after releasing the source", async () => {
    const source = scriptedSource(["a"], { failWith: new Error("watch failed") });

    await expect(collect(asIterable(takeUntilIdle(source, { idleTimeoutMs: 100 })))).rejects.toThrow(
      "watch failed"
    );
    expect(source.return).toHaveBeenCalledTimes(1);
  });
});
