import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError } from "../core/errors";
import type { OperationOptions } from "../core/types";
import { createDeferred, createMockLogger } from "../test-utils";
import { HeartbeatLoop, type HeartbeatTarget } from "./heartbeat-loop";

const createTarget = (ttlMs = 5_000) => {
  const sendHeartbeat = vi.fn(async (_options?: OperationOptions): Promise<void> => undefined);
  const target: HeartbeatTarget = { clientId: "loop-client", ttlMs, sendHeartbeat };
  return { target, sendHeartbeat };
};

describe("HeartbeatLoop", () => {
  let loop: HeartbeatLoop | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await loop?.stop();
    loop = null;
    vi.useRealTimers();
  });

  it("rejects an interval that is not shorter than the TTL", () => {
    const { target } = createTarget(5_000);

    expect(() => new HeartbeatLoop(target, { intervalMs: 5_000 })).toThrow(
      new ConfigurationError(
        "Heartbeat interval 5000ms must be shorter than the bucket TTL of 5000ms"
      )
    );
  });

  it("rejects a non-positive or fractional interval", () => {
    const { target } = createTarget();

    expect(() => new HeartbeatLoop(target, { intervalMs: 0 })).toThrow(ConfigurationError);
    expect(() => new HeartbeatLoop(target, { intervalMs: 12.5 })).toThrow(
      "Heartbeat interval must be a positive whole number of milliseconds, got 12.5"
    );
  });

  it("does nothing until started", async () => {
    const { target, sendHeartbeat } = createTarget();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000, logger: createMockLogger() });

    await vi.advanceTimersByTimeAsync(3_000);

    expect(sendHeartbeat).not.toHaveBeenCalled();
    expect(loop.running).toBe(false);
  });

  it("beats on start and then once per interval", async () => {
    const { target, sendHeartbeat } = createTarget();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000, logger: createMockLogger() });

    loop.start();
    expect(sendHeartbeat).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2_000);

    expect(sendHeartbeat).toHaveBeenCalledTimes(3);
    expect(loop.running).toBe(true);

    await loop.stop();
    expect(loop.stats).toEqual({ beats: 3, failures: 0 });
  });

  it("waits one interval for the first beat when not immediate", async () => {
    const { target, sendHeartbeat } = createTarget();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000, immediate: false });

    loop.start();
    expect(sendHeartbeat).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(sendHeartbeat).toHaveBeenCalledTimes(1);
  });

  it("ignores a second start", async () => {
    const { target, sendHeartbeat } = createTarget();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000 });

    loop.start();
    loop.start();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(sendHeartbeat).toHaveBeenCalledTimes(2);
  });

  it("passes the per-beat timeout to the tracker", async () => {
    const { target, sendHeartbeat } = createTarget();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000, timeoutMs: 250 });

    loop.start();

    expect(sendHeartbeat).toHaveBeenCalledWith({ timeoutMs: 250 });
  });

  it("skips beats while the previous one is still in flight", async () => {
    const { target, sendHeartbeat } = createTarget();
    const pending = createDeferred<void>();
    sendHeartbeat.mockReturnValueOnce(pending.promise);
    loop = new HeartbeatLoop(target, { intervalMs: 1_000 });

    loop.start();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(sendHeartbeat).toHaveBeenCalledTimes(1);

    pending.resolve();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(sendHeartbeat).toHaveBeenCalledTimes(2);
  });

  it("reports failures and keeps beating", async () => {
    const { target, sendHeartbeat } = createTarget();
    const failure = new Error("bucket unreachable");
    sendHeartbeat.mockRejectedValueOnce(failure);
    const onError = vi.fn();
    const logger = createMockLogger();
    loop = new HeartbeatLoop(target, { intervalMs: 1_000, onError, logger });

    loop.start();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(onError).toHaveBeenCalledWith(failure);
    expect(logger.error).toHaveBeenCalledWith("Presence heartbeat failed", {
      clientId: "loop-client",
      error: "bucket unreachable",
    });
    expect(sendHeartbeat).toHaveBeenCalledTimes(2);

    await loop.stop();
    expect(loop.stats).toEqual({ beats: 1, failures: 1 });
  });

  it("logs an error handler that throws", async () => {
    const { target, sendHeartbeat } = createTarget();
    sendHeartbeat.mockRejectedValueOnce(new Error("timeout"));
    const handlerError = new Error("handler broke");
    const logger = createMockLogger();
    loop = new HeartbeatLoop(target, {
      intervalMs: 1_000,
      logger,
      onError: () => {
        throw handlerError;
      },
    });

    loop.start();
    await loop.stop();

    expect(logger.error).toHaveBeenCalledWith("Heartbeat error handler threw", handlerError);
  });

  it("stops the timer and waits for the beat in flight", async () => {
    const { target, sendHeartbeat } = createTarget();
    const pending = createDeferred<void>();
    sendHeartbeat.mockReturnValueOnce(pending.promise);
    loop = new HeartbeatLoop(target, { intervalMs: 1_000 });
    loop.start();

    let stopped = false;
    const stopping = loop.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);
    expect(loop.running).toBe(false);

    pending.resolve();
    await stopping;
    await vi.advanceTimersByTimeAsync(5_000);

    expect(stopped).toBe(true);
    expect(sendHeartbeat).toHaveBeenCalledTimes(1);
    expect(loop.stats).toEqual({ beats: 1, failures: 0 });
  });
});
