import { INVALID_SPAN_CONTEXT, SpanStatusCode, trace, type Span } from "@opentelemetry/api";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PresenceCheckError } from "../core/errors";
import { MemoryKvBucket } from "../kv/memory-substrate";
import { createMemorySubstrate, createMockLogger } from "../test-utils";
import { initInstrumentedPresenceTracker, type InstrumentedPresenceTracker } from "./instrumented-tracker";
import { TraceService } from "./trace-service";
import type { PresenceOperation, PresenceSpanAttributes } from "./types";

interface RecordedSpan {
  operation: PresenceOperation;
  attributes: Partial<PresenceSpanAttributes>;
  span: Span;
}

const createSpan = (): Span => {
  const span = trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
  vi.spyOn(span, "setAttribute");
  vi.spyOn(span, "setStatus");
  vi.spyOn(span, "recordException");
  vi.spyOn(span, "end");
  return span;
};

describe("InstrumentedPresenceTracker", () => {
  let traceService: TraceService;
  let spans: RecordedSpan[];
  let tracker: InstrumentedPresenceTracker;

  const lastSpan = (): RecordedSpan => {
    const recorded = spans[spans.length - 1];
    if (!recorded) {
      throw new Error("no span recorded");
    }
    return recorded;
  };

  beforeEach(async () => {
    traceService = new TraceService("presence-test");
    spans = [];
    vi.spyOn(traceService, "createPresenceSpan").mockImplementation((operation, attributes = {}) => {
      const span = createSpan();
      spans.push({ operation, attributes, span });
      return span;
    });

    const { substrate } = createMemorySubstrate();
    tracker = await initInstrumentedPresenceTracker("memory://tracing", "traced", "alice", 10, {
      substrate,
      logger: createMockLogger(),
      traceService,
    });
  });

  afterEach(async () => {
    await tracker.close();
    vi.restoreAllMocks();
  });

  it("traces initialization", () => {
    expect(spans).toHaveLength(1);
    expect(lastSpan().operation).toBe("initialize");
    expect(lastSpan().attributes).toEqual({
      "presence.bucket": "traced",
      "presence.client_id": "alice",
    });
    expect(lastSpan().span.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
    expect(lastSpan().span.end).toHaveBeenCalledTimes(1);
  });

  it("traces heartbeats with the bucket attributes and an event", async () => {
    const addEvent = vi.spyOn(traceService, "addEvent");

    await tracker.sendHeartbeat();

    expect(lastSpan().operation).toBe("heartbeat");
    expect(lastSpan().attributes).toEqual({
      "presence.bucket": "traced",
      "presence.client_id": "alice",
      "presence.ttl_ms": 10_000,
    });
    expect(addEvent).toHaveBeenCalledWith("presence.heartbeat_sent", { client_id: "alice" });
    expect(lastSpan().span.end).toHaveBeenCalledTimes(1);
  });

  it("records the presence result", async () => {
    await tracker.sendHeartbeat();

    expect(await tracker.isPresent("alice")).toBe(true);
    expect(lastSpan().operation).toBe("is_present");
    expect(lastSpan().attributes["presence.target_client_id"]).toBe("alice");
    expect(lastSpan().span.setAttribute).toHaveBeenCalledWith("presence.result", true);

    expect(await tracker.lastHeartbeat("bob")).toBeNull();
    expect(lastSpan().operation).toBe("last_heartbeat");
    expect(lastSpan().span.setAttribute).toHaveBeenCalledWith("presence.result", false);
  });

  it("records the number of present clients", async () => {
    await tracker.sendHeartbeat();

    expect(await tracker.listPresent()).toEqual(["alice"]);
    expect(lastSpan().operation).toBe("list_present");
    expect(lastSpan().span.setAttribute).toHaveBeenCalledWith("presence.count", 1);
  });

  it("marks failed operations and rethrows", async () => {
    const failure = new Error("bucket unreachable");
    vi.spyOn(MemoryKvBucket.prototype, "get").mockRejectedValueOnce(failure);

    await expect(tracker.isPresent("bob")).rejects.toBeInstanceOf(PresenceCheckError);

    const { span } = lastSpan();
    expect(span.setStatus).toHaveBeenCalledWith({
      code: SpanStatusCode.ERROR,
      message: "Failed to check presence of presence.bob in bucket traced: bucket unreachable",
    });
    expect(span.recordException).toHaveBeenCalledTimes(1);
    expect(span.end).toHaveBeenCalledTimes(1);
  });

  it("traces close", async () => {
    await tracker.close();

    expect(lastSpan().operation).toBe("close");
    expect(tracker.isClosed).toBe(true);
  });
});
