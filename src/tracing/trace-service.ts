/**
 * Trace Service
 *
 * Thin layer over the OpenTelemetry API for presence operations. Without a
 * registered tracer provider every span is a no-op, so instrumented code
 * costs nothing until the application wires up an SDK.
 */

import {
  context,
  trace,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { PresenceOperation, PresenceSpanAttributes } from "./types";

export const DEFAULT_TRACER_NAME = "kv-presence";

export class TraceService {
  private readonly tracer: Tracer;

  constructor(tracerName = DEFAULT_TRACER_NAME) {
    this.tracer = trace.getTracer(tracerName);
  }

  /**
   * Create a new span for a presence operation
   */
  createPresenceSpan(
    operation: PresenceOperation,
    attributes: Partial<PresenceSpanAttributes> = {}
  ): Span {
    return this.tracer.startSpan(`presence.${operation}`, {
      kind: SpanKind.CLIENT,
      attributes: {
        ...attributes,
        "presence.operation": operation,
      },
    });
  }

  /**
   * Execute a function within a span context; the span is ended on every path
   */
  async withSpan<T>(span: Span, fn: (span: Span) => Promise<T> | T): Promise<T> {
    const ctx = trace.setSpan(context.active(), span);

    return context.with(ctx, async () => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : "Unknown error",
        });
        span.recordException(error instanceof Error ? error : String(error));
        throw error;
      } finally {
        span.end();
      }
    });
  }

  async tracePresenceOperation<T>(
    operation: PresenceOperation,
    attributes: Partial<PresenceSpanAttributes>,
    fn: (span: Span) => Promise<T> | T
  ): Promise<T> {
    const span = this.createPresenceSpan(operation, attributes);
    return this.withSpan(span, fn);
  }

  addEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
    trace.getActiveSpan()?.addEvent(name, attributes);
  }
}
