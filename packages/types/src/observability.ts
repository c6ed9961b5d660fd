import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every bus event and run. Lets a run's model calls, tool calls
 * and persistence writes be correlated in logs.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per inbound user message. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly message: string;
  /** Emitting component, e.g. "run-controller". */
  readonly component: string;
  readonly traceCtx?: TraceContext;
  readonly data?: Record<string, unknown>;
}
