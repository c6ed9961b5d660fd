import type {
  JsonObject,
  JsonValue,
  RunId,
  SessionId,
  Timestamp,
  TurnId,
} from "./foundational.js";
import type { ParleyErrorInfo } from "./error.js";
import type { ThinkingStep } from "./thinking.js";
import type { ToolError } from "./tool.js";

/** Payload carried by each kind of run event. */
export interface RunEventPayloads {
  thinking: ThinkingStep;
  tool_call: {
    readonly sequence: number;
    readonly toolName: string;
    readonly params: JsonObject;
  };
  tool_result: {
    readonly sequence: number;
    readonly toolName: string;
    readonly ok: boolean;
    readonly result?: JsonValue;
    readonly error?: ToolError;
    readonly attempts: number;
  };
  content_chunk: {
    readonly index: number;
    readonly text: string;
  };
  error: ParleyErrorInfo;
  done: {
    readonly turnId: TurnId;
    readonly ordinal: number;
    readonly content: string;
  };
  cancelled: {
    readonly reason: string;
  };
}

export type RunEventKind = keyof RunEventPayloads;

/** Kinds after which a run emits nothing more. */
export type TerminalEventKind = "done" | "error" | "cancelled";

interface StreamEventBase {
  /** Per-run, gapless, starting at 0. */
  readonly sequence: number;
  readonly sessionId: SessionId;
  readonly timestamp: Timestamp;
}

export type RunStreamEvent = {
  [K in RunEventKind]: StreamEventBase & {
    readonly kind: K;
    readonly runId: RunId;
    readonly turnId: TurnId;
    readonly payload: RunEventPayloads[K];
  };
}[RunEventKind];

/** What a producer hands the publisher; sequence and ids are stamped on. */
export type RunEventInput = {
  [K in RunEventKind]: {
    readonly kind: K;
    readonly payload: RunEventPayloads[K];
  };
}[RunEventKind];

export interface ResyncPayload {
  readonly reason: "gap_exceeded" | "run_expired" | "run_mismatch";
  readonly lastSeenSequence?: number;
  /** Oldest sequence still buffered, when a run is known. */
  readonly oldestRetained?: number;
}

/**
 * Tells a reconnecting client to re-fetch the turn from the store instead of
 * replaying. `sequence` is the newest sequence published so far, or -1.
 */
export interface ResyncEvent extends StreamEventBase {
  readonly kind: "resync";
  readonly runId?: RunId;
  readonly turnId?: TurnId;
  readonly payload: ResyncPayload;
}

export type StreamEvent = RunStreamEvent | ResyncEvent;
export type StreamEventKind = StreamEvent["kind"];
