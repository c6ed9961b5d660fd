import type { JsonObject, JsonValue, Timestamp } from "./foundational.js";
import type { ToolError } from "./tool.js";

export type ThinkingStepType =
  | "analysis"
  | "search"
  | "reasoning"
  | "decision"
  | "validation"
  | "action";

/** A step as supplied by the agent, before the tracker numbers it. */
export interface NewThinkingStep {
  readonly type: ThinkingStepType;
  readonly content: string;
  /** In [0, 1]. */
  readonly confidence?: number;
  readonly durationMs?: number;
  /** Present when the step records a failure. */
  readonly error?: string;
}

export interface ThinkingStep extends NewThinkingStep {
  /** 0-based, contiguous among the turn's steps. */
  readonly index: number;
  /** Position in the turn's shared step/tool-call sequence. */
  readonly sequence: number;
  readonly createdAt: Timestamp;
}

export interface NewToolCall {
  readonly toolName: string;
  readonly params: JsonObject;
}

export interface ToolCallRecord extends NewToolCall {
  /** Position in the turn's shared step/tool-call sequence. */
  readonly sequence: number;
  readonly result?: JsonValue;
  readonly error?: ToolError;
  readonly attempts: number;
  readonly startedAt: Timestamp;
  readonly endedAt?: Timestamp;
}

/** One item of a turn's reasoning record, in chronological order. */
export type TurnEntry =
  | { readonly kind: "step"; readonly step: ThinkingStep }
  | { readonly kind: "tool_call"; readonly call: ToolCallRecord };
