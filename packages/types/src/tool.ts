import type { JsonValue } from "./foundational.js";

/**
 * Normalized failure categories for every tool provider.
 */
export type ToolErrorKind =
  | "TIMEOUT"          // Provider did not answer within the call timeout
  | "NETWORK"          // Connection-level failure
  | "INVALID_INPUT"    // Params failed the tool's schema
  | "NOT_FOUND"        // Tool name not registered
  | "UPSTREAM_CLIENT"  // Provider answered 4xx
  | "UPSTREAM_SERVER"  // Provider answered 5xx
  | "INTERNAL";        // Anything else thrown by the tool

export interface ToolError {
  readonly kind: ToolErrorKind;
  readonly message: string;
  /** Whether the caller may try the same call again. */
  readonly retryable: boolean;
  /** HTTP status for upstream failures. */
  readonly status?: number;
}

/** Outcome of one gateway invocation. */
export type ToolResult =
  | { readonly ok: true; readonly value: JsonValue; readonly durationMs: number }
  | { readonly ok: false; readonly error: ToolError; readonly durationMs: number };

/** What the model is told about a tool. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  /** Parameter name → human description. */
  readonly parameters: Record<string, string>;
}
