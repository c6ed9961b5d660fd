import { z } from "zod";
import type { JsonValue, ToolDescriptor, ToolErrorKind } from "@parley/types";

export interface ToolContext {
  /** Aborted when the gateway gives up on the call. */
  readonly signal: AbortSignal;
}

/**
 * A capability the agent can call. Params are validated against `schema`
 * before `execute` runs.
 */
export interface Tool<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly schema: S;
  /** Parameter name → description, as shown to the model. */
  readonly parameters: Record<string, string>;
  execute(params: z.infer<S>, context: ToolContext): Promise<JsonValue>;
}

/** Thrown by tools for an HTTP failure from their provider. */
export class UpstreamHttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "UpstreamHttpError";
  }
}

/** Thrown by tools that already know how their failure should be classified. */
export class ToolExecutionError extends Error {
  constructor(
    readonly kind: ToolErrorKind,
    message: string,
    readonly retryable = false
  ) {
    super(message);
    this.name = "ToolExecutionError";
  }
}

export function describeTool(tool: Tool): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  };
}
