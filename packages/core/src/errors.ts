import type {
  ParleyErrorCode,
  ParleyErrorInfo,
  RunStateName,
  SessionId,
  ToolError,
} from "@parley/types";

/**
 * Base class for all errors the orchestrator raises on purpose.
 */
export class ParleyError extends Error {
  readonly code: ParleyErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ParleyErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
  }

  toInfo(): ParleyErrorInfo {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class SessionNotFoundError extends ParleyError {
  constructor(readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session ${sessionId} not found`, { details: { sessionId } });
  }
}

export class SessionAccessDeniedError extends ParleyError {
  constructor(sessionId: SessionId) {
    super("SESSION_ACCESS_DENIED", `Not allowed to access session ${sessionId}`, {
      details: { sessionId },
    });
  }
}

export class SessionArchivedError extends ParleyError {
  constructor(sessionId: SessionId) {
    super("SESSION_ARCHIVED", `Session ${sessionId} is archived`, { details: { sessionId } });
  }
}

export class TurnNotFoundError extends ParleyError {
  constructor(turnId: string) {
    super("TURN_NOT_FOUND", `Turn ${turnId} not found`, { details: { turnId } });
  }
}

export class InvalidMessageError extends ParleyError {
  constructor(reason: string) {
    super("INVALID_MESSAGE", reason);
  }
}

export class RunAlreadyInProgressError extends ParleyError {
  constructor(readonly sessionId: SessionId, readonly activeRunId?: string) {
    super("RUN_ALREADY_IN_PROGRESS", `A run is already in progress for session ${sessionId}`, {
      details: { sessionId, activeRunId },
    });
  }
}

/** A tool failed and the run could not continue without it. */
export class ToolInvocationError extends ParleyError {
  constructor(readonly toolName: string, readonly toolError: ToolError) {
    super("TOOL_ERROR", `Tool ${toolName} failed: ${toolError.message}`, {
      details: {
        toolName,
        kind: toolError.kind,
        retryable: toolError.retryable,
        status: toolError.status,
      },
    });
  }
}

export class ToolLoopExceededError extends ParleyError {
  constructor(limit: number) {
    super("TOOL_LOOP_EXCEEDED", `Agent requested tools more than ${limit} times`, {
      details: { limit },
    });
  }
}

export class RunTimeoutError extends ParleyError {
  constructor(timeoutMs: number) {
    super("RUN_TIMEOUT", `Run did not start responding within ${timeoutMs}ms`, {
      details: { timeoutMs },
    });
  }
}

export class TurnClosedError extends ParleyError {
  constructor(turnId: string, state: string) {
    super("TURN_CLOSED", `Turn ${turnId} is already ${state}`, { details: { turnId, state } });
  }
}

export class CancelledError extends ParleyError {
  constructor(readonly reason: string) {
    super("CANCELLED", `Run cancelled: ${reason}`, { details: { reason } });
  }
}

export class ModelError extends ParleyError {
  constructor(message: string, cause?: unknown) {
    super("MODEL_ERROR", message, { cause });
  }
}

export class InvalidTransitionError extends ParleyError {
  constructor(from: RunStateName, to: RunStateName) {
    super("INVALID_TRANSITION", `Illegal run transition ${from} → ${to}`, {
      details: { from, to },
    });
  }
}

export class ConfigError extends ParleyError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG_ERROR", message, { cause });
  }
}

export function isParleyError(err: unknown): err is ParleyError {
  return err instanceof ParleyError;
}

/** Wraps anything thrown into the wire-safe error shape. */
export function toErrorInfo(err: unknown): ParleyErrorInfo {
  if (isParleyError(err)) return err.toInfo();
  const message = err instanceof Error ? err.message : String(err);
  return { code: "INTERNAL_ERROR", message };
}
