/**
 * Error codes for every failure the orchestrator surfaces.
 * Uses a string union so errors can be exhaustively switched on.
 */
export type ParleyErrorCode =
  | "SESSION_NOT_FOUND"        // Referenced session does not exist
  | "SESSION_ACCESS_DENIED"    // Caller does not own the session
  | "SESSION_ARCHIVED"         // Session is archived and read-only
  | "TURN_NOT_FOUND"           // Referenced turn does not exist
  | "INVALID_MESSAGE"          // Inbound text empty or too long
  | "RUN_ALREADY_IN_PROGRESS"  // Session lock already held
  | "TOOL_ERROR"               // Tool failed after the retry budget
  | "TOOL_LOOP_EXCEEDED"       // Reasoning/tool loop bound reached
  | "RUN_TIMEOUT"              // Run wall-clock deadline passed
  | "TURN_CLOSED"              // Append after finalize/abort
  | "CANCELLED"                // Client cancelled the run
  | "MODEL_ERROR"              // Model provider failed
  | "INVALID_TRANSITION"       // Illegal run state transition
  | "CONFIG_ERROR"             // Configuration file invalid
  | "INTERNAL_ERROR";          // Unexpected system failure

/** Serializable form of an error, as carried by `error` stream events. */
export interface ParleyErrorInfo {
  readonly code: ParleyErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}
