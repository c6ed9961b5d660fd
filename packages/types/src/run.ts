import type { RunId, SessionId, TurnId, UserId } from "./foundational.js";
import type { ParleyErrorInfo } from "./error.js";
import type { Turn } from "./session.js";

/**
 * States of one agent run.
 *
 * IDLE → CONTEXT_LOADING → REASONING ⇄ TOOL_CALLING → RESPONDING → FINALIZING → COMPLETED,
 * with ERRORED and CANCELLED reachable from every non-terminal state.
 */
export type RunStateName =
  | "IDLE"
  | "CONTEXT_LOADING"
  | "REASONING"
  | "TOOL_CALLING"
  | "RESPONDING"
  | "FINALIZING"
  | "COMPLETED"
  | "ERRORED"
  | "CANCELLED";

export type RunOutcome =
  | { readonly status: "completed"; readonly userTurn: Turn; readonly agentTurn: Turn }
  | { readonly status: "errored"; readonly error: ParleyErrorInfo }
  | { readonly status: "cancelled"; readonly reason: string };

/** Returned by `submitMessage`; lets the caller observe or cancel the run. */
export interface RunHandle {
  readonly runId: RunId;
  readonly sessionId: SessionId;
  readonly userId: UserId;
  /** Id the agent turn will carry once persisted. */
  readonly turnId: TurnId;
  readonly state: RunStateName;
  /** Resolves when the run reaches a terminal state; never rejects. */
  readonly done: Promise<RunOutcome>;
  /** Requests cooperative cancellation. False if already terminal. */
  cancel(reason?: string): boolean;
}
