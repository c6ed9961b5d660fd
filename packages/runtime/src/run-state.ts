import type { RunStateName } from "@parley/types";
import { InvalidTransitionError } from "@parley/core";

const TRANSITIONS: Record<RunStateName, readonly RunStateName[]> = {
  IDLE: ["CONTEXT_LOADING", "ERRORED", "CANCELLED"],
  CONTEXT_LOADING: ["REASONING", "ERRORED", "CANCELLED"],
  REASONING: ["TOOL_CALLING", "RESPONDING", "ERRORED", "CANCELLED"],
  TOOL_CALLING: ["REASONING", "ERRORED", "CANCELLED"],
  RESPONDING: ["FINALIZING", "ERRORED", "CANCELLED"],
  FINALIZING: ["COMPLETED", "ERRORED", "CANCELLED"],
  COMPLETED: [],
  ERRORED: [],
  CANCELLED: [],
};

export function isTerminalState(state: RunStateName): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: RunStateName, to: RunStateName): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Lifecycle of one run. Illegal moves throw `InvalidTransitionError`. */
export class RunStateMachine {
  private current: RunStateName = "IDLE";
  private readonly visited: RunStateName[] = ["IDLE"];

  get state(): RunStateName {
    return this.current;
  }

  /** Every state entered so far, starting with IDLE. */
  get history(): readonly RunStateName[] {
    return this.visited;
  }

  get terminal(): boolean {
    return isTerminalState(this.current);
  }

  transition(to: RunStateName): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
