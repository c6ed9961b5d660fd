import type { RunId, SessionId } from "@parley/types";

/** Proof of holding a session's lock. `release()` is idempotent. */
export interface SessionLease {
  readonly sessionId: SessionId;
  readonly runId: RunId;
  release(): void;
}

/**
 * One run per session, no queueing. Acquisition is synchronous so two
 * submits in the same tick cannot both win.
 */
export class SessionLockRegistry {
  private readonly held = new Map<SessionId, RunId>();

  /** Returns undefined when another run holds the session. */
  tryAcquire(sessionId: SessionId, runId: RunId): SessionLease | undefined {
    if (this.held.has(sessionId)) return undefined;
    this.held.set(sessionId, runId);

    let released = false;
    return {
      sessionId,
      runId,
      release: () => {
        if (released) return;
        released = true;
        if (this.held.get(sessionId) === runId) {
          this.held.delete(sessionId);
        }
      },
    };
  }

  isLocked(sessionId: SessionId): boolean {
    return this.held.has(sessionId);
  }

  activeRunId(sessionId: SessionId): RunId | undefined {
    return this.held.get(sessionId);
  }

  get size(): number {
    return this.held.size;
  }
}
