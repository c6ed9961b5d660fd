import type {
  AccessPolicy,
  EventBus,
  ListTurnsOptions,
  RunHandle,
  RunId,
  RunMarker,
  Session,
  SessionId,
  SessionPatch,
  SessionStatistics,
  SessionStore,
  TurnId,
  Turn,
  TurnTrace,
  UserId,
} from "@parley/types";
import {
  InvalidMessageError,
  RunAlreadyInProgressError,
  SessionAccessDeniedError,
  SessionArchivedError,
  SessionNotFoundError,
  TurnNotFoundError,
  createEvent,
  createLogger,
  createTraceContext,
  type AttachOptions,
  type StreamPublisher,
  type SubscriberHandle,
} from "@parley/core";
import { OwnerAccessPolicy } from "./access-policy.js";
import type { RunController } from "./run-controller.js";

const log = createLogger("conversation-service");

export interface ConversationServiceDeps {
  readonly store: SessionStore;
  readonly controller: RunController;
  readonly publisher: StreamPublisher;
  readonly access?: AccessPolicy;
  readonly bus?: EventBus;
}

export interface ConversationServiceOptions {
  /** Longest accepted message after trimming. Default 4000. */
  readonly maxMessageLength?: number;
}

export interface CancelResult {
  readonly acknowledged: boolean;
  readonly runId?: RunId;
}

/**
 * The operations a transport exposes: sessions, messages, streams and
 * cancellation, each checked against the access policy.
 */
export class ConversationService {
  private readonly access: AccessPolicy;
  private readonly maxMessageLength: number;

  constructor(
    private readonly deps: ConversationServiceDeps,
    options: ConversationServiceOptions = {}
  ) {
    this.access = deps.access ?? new OwnerAccessPolicy();
    this.maxMessageLength = options.maxMessageLength ?? 4000;
  }

  // ─── Sessions ─────────────────────────────────────────────────────

  async createSession(userId: UserId, input: { title?: string } = {}): Promise<Session> {
    const session = await this.deps.store.createSession({ ownerId: userId, title: input.title });
    log.info("Session created", { sessionId: session.id, userId });
    return session;
  }

  async listSessions(userId: UserId, options: { includeArchived?: boolean } = {}): Promise<Session[]> {
    return this.deps.store.listSessions(userId, options);
  }

  async getSession(sessionId: SessionId, userId: UserId): Promise<Session> {
    return this.authorize(sessionId, userId);
  }

  async renameSession(sessionId: SessionId, userId: UserId, title: string): Promise<Session> {
    await this.authorize(sessionId, userId);
    const trimmed = title.trim();
    if (!trimmed) throw new InvalidMessageError("Title must not be empty");
    if (trimmed.length > 200) throw new InvalidMessageError("Title must be at most 200 characters");
    return this.update(sessionId, { title: trimmed });
  }

  async archiveSession(sessionId: SessionId, userId: UserId): Promise<Session> {
    await this.authorize(sessionId, userId);
    return this.update(sessionId, { archived: true });
  }

  async unarchiveSession(sessionId: SessionId, userId: UserId): Promise<Session> {
    await this.authorize(sessionId, userId);
    return this.update(sessionId, { archived: false });
  }

  /** Refused while a run is active so a commit cannot land in a deleted session. */
  async deleteSession(sessionId: SessionId, userId: UserId): Promise<void> {
    await this.authorize(sessionId, userId);
    const active = this.deps.controller.activeRun(sessionId);
    if (active) throw new RunAlreadyInProgressError(sessionId, active.runId);
    await this.deps.store.deleteSession(sessionId);
    log.info("Session deleted", { sessionId, userId });
  }

  async getHistory(sessionId: SessionId, userId: UserId, options: ListTurnsOptions = {}): Promise<Turn[]> {
    await this.authorize(sessionId, userId);
    return this.deps.store.listTurns(sessionId, options);
  }

  async getTurnTrace(turnId: TurnId, userId: UserId): Promise<TurnTrace> {
    const trace = await this.deps.store.getTurnTrace(turnId);
    if (!trace) throw new TurnNotFoundError(turnId);
    await this.authorize(trace.turn.sessionId, userId);
    return trace;
  }

  async getStatistics(userId: UserId): Promise<SessionStatistics> {
    return this.deps.store.statistics(userId);
  }

  // ─── Runs ─────────────────────────────────────────────────────────

  /**
   * Validates the message and starts a run. Throws
   * `RunAlreadyInProgressError` when the session is busy.
   */
  async submitMessage(sessionId: SessionId, userId: UserId, text: string): Promise<RunHandle> {
    const message = this.validateMessage(text);
    const session = await this.authorize(sessionId, userId);
    if (session.archived) throw new SessionArchivedError(sessionId);

    const run = this.deps.controller.start({ sessionId, userId, userMessage: message });
    log.info("Run started", { sessionId, userId, runId: run.runId, turnId: run.turnId });
    return run;
  }

  /** Creates a session for a first message and starts its run. Nothing is created for an invalid message. */
  async startConversation(
    userId: UserId,
    text: string,
    input: { title?: string } = {}
  ): Promise<{ session: Session; run: RunHandle }> {
    const message = this.validateMessage(text);
    const session = await this.createSession(userId, input);
    const run = this.deps.controller.start({ sessionId: session.id, userId, userMessage: message });
    log.info("Run started", { sessionId: session.id, userId, runId: run.runId, turnId: run.turnId });
    return { session, run };
  }

  async attachStream(sessionId: SessionId, userId: UserId, options: AttachOptions = {}): Promise<SubscriberHandle> {
    await this.authorize(sessionId, userId);
    return this.deps.publisher.attach(sessionId, options);
  }

  async cancelRun(sessionId: SessionId, userId: UserId, reason?: string): Promise<CancelResult> {
    await this.authorize(sessionId, userId);
    const runId = this.deps.controller.cancel(sessionId, reason);
    return runId ? { acknowledged: true, runId } : { acknowledged: false };
  }

  /**
   * Clears markers left by runs that were in flight when the process died.
   * Their turns were never committed, so there is nothing else to undo.
   */
  async recoverInterruptedRuns(): Promise<RunMarker[]> {
    const markers = await this.deps.store.listRunMarkers();
    for (const marker of markers) {
      log.warn("Run was interrupted by a restart", {
        runId: marker.runId,
        sessionId: marker.sessionId,
        startedAt: marker.startedAt,
      });
      await this.deps.store.clearRunMarker(marker.runId);
    }
    return markers;
  }

  /** Cancels active runs, waits for them, then closes every stream. */
  async shutdown(): Promise<void> {
    const outcomes = await this.deps.controller.shutdown();
    this.deps.publisher.close();
    if (this.deps.bus) {
      await this.deps.bus.publish(
        createEvent("system.shutdown", { cancelledRuns: outcomes.length }, createTraceContext())
      );
    }
    log.info("Conversation service stopped", { cancelledRuns: outcomes.length });
  }

  private validateMessage(text: string): string {
    const message = text.trim();
    if (!message) throw new InvalidMessageError("Message must not be empty");
    if (message.length > this.maxMessageLength) {
      throw new InvalidMessageError(`Message must be at most ${this.maxMessageLength} characters`);
    }
    return message;
  }

  private async authorize(sessionId: SessionId, userId: UserId): Promise<Session> {
    const session = await this.deps.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (!this.access.canAccess(userId, session)) {
      log.warn("Access denied", { sessionId, userId });
      throw new SessionAccessDeniedError(sessionId);
    }
    return session;
  }

  private async update(sessionId: SessionId, patch: SessionPatch): Promise<Session> {
    const updated = await this.deps.store.updateSession(sessionId, patch);
    if (!updated) throw new SessionNotFoundError(sessionId);
    return updated;
  }
}
