import type {
  JsonObject,
  RunId,
  SessionId,
  Timestamp,
  TurnId,
  UserId,
} from "./foundational.js";
import type { ThinkingStep, ToolCallRecord, TurnEntry } from "./thinking.js";

/**
 * One conversation owned by one user.
 */
export interface Session {
  readonly id: SessionId;
  readonly ownerId: UserId;
  readonly title: string;
  readonly archived: boolean;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
  /** Tool-relevant state carried across turns, e.g. `lastLocation`. */
  readonly context: JsonObject;
}

export type TurnRole = "user" | "agent" | "system";

/** Optional structured data attached to a turn. */
export interface TurnMetadata {
  readonly confidence?: number;
  /** Tool names invoked while producing the turn, in call order. */
  readonly tools?: string[];
  readonly model?: string;
  /** Set when a tool failed and the answer was produced without its result. */
  readonly degraded?: boolean;
}

/**
 * A persisted message. Immutable once written; ordinals are gapless per session.
 */
export interface Turn {
  readonly id: TurnId;
  readonly sessionId: SessionId;
  readonly role: TurnRole;
  readonly content: string;
  readonly ordinal: number;
  readonly createdAt: Timestamp;
  readonly metadata?: TurnMetadata;
}

/**
 * Everything a finished run writes, committed as one unit.
 */
export interface ExchangeCommit {
  readonly sessionId: SessionId;
  readonly runId: RunId;
  readonly userMessage: string;
  readonly agentTurn: {
    readonly id: TurnId;
    readonly content: string;
    readonly metadata?: TurnMetadata;
  };
  readonly steps: ReadonlyArray<ThinkingStep>;
  readonly toolCalls: ReadonlyArray<ToolCallRecord>;
  /** Shallow-merged into the session context. */
  readonly contextPatch?: JsonObject;
}

export interface CommittedExchange {
  readonly userTurn: Turn;
  readonly agentTurn: Turn;
}

/** A persisted agent turn together with its interleaved reasoning record. */
export interface TurnTrace {
  readonly turn: Turn;
  readonly steps: ThinkingStep[];
  readonly toolCalls: ToolCallRecord[];
  /** Steps and tool calls merged in the order they were produced. */
  readonly entries: TurnEntry[];
}

/** Written when a run starts, removed when it ends. Survivors mean a crash. */
export interface RunMarker {
  readonly runId: RunId;
  readonly sessionId: SessionId;
  readonly startedAt: Timestamp;
}

export interface SessionStatistics {
  readonly totalSessions: number;
  readonly activeSessions: number;
  readonly archivedSessions: number;
  readonly totalTurns: number;
}

export interface ListTurnsOptions {
  /** Only turns with an ordinal below this one. */
  readonly beforeOrdinal?: number;
  /** Return at most this many of the newest matching turns. */
  readonly limit?: number;
}

export interface NewSession {
  readonly ownerId: UserId;
  readonly title?: string;
  readonly context?: JsonObject;
}

export type SessionPatch = Partial<Pick<Session, "title" | "archived" | "context">>;

/**
 * Durable storage for sessions, turns, thinking steps and tool calls.
 */
export interface SessionStore {
  createSession(input: NewSession): Promise<Session>;
  getSession(id: SessionId): Promise<Session | undefined>;
  listSessions(ownerId: UserId, options?: { includeArchived?: boolean }): Promise<Session[]>;
  updateSession(id: SessionId, patch: SessionPatch): Promise<Session | undefined>;
  /** Cascades to turns, steps and tool calls. Returns false when absent. */
  deleteSession(id: SessionId): Promise<boolean>;

  /** Turns oldest first. */
  listTurns(sessionId: SessionId, options?: ListTurnsOptions): Promise<Turn[]>;
  /** Highest persisted ordinal, 0 for an empty session. */
  latestOrdinal(sessionId: SessionId): Promise<number>;
  getTurnTrace(turnId: TurnId): Promise<TurnTrace | undefined>;

  /** Atomically persists a user turn, agent turn, steps and tool calls. */
  commitExchange(commit: ExchangeCommit): Promise<CommittedExchange>;

  markRunStarted(marker: RunMarker): Promise<void>;
  clearRunMarker(runId: RunId): Promise<void>;
  listRunMarkers(): Promise<RunMarker[]>;

  statistics(ownerId: UserId): Promise<SessionStatistics>;
}
