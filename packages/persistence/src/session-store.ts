import Database from "better-sqlite3";
import { v7 as uuidv7 } from "uuid";
import type {
  CommittedExchange,
  EventBus,
  EventTopic,
  ExchangeCommit,
  JsonObject,
  ListTurnsOptions,
  NewSession,
  RunId,
  RunMarker,
  Session,
  SessionId,
  SessionPatch,
  SessionStatistics,
  SessionStore,
  ThinkingStep,
  ThinkingStepType,
  ToolCallRecord,
  Turn,
  TurnEntry,
  TurnId,
  TurnRole,
  TurnTrace,
  UserId,
} from "@parley/types";
import {
  SessionNotFoundError,
  createEvent,
  createLogger,
  createTraceContext,
} from "@parley/core";

const log = createLogger("session-store");

export const DEFAULT_SESSION_TITLE = "New Conversation";

export interface SQLiteSessionStoreOptions {
  /** Receives `turn.persisted` and `session.*` events after each write commits. */
  readonly bus?: EventBus;
}

/**
 * SQLite-backed implementation of SessionStore.
 *
 * Turns, thinking steps and tool calls hang off their session with
 * `ON DELETE CASCADE`. A finished exchange is written in one transaction, so
 * a crash mid-write leaves either the whole exchange or none of it.
 */
export class SQLiteSessionStore implements SessionStore {
  private db: Database.Database;
  private readonly bus?: EventBus;

  constructor(dbPath: string, options: SQLiteSessionStoreOptions = {}) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.bus = options.bus;
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id          TEXT PRIMARY KEY,
        owner_id    TEXT NOT NULL,
        title       TEXT NOT NULL,
        archived    INTEGER NOT NULL DEFAULT 0,
        context     TEXT NOT NULL DEFAULT '{}',
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_owner
        ON sessions(owner_id, updated_at);

      CREATE TABLE IF NOT EXISTS turns (
        id          TEXT PRIMARY KEY,
        session_id  TEXT NOT NULL,
        role        TEXT NOT NULL,
        content     TEXT NOT NULL,
        ordinal     INTEGER NOT NULL,
        metadata    TEXT,
        created_at  TEXT NOT NULL,
        UNIQUE (session_id, ordinal),
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS thinking_steps (
        turn_id     TEXT NOT NULL,
        step_index  INTEGER NOT NULL,
        sequence    INTEGER NOT NULL,
        type        TEXT NOT NULL,
        content     TEXT NOT NULL,
        confidence  REAL,
        duration_ms INTEGER,
        error       TEXT,
        created_at  TEXT NOT NULL,
        PRIMARY KEY (turn_id, step_index),
        FOREIGN KEY (turn_id) REFERENCES turns(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS tool_calls (
        turn_id     TEXT NOT NULL,
        sequence    INTEGER NOT NULL,
        tool_name   TEXT NOT NULL,
        params      TEXT NOT NULL,
        result      TEXT,
        error       TEXT,
        attempts    INTEGER NOT NULL,
        started_at  TEXT NOT NULL,
        ended_at    TEXT,
        PRIMARY KEY (turn_id, sequence),
        FOREIGN KEY (turn_id) REFERENCES turns(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS run_markers (
        run_id      TEXT PRIMARY KEY,
        session_id  TEXT NOT NULL,
        started_at  TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );
    `);
  }

  async createSession(input: NewSession): Promise<Session> {
    const id = uuidv7() as SessionId;
    const now = new Date().toISOString();
    const session: Session = {
      id,
      ownerId: input.ownerId,
      title: input.title?.trim() || DEFAULT_SESSION_TITLE,
      archived: false,
      createdAt: now,
      updatedAt: now,
      context: input.context ?? {},
    };

    this.db.prepare(`
      INSERT INTO sessions (id, owner_id, title, archived, context, created_at, updated_at)
      VALUES (?, ?, ?, 0, ?, ?, ?)
    `).run(id, session.ownerId, session.title, JSON.stringify(session.context), now, now);

    await this.emit("session.created", id, { ownerId: session.ownerId });
    return session;
  }

  async getSession(id: SessionId): Promise<Session | undefined> {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?")
      .get(id);
    return row ? toSession(row) : undefined;
  }

  async listSessions(
    ownerId: UserId,
    options: { includeArchived?: boolean } = {}
  ): Promise<Session[]> {
    const rows = this.db
      .prepare<[string, number], SessionRow>(`
        SELECT * FROM sessions
        WHERE owner_id = ? AND (archived = 0 OR ? = 1)
        ORDER BY updated_at DESC, id DESC
      `)
      .all(ownerId, options.includeArchived ? 1 : 0);
    return rows.map(toSession);
  }

  async updateSession(id: SessionId, patch: SessionPatch): Promise<Session | undefined> {
    const current = await this.getSession(id);
    if (!current) return undefined;

    const next: Session = {
      ...current,
      title: patch.title?.trim() || current.title,
      archived: patch.archived ?? current.archived,
      context: patch.context ?? current.context,
      updatedAt: new Date().toISOString(),
    };

    this.db.prepare(`
      UPDATE sessions SET title = ?, archived = ?, context = ?, updated_at = ? WHERE id = ?
    `).run(next.title, next.archived ? 1 : 0, JSON.stringify(next.context), next.updatedAt, id);

    await this.emit("session.updated", id, { archived: next.archived });
    return next;
  }

  async deleteSession(id: SessionId): Promise<boolean> {
    const { changes } = this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
    if (changes === 0) return false;
    await this.emit("session.deleted", id, {});
    return true;
  }

  async listTurns(sessionId: SessionId, options: ListTurnsOptions = {}): Promise<Turn[]> {
    const rows = this.db
      .prepare<[string, number, number], TurnRow>(`
        SELECT * FROM turns
        WHERE session_id = ? AND ordinal < ?
        ORDER BY ordinal DESC
        LIMIT ?
      `)
      .all(
        sessionId,
        options.beforeOrdinal ?? Number.MAX_SAFE_INTEGER,
        options.limit ?? -1
      );
    return rows.reverse().map(toTurn);
  }

  async latestOrdinal(sessionId: SessionId): Promise<number> {
    return this.maxOrdinal(sessionId);
  }

  async getTurnTrace(turnId: TurnId): Promise<TurnTrace | undefined> {
    const row = this.db
      .prepare<[string], TurnRow>("SELECT * FROM turns WHERE id = ?")
      .get(turnId);
    if (!row) return undefined;

    const steps = this.db
      .prepare<[string], StepRow>(
        "SELECT * FROM thinking_steps WHERE turn_id = ? ORDER BY step_index ASC"
      )
      .all(turnId)
      .map(toStep);
    const toolCalls = this.db
      .prepare<[string], ToolCallRow>(
        "SELECT * FROM tool_calls WHERE turn_id = ? ORDER BY sequence ASC"
      )
      .all(turnId)
      .map(toToolCall);

    const entries: TurnEntry[] = [
      ...steps.map((step): TurnEntry => ({ kind: "step", step })),
      ...toolCalls.map((call): TurnEntry => ({ kind: "tool_call", call })),
    ].sort((a, b) => entrySequence(a) - entrySequence(b));

    return { turn: toTurn(row), steps, toolCalls, entries };
  }

  async commitExchange(commit: ExchangeCommit): Promise<CommittedExchange> {
    const write = this.db.transaction((input: ExchangeCommit): CommittedExchange => {
      const session = this.db
        .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?")
        .get(input.sessionId);
      if (!session) throw new SessionNotFoundError(input.sessionId);

      const now = new Date().toISOString();
      const ordinal = this.maxOrdinal(input.sessionId) + 1;

      const userTurn: Turn = {
        id: uuidv7() as TurnId,
        sessionId: input.sessionId,
        role: "user",
        content: input.userMessage,
        ordinal,
        createdAt: now,
      };
      const agentTurn: Turn = {
        id: input.agentTurn.id,
        sessionId: input.sessionId,
        role: "agent",
        content: input.agentTurn.content,
        ordinal: ordinal + 1,
        createdAt: now,
        metadata: input.agentTurn.metadata,
      };

      const insertTurn = this.db.prepare(`
        INSERT INTO turns (id, session_id, role, content, ordinal, metadata, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      for (const turn of [userTurn, agentTurn]) {
        insertTurn.run(
          turn.id,
          turn.sessionId,
          turn.role,
          turn.content,
          turn.ordinal,
          turn.metadata ? JSON.stringify(turn.metadata) : null,
          turn.createdAt
        );
      }

      const insertStep = this.db.prepare(`
        INSERT INTO thinking_steps
          (turn_id, step_index, sequence, type, content, confidence, duration_ms, error, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const step of input.steps) {
        insertStep.run(
          agentTurn.id,
          step.index,
          step.sequence,
          step.type,
          step.content,
          step.confidence ?? null,
          step.durationMs ?? null,
          step.error ?? null,
          step.createdAt
        );
      }

      const insertCall = this.db.prepare(`
        INSERT INTO tool_calls
          (turn_id, sequence, tool_name, params, result, error, attempts, started_at, ended_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const call of input.toolCalls) {
        insertCall.run(
          agentTurn.id,
          call.sequence,
          call.toolName,
          JSON.stringify(call.params),
          call.result === undefined ? null : JSON.stringify(call.result),
          call.error ? JSON.stringify(call.error) : null,
          call.attempts,
          call.startedAt,
          call.endedAt ?? null
        );
      }

      const context: JsonObject = input.contextPatch
        ? { ...parseObject(session.context), ...input.contextPatch }
        : parseObject(session.context);
      this.db
        .prepare("UPDATE sessions SET context = ?, updated_at = ? WHERE id = ?")
        .run(JSON.stringify(context), now, input.sessionId);

      return { userTurn, agentTurn };
    });

    const committed = write(commit);
    log.debug("Exchange committed", {
      sessionId: commit.sessionId,
      runId: commit.runId,
      ordinal: committed.agentTurn.ordinal,
      steps: commit.steps.length,
      toolCalls: commit.toolCalls.length,
    });
    await this.emit("turn.persisted", commit.sessionId, {
      turnIds: [committed.userTurn.id, committed.agentTurn.id],
      latestOrdinal: committed.agentTurn.ordinal,
    });
    return committed;
  }

  async markRunStarted(marker: RunMarker): Promise<void> {
    this.db
      .prepare("INSERT OR REPLACE INTO run_markers (run_id, session_id, started_at) VALUES (?, ?, ?)")
      .run(marker.runId, marker.sessionId, marker.startedAt);
  }

  async clearRunMarker(runId: RunId): Promise<void> {
    this.db.prepare("DELETE FROM run_markers WHERE run_id = ?").run(runId);
  }

  async listRunMarkers(): Promise<RunMarker[]> {
    return this.db
      .prepare<[], MarkerRow>("SELECT * FROM run_markers ORDER BY started_at ASC")
      .all()
      .map((row) => ({
        runId: row.run_id as RunId,
        sessionId: row.session_id as SessionId,
        startedAt: row.started_at,
      }));
  }

  async statistics(ownerId: UserId): Promise<SessionStatistics> {
    const sessions = this.db
      .prepare<[string], { total: number; archived: number | null }>(`
        SELECT COUNT(*) AS total, SUM(archived) AS archived
        FROM sessions WHERE owner_id = ?
      `)
      .get(ownerId);
    const turns = this.db
      .prepare<[string], { total: number }>(`
        SELECT COUNT(*) AS total FROM turns t
        JOIN sessions s ON s.id = t.session_id
        WHERE s.owner_id = ?
      `)
      .get(ownerId);

    const totalSessions = sessions?.total ?? 0;
    const archivedSessions = sessions?.archived ?? 0;
    return {
      totalSessions,
      activeSessions: totalSessions - archivedSessions,
      archivedSessions,
      totalTurns: turns?.total ?? 0,
    };
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }

  private maxOrdinal(sessionId: SessionId): number {
    const row = this.db
      .prepare<[string], { latest: number | null }>(
        "SELECT MAX(ordinal) AS latest FROM turns WHERE session_id = ?"
      )
      .get(sessionId);
    return row?.latest ?? 0;
  }

  private async emit(
    topic: EventTopic,
    sessionId: SessionId,
    payload: Record<string, unknown>
  ): Promise<void> {
    if (!this.bus) return;
    await this.bus.publish(createEvent(topic, payload, createTraceContext(), sessionId));
  }
}

// ─── Internal row types ─────────────────────────────────────────────

interface SessionRow {
  id: string;
  owner_id: string;
  title: string;
  archived: number;
  context: string;
  created_at: string;
  updated_at: string;
}

interface TurnRow {
  id: string;
  session_id: string;
  role: string;
  content: string;
  ordinal: number;
  metadata: string | null;
  created_at: string;
}

interface StepRow {
  turn_id: string;
  step_index: number;
  sequence: number;
  type: string;
  content: string;
  confidence: number | null;
  duration_ms: number | null;
  error: string | null;
  created_at: string;
}

interface ToolCallRow {
  turn_id: string;
  sequence: number;
  tool_name: string;
  params: string;
  result: string | null;
  error: string | null;
  attempts: number;
  started_at: string;
  ended_at: string | null;
}

interface MarkerRow {
  run_id: string;
  session_id: string;
  started_at: string;
}

const TURN_ROLES: readonly TurnRole[] = ["user", "agent", "system"];
const STEP_TYPES: readonly ThinkingStepType[] = [
  "analysis",
  "search",
  "reasoning",
  "decision",
  "validation",
  "action",
];

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new Error(`Unexpected ${column} value in database: ${value}`);
  return match;
}

function parseObject(text: string): JsonObject {
  const parsed = JSON.parse(text);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? parsed : {};
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id as SessionId,
    ownerId: row.owner_id as UserId,
    title: row.title,
    archived: row.archived === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    context: parseObject(row.context),
  };
}

function toTurn(row: TurnRow): Turn {
  return {
    id: row.id as TurnId,
    sessionId: row.session_id as SessionId,
    role: oneOf(TURN_ROLES, row.role, "role"),
    content: row.content,
    ordinal: row.ordinal,
    createdAt: row.created_at,
    metadata: row.metadata ? JSON.parse(row.metadata) : undefined,
  };
}

function toStep(row: StepRow): ThinkingStep {
  return {
    index: row.step_index,
    sequence: row.sequence,
    type: oneOf(STEP_TYPES, row.type, "step type"),
    content: row.content,
    confidence: row.confidence ?? undefined,
    durationMs: row.duration_ms ?? undefined,
    error: row.error ?? undefined,
    createdAt: row.created_at,
  };
}

function toToolCall(row: ToolCallRow): ToolCallRecord {
  return {
    sequence: row.sequence,
    toolName: row.tool_name,
    params: parseObject(row.params),
    result: row.result === null ? undefined : JSON.parse(row.result),
    error: row.error === null ? undefined : JSON.parse(row.error),
    attempts: row.attempts,
    startedAt: row.started_at,
    endedAt: row.ended_at ?? undefined,
  };
}

function entrySequence(entry: TurnEntry): number {
  return entry.kind === "step" ? entry.step.sequence : entry.call.sequence;
}
