import type {
  CommittedExchange,
  JsonObject,
  JsonValue,
  NewThinkingStep,
  NewToolCall,
  RunId,
  SessionId,
  SessionStore,
  ThinkingStep,
  ToolCallRecord,
  ToolError,
  TurnId,
  TurnMetadata,
} from "@parley/types";
import { TurnClosedError, createLogger, type StreamPublisher } from "@parley/core";

const log = createLogger("thinking-tracker");

/** Identifies one agent turn under construction. */
export interface TurnHandle {
  readonly turnId: TurnId;
  readonly sessionId: SessionId;
  readonly runId: RunId;
}

export type ToolCallOutcome =
  | { readonly ok: true; readonly value: JsonValue }
  | { readonly ok: false; readonly error: ToolError };

export interface FinalizeOptions {
  readonly metadata?: TurnMetadata;
  readonly contextPatch?: JsonObject;
}

interface OpenTurn extends TurnHandle {
  readonly userMessage: string;
  readonly steps: ThinkingStep[];
  readonly calls: Map<number, ToolCallRecord>;
  nextSequence: number;
}

/**
 * Collects a turn's thinking steps and tool calls in order, pushing each one
 * to the stream as it happens, and persists the lot on finalize.
 *
 * Steps and tool calls share one per-turn sequence counter so the record can
 * be replayed in the order it was produced.
 */
export class ThinkingTracker {
  private readonly open = new Map<TurnId, OpenTurn>();

  constructor(
    private readonly store: SessionStore,
    private readonly publisher: StreamPublisher
  ) {}

  openTurn(
    sessionId: SessionId,
    input: { runId: RunId; turnId: TurnId; userMessage: string }
  ): TurnHandle {
    const turn: OpenTurn = {
      turnId: input.turnId,
      sessionId,
      runId: input.runId,
      userMessage: input.userMessage,
      steps: [],
      calls: new Map(),
      nextSequence: 0,
    };
    this.open.set(turn.turnId, turn);
    return { turnId: turn.turnId, sessionId, runId: turn.runId };
  }

  /** Returns the step's 0-based index. */
  appendStep(handle: TurnHandle, input: NewThinkingStep): number {
    const turn = this.require(handle);
    if (input.confidence !== undefined && !(input.confidence >= 0 && input.confidence <= 1)) {
      throw new RangeError(`Step confidence must be within [0, 1], got ${input.confidence}`);
    }

    const step: ThinkingStep = {
      ...input,
      index: turn.steps.length,
      sequence: turn.nextSequence++,
      createdAt: new Date().toISOString(),
    };
    turn.steps.push(step);
    this.publisher.publish(turn.sessionId, { kind: "thinking", payload: step });
    return step.index;
  }

  /** Returns the call's position in the turn's shared sequence. */
  appendToolCall(handle: TurnHandle, input: NewToolCall): number {
    const turn = this.require(handle);
    const record: ToolCallRecord = {
      toolName: input.toolName,
      params: input.params,
      sequence: turn.nextSequence++,
      attempts: 0,
      startedAt: new Date().toISOString(),
    };
    turn.calls.set(record.sequence, record);
    this.publisher.publish(turn.sessionId, {
      kind: "tool_call",
      payload: { sequence: record.sequence, toolName: record.toolName, params: record.params },
    });
    return record.sequence;
  }

  completeToolCall(
    handle: TurnHandle,
    sequence: number,
    outcome: ToolCallOutcome,
    attempts: number
  ): void {
    const turn = this.require(handle);
    const started = turn.calls.get(sequence);
    if (!started) throw new RangeError(`No tool call at sequence ${sequence}`);
    if (started.endedAt !== undefined) {
      throw new RangeError(`Tool call at sequence ${sequence} already completed`);
    }

    const record: ToolCallRecord = {
      ...started,
      attempts,
      endedAt: new Date().toISOString(),
      ...(outcome.ok ? { result: outcome.value } : { error: outcome.error }),
    };
    turn.calls.set(sequence, record);
    this.publisher.publish(turn.sessionId, {
      kind: "tool_result",
      payload: {
        sequence,
        toolName: record.toolName,
        ok: outcome.ok,
        result: record.result,
        error: record.error,
        attempts,
      },
    });
  }

  /**
   * Persists the user message, the agent turn and its record in one unit.
   * The turn is closed from this point on, whether or not the write succeeds.
   */
  async finalize(
    handle: TurnHandle,
    content: string,
    options: FinalizeOptions = {}
  ): Promise<CommittedExchange> {
    const turn = this.require(handle);
    this.open.delete(turn.turnId);

    return this.store.commitExchange({
      sessionId: turn.sessionId,
      runId: turn.runId,
      userMessage: turn.userMessage,
      agentTurn: { id: turn.turnId, content, metadata: options.metadata },
      steps: turn.steps,
      toolCalls: [...turn.calls.values()],
      contextPatch: options.contextPatch,
    });
  }

  /** Discards the turn; nothing is persisted. Returns false when it was already closed. */
  abort(handle: TurnHandle, reason: string): boolean {
    const turn = this.open.get(handle.turnId);
    if (!turn) return false;
    this.open.delete(handle.turnId);
    log.debug("Turn aborted", {
      turnId: turn.turnId,
      runId: turn.runId,
      reason,
      steps: turn.steps.length,
      toolCalls: turn.calls.size,
    });
    return true;
  }

  isOpen(handle: TurnHandle): boolean {
    return this.open.has(handle.turnId);
  }

  private require(handle: TurnHandle): OpenTurn {
    const turn = this.open.get(handle.turnId);
    if (!turn) throw new TurnClosedError(handle.turnId, "closed");
    return turn;
  }
}

