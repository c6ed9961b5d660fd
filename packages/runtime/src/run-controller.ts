import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  EventTopic,
  JsonObject,
  RunHandle,
  RunId,
  RunOutcome,
  RunStateName,
  SessionId,
  SessionStore,
  ToolResult,
  TraceContext,
  Turn,
  TurnId,
  TurnMetadata,
  UserId,
} from "@parley/types";
import {
  CancelledError,
  ModelError,
  RunAlreadyInProgressError,
  RunTimeoutError,
  SessionNotFoundError,
  ToolInvocationError,
  ToolLoopExceededError,
  createEvent,
  createLogger,
  createTraceContext,
  isParleyError,
  toErrorInfo,
  type Logger,
  type SessionLease,
  type SessionLockRegistry,
  type StreamPublisher,
} from "@parley/core";
import type { ToolGateway } from "@parley/tools";
import { chunkText } from "./chunking.js";
import type { ContextWindowManager } from "./context-window.js";
import type { ChatMessage, ModelAdapter, ModelToolCall } from "./model-adapter.js";
import { buildSystemPrompt, toChatMessages } from "./prompt-builder.js";
import { RunStateMachine } from "./run-state.js";
import type { ThinkingTracker, TurnHandle } from "./thinking-tracker.js";

export type ToolErrorPolicy = "fail" | "degrade";

export interface RunControllerDeps {
  readonly store: SessionStore;
  readonly tracker: ThinkingTracker;
  readonly contextWindow: ContextWindowManager;
  readonly gateway: ToolGateway;
  readonly model: ModelAdapter;
  readonly publisher: StreamPublisher;
  readonly locks: SessionLockRegistry;
  readonly bus?: EventBus;
}

export interface RunControllerOptions {
  /** Deadline from start until the answer begins streaming. Default 90 000. */
  readonly timeoutMs?: number;
  /** REASONING → TOOL_CALLING round trips allowed per run. Default 6. */
  readonly maxToolIterations?: number;
  /** Extra attempts for a retryable tool failure. Default 1. */
  readonly toolRetries?: number;
  readonly onToolError?: ToolErrorPolicy;
  /** Per-call tool timeout; the gateway's default when absent. */
  readonly toolTimeoutMs?: number;
  readonly chunkSize?: number;
}

export interface StartRunInput {
  readonly sessionId: SessionId;
  readonly userId: UserId;
  /** Already validated and trimmed. */
  readonly userMessage: string;
  readonly traceCtx?: TraceContext;
}

/** Tool name whose successful result updates `lastLocation` in the session context. */
const LOCATION_TOOL = "weather_query";

const TIMED_OUT = Symbol("timed-out");

/**
 * Drives agent runs: one at a time per session, each through the
 * IDLE → … → COMPLETED state machine, with every step streamed as it happens.
 */
export class RunController {
  private readonly active = new Map<SessionId, AgentRun>();
  private readonly settings: RunSettings;

  constructor(
    private readonly deps: RunControllerDeps,
    options: RunControllerOptions = {}
  ) {
    this.settings = {
      timeoutMs: options.timeoutMs ?? 90_000,
      maxToolIterations: options.maxToolIterations ?? 6,
      toolRetries: options.toolRetries ?? 1,
      onToolError: options.onToolError ?? "fail",
      toolTimeoutMs: options.toolTimeoutMs,
      chunkSize: options.chunkSize ?? 48,
    };
  }

  /**
   * Starts a run and returns at once. Throws `RunAlreadyInProgressError`
   * when the session already has one; there is no queue.
   */
  start(input: StartRunInput): RunHandle {
    const runId = uuidv7() as RunId;
    const lease = this.deps.locks.tryAcquire(input.sessionId, runId);
    if (!lease) {
      throw new RunAlreadyInProgressError(input.sessionId, this.deps.locks.activeRunId(input.sessionId));
    }

    const run = new AgentRun(this.deps, this.settings, input, runId, lease, () => {
      if (this.active.get(input.sessionId) === run) this.active.delete(input.sessionId);
    });
    this.active.set(input.sessionId, run);
    run.launch();
    return run;
  }

  activeRun(sessionId: SessionId): RunHandle | undefined {
    return this.active.get(sessionId);
  }

  /** Requests cancellation of the session's run. Returns its id when one was running. */
  cancel(sessionId: SessionId, reason = "cancelled by user"): RunId | undefined {
    const run = this.active.get(sessionId);
    if (!run || !run.cancel(reason)) return undefined;
    return run.runId;
  }

  /** Cancels every active run and waits for each to settle. */
  async shutdown(reason = "server shutting down"): Promise<RunOutcome[]> {
    const runs = [...this.active.values()];
    for (const run of runs) run.cancel(reason);
    return Promise.all(runs.map((run) => run.done));
  }
}

interface RunSettings {
  readonly timeoutMs: number;
  readonly maxToolIterations: number;
  readonly toolRetries: number;
  readonly onToolError: ToolErrorPolicy;
  readonly toolTimeoutMs?: number;
  readonly chunkSize: number;
}

class AgentRun implements RunHandle {
  readonly turnId: TurnId;
  readonly done: Promise<RunOutcome>;
  private readonly machine = new RunStateMachine();
  private readonly abort = new AbortController();
  private readonly traceCtx: TraceContext;
  private readonly log: Logger;
  private resolveDone: (outcome: RunOutcome) => void = () => {};
  private cancelReason?: string;
  private deadline?: Promise<typeof TIMED_OUT>;
  private deadlineTimer?: NodeJS.Timeout;
  private turn?: TurnHandle;

  constructor(
    private readonly deps: RunControllerDeps,
    private readonly settings: RunSettings,
    private readonly input: StartRunInput,
    readonly runId: RunId,
    private readonly lease: SessionLease,
    private readonly onSettled: () => void
  ) {
    this.turnId = uuidv7() as TurnId;
    this.traceCtx = createTraceContext(input.traceCtx);
    this.log = createLogger("run-controller").withTrace(this.traceCtx);
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get sessionId(): SessionId {
    return this.input.sessionId;
  }

  get userId(): UserId {
    return this.input.userId;
  }

  get state(): RunStateName {
    return this.machine.state;
  }

  /** False once the run is terminal, already cancelling, or committing its answer. */
  cancel(reason = "cancelled by user"): boolean {
    if (this.machine.terminal || this.state === "FINALIZING" || this.cancelReason !== undefined) {
      return false;
    }
    this.cancelReason = reason;
    this.abort.abort(new CancelledError(reason));
    this.log.info("Cancellation requested", { runId: this.runId, state: this.state, reason });
    return true;
  }

  /** Opens the stream and turn synchronously, then runs in the background. */
  launch(): void {
    const { publisher, tracker } = this.deps;
    publisher.openRun(this.sessionId, this.runId, this.turnId);
    this.turn = tracker.openTurn(this.sessionId, {
      runId: this.runId,
      turnId: this.turnId,
      userMessage: this.input.userMessage,
    });
    void this.execute().then(this.resolveDone, (err: unknown) => {
      // execute() handles its own failures; reaching here is a bug.
      this.log.error("Run crashed outside its error handling", {
        runId: this.runId,
        error: err instanceof Error ? err.message : String(err),
      });
      this.resolveDone({ status: "errored", error: toErrorInfo(err) });
    });
  }

  private async execute(): Promise<RunOutcome> {
    const { store, publisher } = this.deps;
    await this.emit("run.started", { runId: this.runId, turnId: this.turnId, userId: this.userId });

    try {
      this.armDeadline();
      await this.enter("CONTEXT_LOADING");
      const session = await this.race(store.getSession(this.sessionId));
      if (!session) throw new SessionNotFoundError(this.sessionId);
      await store.markRunStarted({
        runId: this.runId,
        sessionId: this.sessionId,
        startedAt: new Date().toISOString(),
      });
      const history = await this.race(this.deps.contextWindow.buildContext(this.sessionId));
      this.checkpoint();

      await this.enter("REASONING");
      const { content, metadata, contextPatch } = await this.reason(history, session.context);
      this.disarmDeadline();

      await this.enter("RESPONDING");
      await this.respond(content);

      await this.enter("FINALIZING");
      const committed = await this.deps.tracker.finalize(this.requireTurn(), content, {
        metadata,
        contextPatch,
      });
      await this.enter("COMPLETED");
      publisher.publish(this.sessionId, {
        kind: "done",
        payload: { turnId: committed.agentTurn.id, ordinal: committed.agentTurn.ordinal, content },
      });
      this.log.info("Run completed", {
        runId: this.runId,
        sessionId: this.sessionId,
        ordinal: committed.agentTurn.ordinal,
      });
      await this.emit("run.completed", { runId: this.runId, turnId: committed.agentTurn.id });
      return { status: "completed", userTurn: committed.userTurn, agentTurn: committed.agentTurn };
    } catch (err) {
      return await this.fail(err);
    } finally {
      this.disarmDeadline();
      this.lease.release();
      this.onSettled();
      publisher.completeRun(this.sessionId);
      await store.clearRunMarker(this.runId).catch((err: unknown) => {
        this.log.error("Failed to clear run marker", {
          runId: this.runId,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }

  /**
   * The REASONING ⇄ TOOL_CALLING loop. Returns once the model answers
   * without asking for a tool.
   */
  private async reason(
    history: Turn[],
    context: JsonObject
  ): Promise<{ content: string; metadata: TurnMetadata; contextPatch?: JsonObject }> {
    const { gateway, model, tracker } = this.deps;
    const turn = this.requireTurn();
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(gateway.describeTools(), context) },
      ...toChatMessages(history),
      { role: "user", content: this.input.userMessage },
    ];
    const toolsUsed: string[] = [];
    let degraded = false;
    let confidence: number | undefined;
    let contextPatch: JsonObject | undefined;
    let iterations = 0;

    for (;;) {
      const generation = await this.race(this.generate(messages, context));
      this.checkpoint();

      for (const thought of generation.thoughts ?? []) {
        tracker.appendStep(turn, thought);
        if (thought.confidence !== undefined) confidence = thought.confidence;
      }

      const calls = generation.toolCalls ?? [];
      if (calls.length === 0) {
        const metadata: TurnMetadata = {
          model: model.name,
          ...(confidence !== undefined ? { confidence } : {}),
          ...(toolsUsed.length > 0 ? { tools: toolsUsed } : {}),
          ...(degraded ? { degraded } : {}),
        };
        return { content: generation.text, metadata, contextPatch };
      }

      iterations += 1;
      if (iterations > this.settings.maxToolIterations) {
        throw new ToolLoopExceededError(this.settings.maxToolIterations);
      }

      await this.enter("TOOL_CALLING");
      messages.push({ role: "assistant", content: generation.text, toolCalls: calls });

      for (const call of calls) {
        const sequence = tracker.appendToolCall(turn, { toolName: call.name, params: call.arguments });
        toolsUsed.push(call.name);
        const { result, attempts } = await this.invokeTool(call);
        tracker.completeToolCall(turn, sequence, result, attempts);
        this.checkpoint();

        if (result.ok) {
          messages.push({ role: "tool", name: call.name, toolCallId: call.id, content: JSON.stringify(result.value) });
          const location = locationOf(call.name, result.value);
          if (location) contextPatch = { ...contextPatch, lastLocation: location };
          continue;
        }

        if (this.settings.onToolError === "fail") {
          throw new ToolInvocationError(call.name, result.error);
        }
        degraded = true;
        tracker.appendStep(turn, {
          type: "validation",
          content: `${call.name} failed; continuing without its result`,
          error: result.error.message,
        });
        messages.push({
          role: "tool",
          name: call.name,
          toolCallId: call.id,
          content: JSON.stringify({ error: { kind: result.error.kind, message: result.error.message } }),
        });
      }

      await this.enter("REASONING");
    }
  }

  private async generate(messages: ChatMessage[], context: JsonObject) {
    try {
      return await this.deps.model.generate(messages, { signal: this.abort.signal, context });
    } catch (err) {
      if (this.cancelReason !== undefined || isParleyError(err)) throw err;
      throw new ModelError(`Model ${this.deps.model.name} failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  /** Retries retryable failures inline, up to `toolRetries` extra attempts. */
  private async invokeTool(call: ModelToolCall): Promise<{ result: ToolResult; attempts: number }> {
    let attempts = 0;
    for (;;) {
      attempts += 1;
      const result = await this.race(
        this.deps.gateway.invoke(call.name, call.arguments, this.settings.toolTimeoutMs)
      );
      if (result.ok || !result.error.retryable || attempts > this.settings.toolRetries) {
        return { result, attempts };
      }
      this.checkpoint();
      this.log.info("Retrying tool call", {
        runId: this.runId,
        toolName: call.name,
        kind: result.error.kind,
        attempt: attempts + 1,
      });
    }
  }

  private async respond(content: string): Promise<void> {
    const chunks = chunkText(content, this.settings.chunkSize);
    for (const [index, text] of chunks.entries()) {
      this.deps.publisher.publish(this.sessionId, { kind: "content_chunk", payload: { index, text } });
      await yieldToEventLoop();
      this.checkpoint();
    }
  }

  private async fail(err: unknown): Promise<RunOutcome> {
    if (this.machine.terminal) {
      // Failed after reaching a terminal state; the outcome is already decided.
      this.log.error("Error after run settled", { runId: this.runId, state: this.state });
      throw err;
    }
    const cancelled = this.cancelReason !== undefined && !(err instanceof RunTimeoutError);
    const reason = this.cancelReason ?? (err instanceof Error ? err.message : String(err));
    if (this.turn) this.deps.tracker.abort(this.turn, reason);

    if (cancelled) {
      await this.enter("CANCELLED");
      this.deps.publisher.publish(this.sessionId, { kind: "cancelled", payload: { reason } });
      this.log.info("Run cancelled", { runId: this.runId, sessionId: this.sessionId, reason });
      await this.emit("run.cancelled", { runId: this.runId, reason });
      return { status: "cancelled", reason };
    }

    const error = toErrorInfo(err);
    await this.enter("ERRORED");
    this.deps.publisher.publish(this.sessionId, { kind: "error", payload: error });
    this.log.error("Run failed", {
      runId: this.runId,
      sessionId: this.sessionId,
      code: error.code,
      message: error.message,
    });
    await this.emit("run.failed", { runId: this.runId, code: error.code });
    return { status: "errored", error };
  }

  private async enter(state: RunStateName): Promise<void> {
    const from = this.machine.state;
    this.machine.transition(state);
    this.log.debug("Run state", { runId: this.runId, from, to: state });
    await this.emit("run.state", { runId: this.runId, from, to: state });
  }

  /** Throws if cancellation was requested since the last suspension point. */
  private checkpoint(): void {
    if (this.cancelReason !== undefined) throw new CancelledError(this.cancelReason);
  }

  private armDeadline(): void {
    this.deadline = new Promise((resolve) => {
      this.deadlineTimer = setTimeout(() => resolve(TIMED_OUT), this.settings.timeoutMs);
    });
  }

  private disarmDeadline(): void {
    clearTimeout(this.deadlineTimer);
    this.deadline = undefined;
  }

  /** Awaits `work`, giving up with `RunTimeoutError` if the run deadline passes first. */
  private async race<T>(work: Promise<T>): Promise<T> {
    if (!this.deadline) return work;
    const outcome = await Promise.race([work, this.deadline]);
    if (outcome === TIMED_OUT) {
      const timeout = new RunTimeoutError(this.settings.timeoutMs);
      this.abort.abort(timeout);
      throw timeout;
    }
    return outcome;
  }

  private requireTurn(): TurnHandle {
    if (!this.turn) throw new Error("Run was not launched");
    return this.turn;
  }

  private async emit(topic: EventTopic, payload: Record<string, unknown>): Promise<void> {
    if (!this.deps.bus) return;
    await this.deps.bus.publish(createEvent(topic, payload, this.traceCtx, this.sessionId));
  }
}

function locationOf(toolName: string, value: unknown): string | undefined {
  if (toolName !== LOCATION_TOOL) return undefined;
  if (typeof value !== "object" || value === null || !("location" in value)) return undefined;
  return typeof value.location === "string" ? value.location : undefined;
}
