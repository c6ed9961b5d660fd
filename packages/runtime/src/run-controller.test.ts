import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { z } from "zod";
import type { JsonValue, Session, StreamEvent, UserId } from "@parley/types";
import {
  InMemoryEventBus,
  RunAlreadyInProgressError,
  SessionLockRegistry,
  StreamPublisher,
  type SubscriberHandle,
} from "@parley/core";
import { SQLiteSessionStore } from "@parley/persistence";
import { MockWeatherTool, ToolGateway, ToolRegistry, UpstreamHttpError, type Tool } from "@parley/tools";
import { ContextWindowManager } from "./context-window.js";
import { RuleBasedWeatherModel, type GenerationResult, type ModelAdapter } from "./model-adapter.js";
import { RunController, type RunControllerOptions } from "./run-controller.js";
import { ThinkingTracker } from "./thinking-tracker.js";

const userId = "user-1" as UserId;

async function collect(subscriber: SubscriberHandle): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of subscriber) events.push(event);
  return events;
}

function scripted(...results: GenerationResult[]) {
  const generate = vi.fn<ModelAdapter["generate"]>();
  for (const result of results) generate.mockResolvedValueOnce(result);
  return { name: "scripted", generate };
}

/** Never answers on its own; rejects once the run aborts its signal. */
function stalled(): { name: string; generate: Mock<ModelAdapter["generate"]> } {
  const generate = vi.fn<ModelAdapter["generate"]>(
    (_messages, options) =>
      new Promise((_resolve, reject) => {
        options?.signal?.addEventListener("abort", () => reject(options.signal?.reason), { once: true });
      })
  );
  return { name: "stalled", generate };
}

const NoParams = z.object({});

type CountingTool = Tool<typeof NoParams> & { calls: number };

function failingTool(name: string, error: () => Error, succeedAfter = Infinity): CountingTool {
  const tool: CountingTool = {
    name,
    description: name,
    schema: NoParams,
    parameters: {},
    calls: 0,
    execute: async () => {
      tool.calls += 1;
      if (tool.calls > succeedAfter) return { fine: true };
      throw error();
    },
  };
  return tool;
}

type GatedTool = CountingTool & { open(): void };

/** Each call waits until `open()` is called, then settles with `outcome`. */
function gatedTool(name: string, outcome: () => JsonValue): GatedTool {
  const gate: { release?: () => void } = {};
  const opened = new Promise<void>((resolve) => {
    gate.release = resolve;
  });
  const tool: GatedTool = {
    name,
    description: name,
    schema: NoParams,
    parameters: {},
    calls: 0,
    open: () => gate.release?.(),
    execute: async () => {
      tool.calls += 1;
      await opened;
      return outcome();
    },
  };
  return tool;
}

describe("RunController", () => {
  let store: SQLiteSessionStore;
  let bus: InMemoryEventBus;
  let publisher: StreamPublisher;
  let locks: SessionLockRegistry;
  let session: Session;

  beforeEach(async () => {
    bus = new InMemoryEventBus();
    store = new SQLiteSessionStore(":memory:", { bus });
    publisher = new StreamPublisher();
    locks = new SessionLockRegistry();
    session = await store.createSession({ ownerId: userId });
  });

  afterEach(() => {
    publisher.close();
    store.close();
  });

  function controller(
    model: ModelAdapter = new RuleBasedWeatherModel(),
    tools: Tool[] = [new MockWeatherTool()],
    options: RunControllerOptions = {}
  ): RunController {
    return new RunController(
      {
        store,
        tracker: new ThinkingTracker(store, publisher),
        contextWindow: new ContextWindowManager(store, { bus }),
        gateway: new ToolGateway(new ToolRegistry(tools)),
        model,
        publisher,
        locks,
        bus,
      },
      options
    );
  }

  function start(runs: RunController, userMessage: string) {
    const run = runs.start({ sessionId: session.id, userId, userMessage });
    return { run, events: collect(publisher.attach(session.id)) };
  }

  it("answers a weather question through the tool and streams every step", async () => {
    const states: string[] = [];
    bus.subscribe<{ to: string }>({ topics: ["run.state"] }, (event) => {
      states.push(event.payload.to);
    });

    const { run, events } = start(controller(), "What's the weather in Paris tomorrow?");
    const outcome = await run.done;
    const streamed = await events;

    const answer = "Tomorrow in Paris: Partly cloudy, 18°C (high 20°C, low 15°C).";
    expect(streamed.map((e) => [e.sequence, e.kind])).toEqual([
      [0, "thinking"],
      [1, "thinking"],
      [2, "tool_call"],
      [3, "tool_result"],
      [4, "thinking"],
      [5, "content_chunk"],
      [6, "content_chunk"],
      [7, "done"],
    ]);
    expect(streamed[7].payload).toEqual({ turnId: run.turnId, ordinal: 2, content: answer });
    expect(states).toEqual([
      "CONTEXT_LOADING",
      "REASONING",
      "TOOL_CALLING",
      "REASONING",
      "RESPONDING",
      "FINALIZING",
      "COMPLETED",
    ]);

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.userTurn.ordinal).toBe(1);
    expect(outcome.agentTurn).toMatchObject({
      ordinal: 2,
      content: answer,
      metadata: { model: "rule-based-weather", confidence: 0.9, tools: ["weather_query"] },
    });

    const trace = await store.getTurnTrace(run.turnId);
    expect(trace?.steps.map((s) => [s.type, s.sequence])).toEqual([
      ["analysis", 0],
      ["decision", 1],
      ["reasoning", 3],
    ]);
    expect(trace?.toolCalls[0]).toMatchObject({ sequence: 2, attempts: 1, result: { temperatureC: 18 } });
    expect(trace?.entries.map((e) => e.kind)).toEqual(["step", "step", "tool_call", "step"]);
    expect((await store.getSession(session.id))?.context).toEqual({ lastLocation: "Paris" });
    expect(await store.listRunMarkers()).toEqual([]);
  });

  it("carries the location into a follow-up question", async () => {
    const runs = controller();
    await start(runs, "What's the weather in Paris tomorrow?").run.done;

    const { run } = start(runs, "And today?");
    const outcome = await run.done;

    expect(outcome).toMatchObject({
      status: "completed",
      agentTurn: { ordinal: 4, content: "Today in Paris: Partly cloudy, 17°C (high 20°C, low 15°C)." },
    });
  });

  it("refuses a second run while one is active, then accepts once it settles", async () => {
    const runs = controller();
    const first = runs.start({ sessionId: session.id, userId, userMessage: "hello" });

    expect(() => runs.start({ sessionId: session.id, userId, userMessage: "again" })).toThrow(
      RunAlreadyInProgressError
    );
    expect(runs.activeRun(session.id)?.runId).toBe(first.runId);

    await first.done;
    expect(runs.activeRun(session.id)).toBeUndefined();
    const second = runs.start({ sessionId: session.id, userId, userMessage: "again" });
    expect((await second.done).status).toBe("completed");
  });

  it("errors with RUN_TIMEOUT when the model never answers, persisting nothing", async () => {
    const model = stalled();
    const { run, events } = start(controller(model, [], { timeoutMs: 30 }), "hello");

    const outcome = await run.done;
    const streamed = await events;

    expect(outcome).toMatchObject({ status: "errored", error: { code: "RUN_TIMEOUT" } });
    expect(streamed[streamed.length - 1]).toMatchObject({ kind: "error", payload: { code: "RUN_TIMEOUT" } });
    expect(model.generate.mock.calls[0][1]?.signal?.aborted).toBe(true);
    expect(await store.listTurns(session.id)).toEqual([]);
    expect(await store.listRunMarkers()).toEqual([]);
    expect(locks.isLocked(session.id)).toBe(false);
  });

  it("stops a model that keeps asking for tools", async () => {
    const generate = vi.fn<ModelAdapter["generate"]>().mockResolvedValue({
      text: "",
      toolCalls: [{ id: "c1", name: "weather_query", arguments: { location: "Paris" } }],
    });
    const { run } = start(
      controller({ name: "loop", generate }, [new MockWeatherTool()], { maxToolIterations: 2 }),
      "weather?"
    );

    expect(await run.done).toMatchObject({ status: "errored", error: { code: "TOOL_LOOP_EXCEEDED" } });
    expect(generate).toHaveBeenCalledTimes(3);
    expect(await store.listTurns(session.id)).toEqual([]);
  });

  it("retries a retryable tool failure once", async () => {
    const tool = failingTool("lookup", () => new UpstreamHttpError(503, "busy"), 1);
    const model = scripted(
      { text: "", toolCalls: [{ id: "c1", name: "lookup", arguments: {} }] },
      { text: "All good." }
    );
    const { run, events } = start(controller(model, [tool]), "check");

    expect((await run.done).status).toBe("completed");
    expect(tool.calls).toBe(2);
    const result = (await events).find((e) => e.kind === "tool_result");
    expect(result?.payload).toMatchObject({ ok: true, attempts: 2, result: { fine: true } });
    expect((await store.getTurnTrace(run.turnId))?.toolCalls[0].attempts).toBe(2);
  });

  it("fails the run when a tool keeps failing under the fail policy", async () => {
    const tool = failingTool("lookup", () => new UpstreamHttpError(503, "busy"));
    const model = scripted({ text: "", toolCalls: [{ id: "c1", name: "lookup", arguments: {} }] });
    const { run } = start(controller(model, [tool], { onToolError: "fail" }), "check");

    expect(await run.done).toMatchObject({
      status: "errored",
      error: { code: "TOOL_ERROR", message: "Tool lookup failed: busy" },
    });
    expect(tool.calls).toBe(2);
    expect(model.generate).toHaveBeenCalledTimes(1);
  });

  it("answers without the tool under the degrade policy", async () => {
    const tool = failingTool("lookup", () => new UpstreamHttpError(404, "no such place"));
    const model = scripted(
      { text: "", toolCalls: [{ id: "c1", name: "lookup", arguments: {} }] },
      { text: "Sorry, no data." }
    );
    const { run } = start(controller(model, [tool], { onToolError: "degrade" }), "check");

    const outcome = await run.done;
    expect(outcome).toMatchObject({
      status: "completed",
      agentTurn: { content: "Sorry, no data.", metadata: { degraded: true, tools: ["lookup"] } },
    });
    expect(tool.calls).toBe(1);

    const secondCall = model.generate.mock.calls[1][0];
    expect(secondCall[secondCall.length - 1]).toEqual({
      role: "tool",
      name: "lookup",
      toolCallId: "c1",
      content: JSON.stringify({ error: { kind: "UPSTREAM_CLIENT", message: "no such place" } }),
    });
    const trace = await store.getTurnTrace(run.turnId);
    expect(trace?.steps.map((s) => [s.type, s.error])).toEqual([["validation", "no such place"]]);
  });

  it("wraps unexpected model failures as MODEL_ERROR", async () => {
    const generate = vi.fn<ModelAdapter["generate"]>().mockRejectedValue(new Error("boom"));
    const { run } = start(controller({ name: "broken", generate }), "hello");

    expect(await run.done).toMatchObject({
      status: "errored",
      error: { code: "MODEL_ERROR", message: "Model broken failed: boom" },
    });
  });

  it("cancels while the model is thinking", async () => {
    const model = stalled();
    const runs = controller(model);
    const { run, events } = start(runs, "hello");

    await vi.waitFor(() => expect(model.generate).toHaveBeenCalled());
    expect(runs.cancel(session.id, "stop")).toBe(run.runId);

    expect(await run.done).toEqual({ status: "cancelled", reason: "stop" });
    const streamed = await events;
    expect(streamed[streamed.length - 1]).toMatchObject({ kind: "cancelled", payload: { reason: "stop" } });
    expect(runs.cancel(session.id)).toBeUndefined();
    expect(await store.listTurns(session.id)).toEqual([]);
  });

  it("cancels between content chunks", async () => {
    const text = "one two three four five six seven eight nine ten";
    const runs = controller(scripted({ text }), [], { chunkSize: 4 });
    const run = runs.start({ sessionId: session.id, userId, userMessage: "count" });

    const streamed: StreamEvent[] = [];
    for await (const event of publisher.attach(session.id)) {
      streamed.push(event);
      if (event.kind === "content_chunk" && event.payload.index === 0) runs.cancel(session.id);
    }

    expect(await run.done).toEqual({ status: "cancelled", reason: "cancelled by user" });
    expect(streamed.filter((e) => e.kind === "content_chunk")).toHaveLength(1);
    expect(streamed[streamed.length - 1].kind).toBe("cancelled");
    expect(await store.listTurns(session.id)).toEqual([]);
  });

  it("does not retry a tool call once the run is cancelled", async () => {
    const tool = gatedTool("lookup", () => {
      throw new UpstreamHttpError(503, "busy");
    });
    const model = scripted({ text: "", toolCalls: [{ id: "c1", name: "lookup", arguments: {} }] });
    const runs = controller(model, [tool]);
    const { run } = start(runs, "check");

    await vi.waitFor(() => expect(tool.calls).toBe(1));
    expect(runs.cancel(session.id, "stop")).toBe(run.runId);
    tool.open();

    expect(await run.done).toEqual({ status: "cancelled", reason: "stop" });
    expect(tool.calls).toBe(1);
    expect(await store.listTurns(session.id)).toEqual([]);
    expect(locks.isLocked(session.id)).toBe(false);
  });

  it("discards the result of a tool call that finishes after cancellation", async () => {
    const tool = gatedTool("lookup", () => ({ fine: true }));
    const model = scripted(
      { text: "", toolCalls: [{ id: "c1", name: "lookup", arguments: {} }] },
      { text: "All good." }
    );
    const runs = controller(model, [tool]);
    const { run, events } = start(runs, "check");

    await vi.waitFor(() => expect(tool.calls).toBe(1));
    expect(run.state).toBe("TOOL_CALLING");
    expect(runs.cancel(session.id, "stop")).toBe(run.runId);
    tool.open();

    expect(await run.done).toEqual({ status: "cancelled", reason: "stop" });
    expect(model.generate).toHaveBeenCalledTimes(1);
    const streamed = await events;
    expect(streamed[streamed.length - 1]).toMatchObject({ kind: "cancelled", payload: { reason: "stop" } });
    expect(streamed.some((e) => e.kind === "done")).toBe(false);
    expect(await store.listTurns(session.id)).toEqual([]);
    expect(locks.isLocked(session.id)).toBe(false);
  });

  it("errors and releases the session when the final commit fails", async () => {
    const commit = vi.spyOn(store, "commitExchange").mockRejectedValueOnce(new Error("disk full"));
    const runs = controller();
    const { run, events } = start(runs, "hello");

    expect(await run.done).toEqual({
      status: "errored",
      error: { code: "INTERNAL_ERROR", message: "disk full" },
    });
    const streamed = await events;
    expect(streamed[streamed.length - 1]).toMatchObject({ kind: "error", payload: { code: "INTERNAL_ERROR" } });
    expect(commit).toHaveBeenCalledTimes(1);
    expect(await store.listTurns(session.id)).toEqual([]);
    expect(await store.listRunMarkers()).toEqual([]);
    expect(locks.isLocked(session.id)).toBe(false);

    const retry = runs.start({ sessionId: session.id, userId, userMessage: "hello" });
    expect(await retry.done).toMatchObject({ status: "completed", agentTurn: { ordinal: 2 } });
  });

  it("cancels every active run on shutdown", async () => {
    const runs = controller(stalled());
    runs.start({ sessionId: session.id, userId, userMessage: "hello" });

    expect(await runs.shutdown()).toEqual([{ status: "cancelled", reason: "server shutting down" }]);
    expect(runs.activeRun(session.id)).toBeUndefined();
  });
});
