import { describe, it, expect, vi, afterEach } from "vitest";
import type { LogEntry, SessionId } from "@parley/types";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
import { configureLogging, resetLogging } from "./logger.js";

describe("InMemoryEventBus", () => {
  afterEach(() => resetLogging());

  it("delivers events to matching topic subscribers and propagates trace context", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const sub = bus.subscribe({ topics: ["turn.persisted"] }, handler);

    const traceCtx = createTraceContext();
    const event = createEvent("turn.persisted", { ordinal: 2 }, traceCtx);
    await bus.publish(event);
    await bus.publish(createEvent("run.started", {}, traceCtx));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0].traceCtx.traceId).toBe(traceCtx.traceId);

    sub.unsubscribe();
    expect(bus.subscriberCount).toBe(0);
  });

  it("filters by session id", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    bus.subscribe({ sessionId: "s-1" as SessionId }, handler);

    const traceCtx = createTraceContext();
    await bus.publish(createEvent("session.updated", {}, traceCtx, "s-2" as SessionId));
    await bus.publish(createEvent("session.updated", {}, traceCtx, "s-1" as SessionId));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].sessionId).toBe("s-1");
  });

  it("logs failing handlers without affecting other subscribers", async () => {
    const entries: LogEntry[] = [];
    configureLogging({ sink: (entry) => entries.push(entry) });

    const bus = new InMemoryEventBus();
    const healthy = vi.fn();
    bus.subscribe({}, () => {
      throw new Error("boom");
    });
    bus.subscribe({}, async () => {
      throw new Error("async boom");
    });
    bus.subscribe({}, healthy);

    await bus.publish(createEvent("system.shutdown", {}, createTraceContext()));

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(entries.map((e) => e.message)).toEqual([
      "Event handler threw",
      "Async event handler rejected",
    ]);
    expect(entries[1].data).toMatchObject({ topic: "system.shutdown", error: "async boom" });
  });

  it("child trace contexts keep the trace id and point at their parent", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);
    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
