import { describe, it, expect } from "vitest";
import type { RunId, SessionId, StreamEvent, TurnId } from "@parley/types";
import { StreamPublisher, type SubscriberHandle } from "./stream-publisher.js";

const sessionId = "session-1" as SessionId;
const runId = "run-1" as RunId;
const turnId = "turn-1" as TurnId;

async function drain(sub: SubscriberHandle): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of sub) events.push(event);
  return events;
}

function chunk(publisher: StreamPublisher, text: string, index: number) {
  return publisher.publish(sessionId, { kind: "content_chunk", payload: { index, text } });
}

describe("StreamPublisher", () => {
  it("assigns gapless sequences from 0 and ends subscribers on the terminal event", async () => {
    const publisher = new StreamPublisher();
    publisher.openRun(sessionId, runId, turnId);
    const sub = publisher.attach(sessionId);

    chunk(publisher, "Hel", 0);
    chunk(publisher, "lo", 1);
    publisher.publish(sessionId, {
      kind: "done",
      payload: { turnId, ordinal: 2, content: "Hello" },
    });
    publisher.completeRun(sessionId);

    const events = await drain(sub);
    expect(events.map((e) => e.sequence)).toEqual([0, 1, 2]);
    expect(events.map((e) => e.kind)).toEqual(["content_chunk", "content_chunk", "done"]);
    expect(events.every((e) => e.runId === runId && e.turnId === turnId)).toBe(true);
    expect(publisher.subscriberCount(sessionId)).toBe(0);
  });

  it("fans out to every subscriber of the session only", async () => {
    const publisher = new StreamPublisher();
    const other = "session-2" as SessionId;
    const a = publisher.attach(sessionId);
    const b = publisher.attach(sessionId);
    const c = publisher.attach(other);

    publisher.openRun(sessionId, runId, turnId);
    publisher.publish(sessionId, { kind: "cancelled", payload: { reason: "user" } });

    expect((await drain(a)).map((e) => e.kind)).toEqual(["cancelled"]);
    expect((await drain(b)).map((e) => e.kind)).toEqual(["cancelled"]);
    expect(publisher.subscriberCount(other)).toBe(1);
    c.close();
    expect(c.closed).toBe(true);
  });

  it("replays events after the last seen sequence, then continues live", async () => {
    const publisher = new StreamPublisher();
    publisher.openRun(sessionId, runId, turnId);
    for (let i = 0; i < 5; i++) chunk(publisher, `c${i}`, i);

    const resumed = publisher.attach(sessionId, { lastSeenSequence: 2, runId });
    chunk(publisher, "c5", 5);
    publisher.publish(sessionId, {
      kind: "done",
      payload: { turnId, ordinal: 2, content: "c0c1c2c3c4c5" },
    });

    const events = await drain(resumed);
    expect(events.map((e) => e.sequence)).toEqual([3, 4, 5, 6]);
    expect(events[events.length - 1].kind).toBe("done");
  });

  it("sends a single resync when the missed events were evicted", async () => {
    const publisher = new StreamPublisher({ maxEvents: 3 });
    publisher.openRun(sessionId, runId, turnId);
    for (let i = 0; i < 6; i++) chunk(publisher, `c${i}`, i);

    // Buffer now holds sequences 3..5; sequence 2 is gone.
    const sub = publisher.attach(sessionId, { lastSeenSequence: 1, runId });
    const events = await drain(sub);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      kind: "resync",
      sequence: 5,
      runId,
      payload: { reason: "gap_exceeded", lastSeenSequence: 1, oldestRetained: 3 },
    });
  });

  it("replays when the first missing event is exactly the oldest retained", async () => {
    const publisher = new StreamPublisher({ maxEvents: 3 });
    publisher.openRun(sessionId, runId, turnId);
    for (let i = 0; i < 6; i++) chunk(publisher, `c${i}`, i);
    publisher.completeRun(sessionId);

    const events = await drain(publisher.attach(sessionId, { lastSeenSequence: 2, runId }));
    expect(events.map((e) => e.sequence)).toEqual([3, 4, 5]);
  });

  it("evicts events older than the age limit", async () => {
    let clock = 1_000;
    const publisher = new StreamPublisher({ maxAgeMs: 100, now: () => clock });
    publisher.openRun(sessionId, runId, turnId);
    chunk(publisher, "old", 0);
    clock += 150;
    chunk(publisher, "new", 1);

    expect(publisher.snapshot(sessionId)).toEqual({
      runId,
      turnId,
      open: true,
      lastSequence: 1,
      oldestRetained: 1,
    });

    const events = await drain(publisher.attach(sessionId, { lastSeenSequence: -1 }));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: "resync", payload: { reason: "gap_exceeded" } });
  });

  it("answers an unknown run with run_expired and a different run with run_mismatch", async () => {
    const publisher = new StreamPublisher();

    const expired = await drain(publisher.attach(sessionId, { lastSeenSequence: 4 }));
    expect(expired).toEqual([
      expect.objectContaining({
        kind: "resync",
        sequence: -1,
        payload: { reason: "run_expired", lastSeenSequence: 4 },
      }),
    ]);

    publisher.openRun(sessionId, runId, turnId);
    const mismatch = await drain(
      publisher.attach(sessionId, { lastSeenSequence: 0, runId: "run-0" as RunId })
    );
    expect(mismatch).toHaveLength(1);
    expect(mismatch[0]).toMatchObject({ kind: "resync", payload: { reason: "run_mismatch" } });
  });

  it("does not apply a previous run's cursor to the run that replaced it", async () => {
    const publisher = new StreamPublisher();
    const firstRun = "run-a" as RunId;
    publisher.openRun(sessionId, firstRun, turnId);
    for (let i = 0; i < 5; i++) chunk(publisher, `a${i}`, i);
    publisher.publish(sessionId, { kind: "done", payload: { turnId, ordinal: 2, content: "a" } });
    publisher.completeRun(sessionId);

    publisher.openRun(sessionId, runId, "turn-2" as TurnId);
    for (let i = 0; i < 8; i++) chunk(publisher, `b${i}`, i);

    const bare = await drain(publisher.attach(sessionId, { lastSeenSequence: 5 }));
    expect(bare).toEqual([
      expect.objectContaining({
        kind: "resync",
        sequence: 7,
        runId,
        payload: { reason: "run_mismatch", lastSeenSequence: 5 },
      }),
    ]);

    const named = await drain(publisher.attach(sessionId, { lastSeenSequence: 5, runId: firstRun }));
    expect(named).toEqual([
      expect.objectContaining({
        kind: "resync",
        sequence: 7,
        payload: { reason: "run_mismatch", lastSeenSequence: 5 },
      }),
    ]);
  });

  it("replays the current run from its start for a -1 cursor without a run", async () => {
    const publisher = new StreamPublisher();
    publisher.openRun(sessionId, runId, turnId);
    chunk(publisher, "c0", 0);
    chunk(publisher, "c1", 1);

    const sub = publisher.attach(sessionId, { lastSeenSequence: -1 });
    publisher.publish(sessionId, { kind: "done", payload: { turnId, ordinal: 2, content: "c0c1" } });

    expect((await drain(sub)).map((e) => e.sequence)).toEqual([0, 1, 2]);
  });

  it("ends a resumed subscription immediately when the finished run has nothing newer", async () => {
    const publisher = new StreamPublisher();
    publisher.openRun(sessionId, runId, turnId);
    publisher.publish(sessionId, { kind: "cancelled", payload: { reason: "user" } });
    publisher.completeRun(sessionId);

    const sub = publisher.attach(sessionId, { lastSeenSequence: 0, runId });
    expect(await sub.next()).toEqual({ done: true, value: undefined });
  });

  it("refuses to publish without an open run", () => {
    const publisher = new StreamPublisher();
    expect(() => chunk(publisher, "x", 0)).toThrow(/No open run/);
  });

  it("drops a detached subscriber", () => {
    const publisher = new StreamPublisher();
    const sub = publisher.attach(sessionId);
    expect(publisher.subscriberCount(sessionId)).toBe(1);
    publisher.detach(sub);
    expect(publisher.subscriberCount(sessionId)).toBe(0);
  });
});
