import { v7 as uuidv7 } from "uuid";
import type {
  ResyncEvent,
  ResyncPayload,
  RunEventInput,
  RunId,
  RunStreamEvent,
  SessionId,
  StreamEvent,
  StreamEventKind,
  TurnId,
} from "@parley/types";
import { createLogger } from "./logger.js";

const log = createLogger("stream-publisher");

/** A subscription ends after delivering one of these. */
const ENDING_KINDS: ReadonlySet<StreamEventKind> = new Set<StreamEventKind>([
  "done",
  "error",
  "cancelled",
  "resync",
]);

export interface StreamPublisherOptions {
  /** Events retained per run. Default 200. */
  readonly maxEvents?: number;
  /** Max age of a retained event, and how long a finished run stays replayable. Default 120 000. */
  readonly maxAgeMs?: number;
  /** Clock in epoch ms. */
  readonly now?: () => number;
}

export interface AttachOptions {
  /** Resume after this sequence of the run named by `runId`. -1 means the latest run from its start. */
  readonly lastSeenSequence?: number;
  readonly runId?: RunId;
}

/**
 * One consumer's view of a session stream. Iterate it, or pull with `next()`.
 */
export interface SubscriberHandle extends AsyncIterable<StreamEvent> {
  readonly id: string;
  readonly sessionId: SessionId;
  readonly closed: boolean;
  next(): Promise<IteratorResult<StreamEvent, undefined>>;
  close(): void;
}

export interface RunSnapshot {
  readonly runId: RunId;
  readonly turnId: TurnId;
  readonly open: boolean;
  /** -1 before the first event. */
  readonly lastSequence: number;
  readonly oldestRetained?: number;
}

interface Retained {
  readonly event: RunStreamEvent;
  readonly at: number;
}

interface RunChannel {
  readonly sessionId: SessionId;
  readonly runId: RunId;
  readonly turnId: TurnId;
  readonly buffer: Retained[];
  nextSequence: number;
  open: boolean;
  expiry?: NodeJS.Timeout;
}

class Subscriber implements SubscriberHandle {
  readonly id = uuidv7();
  private readonly queue: StreamEvent[] = [];
  private waiter?: (result: IteratorResult<StreamEvent, undefined>) => void;
  private ended = false;

  constructor(
    readonly sessionId: SessionId,
    private readonly onEnd: (sub: Subscriber) => void
  ) {}

  get closed(): boolean {
    return this.ended && this.queue.length === 0;
  }

  get accepting(): boolean {
    return !this.ended;
  }

  push(event: StreamEvent): void {
    if (this.ended) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ done: false, value: event });
    } else {
      this.queue.push(event);
    }
    if (ENDING_KINDS.has(event.kind)) this.end();
  }

  /** Stops accepting events; whatever is queued is still delivered. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ done: true, value: undefined });
    }
    this.onEnd(this);
  }

  close(): void {
    this.queue.length = 0;
    this.end();
  }

  next(): Promise<IteratorResult<StreamEvent, undefined>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ done: false, value: event });
    if (this.ended) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

/**
 * Fans a run's events out to every attached client and keeps a bounded
 * per-run buffer so a reconnecting client can resume from its last sequence.
 *
 * Sequences are per run, start at 0 and have no gaps. When a resuming client
 * has missed events that were already evicted it gets a single `resync` event
 * instead of a partial replay.
 */
export class StreamPublisher {
  private readonly maxEvents: number;
  private readonly maxAgeMs: number;
  private readonly now: () => number;
  private readonly channels = new Map<SessionId, RunChannel>();
  private readonly subscribers = new Map<SessionId, Set<Subscriber>>();

  constructor(options: StreamPublisherOptions = {}) {
    this.maxEvents = options.maxEvents ?? 200;
    this.maxAgeMs = options.maxAgeMs ?? 120_000;
    this.now = options.now ?? Date.now;
  }

  /** Starts a new run for the session, replacing any finished one. */
  openRun(sessionId: SessionId, runId: RunId, turnId: TurnId): void {
    const previous = this.channels.get(sessionId);
    if (previous?.open) {
      log.warn("Opening a run while another is still open", {
        sessionId,
        previousRunId: previous.runId,
        runId,
      });
    }
    if (previous?.expiry) clearTimeout(previous.expiry);
    this.channels.set(sessionId, {
      sessionId,
      runId,
      turnId,
      buffer: [],
      nextSequence: 0,
      open: true,
    });
  }

  /** Stamps the next sequence on `input`, buffers it and delivers it to live subscribers. */
  publish(sessionId: SessionId, input: RunEventInput): RunStreamEvent {
    const channel = this.channels.get(sessionId);
    if (!channel || !channel.open) {
      throw new Error(`No open run for session ${sessionId}`);
    }

    const event: RunStreamEvent = {
      ...input,
      sequence: channel.nextSequence,
      sessionId,
      runId: channel.runId,
      turnId: channel.turnId,
      timestamp: new Date(this.now()).toISOString(),
    };
    channel.nextSequence += 1;
    channel.buffer.push({ event, at: this.now() });
    this.evict(channel);

    for (const sub of this.subscriberSet(sessionId)) {
      sub.push(event);
    }
    return event;
  }

  /**
   * Marks the run finished. It stays replayable for `maxAgeMs`, then is dropped.
   */
  completeRun(sessionId: SessionId): void {
    const channel = this.channels.get(sessionId);
    if (!channel || !channel.open) return;
    channel.open = false;

    // Anyone still attached missed the terminal event; nothing more will come.
    for (const sub of [...this.subscriberSet(sessionId)]) {
      sub.end();
    }

    channel.expiry = setTimeout(() => {
      if (this.channels.get(sessionId) === channel) {
        this.channels.delete(sessionId);
      }
    }, this.maxAgeMs);
    channel.expiry.unref();
  }

  /**
   * Subscribes to a session.
   *
   * Without `lastSeenSequence` the subscriber gets the retained events of the
   * run in flight (if any) and then live events. With it, events after that
   * sequence of the run named by `runId` are replayed, or a `resync` is sent
   * when they can no longer be. A cursor other than -1 must name its run.
   */
  attach(sessionId: SessionId, options: AttachOptions = {}): SubscriberHandle {
    const sub = new Subscriber(sessionId, (ended) => {
      this.subscribers.get(sessionId)?.delete(ended);
    });
    const channel = this.channels.get(sessionId);
    if (channel) this.evict(channel);

    const { lastSeenSequence, runId } = options;

    if (runId !== undefined && (!channel || channel.runId !== runId)) {
      sub.push(
        this.resync(sessionId, channel, {
          reason: channel ? "run_mismatch" : "run_expired",
          lastSeenSequence,
        })
      );
      return sub;
    }

    // A cursor is only meaningful within its own run; -1 asks for the current run from its start.
    if (runId === undefined && lastSeenSequence !== undefined && lastSeenSequence >= 0) {
      sub.push(
        this.resync(sessionId, channel, {
          reason: channel ? "run_mismatch" : "run_expired",
          lastSeenSequence,
        })
      );
      return sub;
    }

    if (lastSeenSequence === undefined) {
      if (channel?.open) {
        for (const retained of channel.buffer) sub.push(retained.event);
      }
      if (sub.accepting) this.subscriberSet(sessionId).add(sub);
      return sub;
    }

    if (!channel) {
      sub.push(this.resync(sessionId, undefined, { reason: "run_expired", lastSeenSequence }));
      return sub;
    }

    const oldest = channel.buffer[0]?.event.sequence ?? channel.nextSequence;
    if (lastSeenSequence + 1 < oldest) {
      sub.push(
        this.resync(sessionId, channel, {
          reason: "gap_exceeded",
          lastSeenSequence,
          oldestRetained: channel.buffer[0]?.event.sequence,
        })
      );
      return sub;
    }

    for (const retained of channel.buffer) {
      if (retained.event.sequence > lastSeenSequence) sub.push(retained.event);
    }
    if (channel.open && sub.accepting) {
      this.subscriberSet(sessionId).add(sub);
    } else {
      sub.end();
    }
    return sub;
  }

  detach(handle: SubscriberHandle): void {
    handle.close();
  }

  snapshot(sessionId: SessionId): RunSnapshot | undefined {
    const channel = this.channels.get(sessionId);
    if (!channel) return undefined;
    this.evict(channel);
    return {
      runId: channel.runId,
      turnId: channel.turnId,
      open: channel.open,
      lastSequence: channel.nextSequence - 1,
      oldestRetained: channel.buffer[0]?.event.sequence,
    };
  }

  subscriberCount(sessionId: SessionId): number {
    return this.subscribers.get(sessionId)?.size ?? 0;
  }

  /** Ends every subscription and forgets all runs. */
  close(): void {
    for (const set of this.subscribers.values()) {
      for (const sub of [...set]) sub.end();
    }
    this.subscribers.clear();
    for (const channel of this.channels.values()) {
      if (channel.expiry) clearTimeout(channel.expiry);
    }
    this.channels.clear();
  }

  private subscriberSet(sessionId: SessionId): Set<Subscriber> {
    let set = this.subscribers.get(sessionId);
    if (!set) {
      set = new Set();
      this.subscribers.set(sessionId, set);
    }
    return set;
  }

  private evict(channel: RunChannel): void {
    const { buffer } = channel;
    if (buffer.length > this.maxEvents) {
      buffer.splice(0, buffer.length - this.maxEvents);
    }
    const cutoff = this.now() - this.maxAgeMs;
    let stale = 0;
    while (stale < buffer.length && buffer[stale].at < cutoff) stale++;
    if (stale > 0) buffer.splice(0, stale);
  }

  private resync(
    sessionId: SessionId,
    channel: RunChannel | undefined,
    payload: ResyncPayload
  ): ResyncEvent {
    log.debug("Client must resync", { sessionId, ...payload });
    return {
      kind: "resync",
      sequence: channel ? channel.nextSequence - 1 : -1,
      sessionId,
      runId: channel?.runId,
      turnId: channel?.turnId,
      timestamp: new Date(this.now()).toISOString(),
      payload,
    };
  }
}
