import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  BusEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SessionId,
  SpanId,
  TraceId,
} from "@parley/types";
import { createLogger } from "./logger.js";

const log = createLogger("bus");

/**
 * In-memory implementation of the lifecycle event bus.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  async publish<T>(event: BusEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (this.matches(event, sub.filter)) {
        try {
          const result = sub.handler(event);
          if (result instanceof Promise) {
            promises.push(result);
          }
        } catch (err) {
          log.error("Event handler threw", {
            topic: event.topic,
            subscriber: sub.id,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    const settled = await Promise.allSettled(promises);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        log.error("Async event handler rejected", {
          topic: event.topic,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
      }
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    // Handlers only ever receive events whose topic they filtered for.
    const sub = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private matches(event: BusEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sessionId && event.sessionId !== filter.sessionId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  sessionId?: SessionId
): BusEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    sessionId,
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
