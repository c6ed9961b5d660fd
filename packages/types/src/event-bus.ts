import type { EventId, SessionId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Internal lifecycle event. Client-facing run events go through the
 * stream publisher instead; this bus is for in-process observers such as
 * cache invalidation and logging.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface BusEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Session the event concerns. Absent for process-wide events. */
  readonly sessionId?: SessionId;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic =
  // Run lifecycle
  | "run.started"
  | "run.state"
  | "run.completed"
  | "run.failed"
  | "run.cancelled"
  // Persistence
  | "turn.persisted"
  | "session.created"
  | "session.updated"
  | "session.deleted"
  // System
  | "system.shutdown";

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events about this session. */
  readonly sessionId?: SessionId;
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: BusEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: BusEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}
