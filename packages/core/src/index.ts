export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { createLogger, configureLogging, resetLogging, isLogLevel } from "./logger.js";
export type { Logger, LogSink } from "./logger.js";
export {
  ParleyError,
  SessionNotFoundError,
  SessionAccessDeniedError,
  SessionArchivedError,
  TurnNotFoundError,
  InvalidMessageError,
  RunAlreadyInProgressError,
  ToolInvocationError,
  ToolLoopExceededError,
  RunTimeoutError,
  TurnClosedError,
  CancelledError,
  ModelError,
  InvalidTransitionError,
  ConfigError,
  isParleyError,
  toErrorInfo,
} from "./errors.js";
export { ParleyConfigSchema, parseConfig, loadConfig } from "./config.js";
export type { ParleyConfig } from "./config.js";
export { SessionLockRegistry } from "./session-lock.js";
export type { SessionLease } from "./session-lock.js";
export { StreamPublisher } from "./stream-publisher.js";
export type {
  StreamPublisherOptions,
  AttachOptions,
  SubscriberHandle,
  RunSnapshot,
} from "./stream-publisher.js";
