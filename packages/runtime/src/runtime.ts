import type { EventBus, SessionStore } from "@parley/types";
import {
  InMemoryEventBus,
  SessionLockRegistry,
  StreamPublisher,
  type ParleyConfig,
} from "@parley/core";
import { ToolGateway, type ToolRegistry } from "@parley/tools";
import { ContextWindowManager } from "./context-window.js";
import { ConversationService } from "./conversation-service.js";
import type { ModelAdapter } from "./model-adapter.js";
import { RunController } from "./run-controller.js";
import { ThinkingTracker } from "./thinking-tracker.js";

export type RuntimeSettings = Pick<ParleyConfig, "contextWindow" | "run" | "stream"> & {
  readonly tools: Pick<ParleyConfig["tools"], "timeoutMs">;
  readonly model: Pick<ParleyConfig["model"], "chunkSize">;
};

export interface RuntimeInput {
  readonly store: SessionStore;
  readonly model: ModelAdapter;
  readonly tools: ToolRegistry;
  readonly settings: RuntimeSettings;
  /** Shared with the store so cached windows see its `turn.persisted` events. */
  readonly bus?: EventBus;
  /** Clock for stream retention. */
  readonly now?: () => number;
}

export interface ConversationRuntime {
  readonly service: ConversationService;
  readonly controller: RunController;
  readonly publisher: StreamPublisher;
  readonly contextWindow: ContextWindowManager;
  readonly tracker: ThinkingTracker;
  readonly gateway: ToolGateway;
  readonly locks: SessionLockRegistry;
  readonly bus: EventBus;
}

/** Wires the orchestrator's components around a store, a model and a tool set. */
export function createConversationRuntime(input: RuntimeInput): ConversationRuntime {
  const { settings, store } = input;
  const bus = input.bus ?? new InMemoryEventBus();
  const publisher = new StreamPublisher({
    maxEvents: settings.stream.maxEvents,
    maxAgeMs: settings.stream.maxAgeMs,
    now: input.now,
  });
  const locks = new SessionLockRegistry();
  const tracker = new ThinkingTracker(store, publisher);
  const contextWindow = new ContextWindowManager(store, {
    size: settings.contextWindow.size,
    unit: settings.contextWindow.unit,
    bus,
  });
  const gateway = new ToolGateway(input.tools, { timeoutMs: settings.tools.timeoutMs });
  const controller = new RunController(
    { store, tracker, contextWindow, gateway, model: input.model, publisher, locks, bus },
    {
      timeoutMs: settings.run.timeoutMs,
      maxToolIterations: settings.run.maxToolIterations,
      toolRetries: settings.run.toolRetries,
      onToolError: settings.run.onToolError,
      chunkSize: settings.model.chunkSize,
    }
  );
  const service = new ConversationService(
    { store, controller, publisher, bus },
    { maxMessageLength: settings.run.maxMessageLength }
  );

  return { service, controller, publisher, contextWindow, tracker, gateway, locks, bus };
}
