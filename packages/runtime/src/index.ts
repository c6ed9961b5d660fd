export { ConversationService } from "./conversation-service.js";
export type {
  ConversationServiceDeps,
  ConversationServiceOptions,
  CancelResult,
} from "./conversation-service.js";
export { RunController } from "./run-controller.js";
export type {
  RunControllerDeps,
  RunControllerOptions,
  StartRunInput,
  ToolErrorPolicy,
} from "./run-controller.js";
export { RunStateMachine, canTransition, isTerminalState } from "./run-state.js";
export { ThinkingTracker } from "./thinking-tracker.js";
export type { TurnHandle, ToolCallOutcome, FinalizeOptions } from "./thinking-tracker.js";
export { ContextWindowManager } from "./context-window.js";
export type { ContextWindowOptions, WindowUnit } from "./context-window.js";
export { OwnerAccessPolicy } from "./access-policy.js";
export { buildSystemPrompt, toChatMessages } from "./prompt-builder.js";
export { chunkText } from "./chunking.js";
export { RuleBasedWeatherModel } from "./model-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export type { OpenAIAdapterOptions } from "./openai-adapter.js";
export type {
  ModelAdapter,
  ChatMessage,
  GenerationResult,
  GenerateOptions,
  ModelToolCall,
} from "./model-adapter.js";
export { createConversationRuntime } from "./runtime.js";
export type { ConversationRuntime, RuntimeInput, RuntimeSettings } from "./runtime.js";
