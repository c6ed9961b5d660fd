import { mkdirSync } from "node:fs";
import path from "node:path";
import { InMemoryEventBus, createLogger, type ParleyConfig } from "@parley/core";
import { SQLiteSessionStore } from "@parley/persistence";
import {
  OpenAIAdapter,
  RuleBasedWeatherModel,
  createConversationRuntime,
  type ConversationRuntime,
  type ModelAdapter,
} from "@parley/runtime";
import { MockWeatherTool, ToolRegistry, WeatherTool } from "@parley/tools";
import { createChatApp } from "./app.js";

const log = createLogger("bootstrap");

export interface ChatServer {
  readonly app: ReturnType<typeof createChatApp>;
  readonly runtime: ConversationRuntime;
  readonly store: SQLiteSessionStore;
  /** Cancels runs, ends streams and closes the database. */
  close(): Promise<void>;
}

export function createModel(config: ParleyConfig["model"]): ModelAdapter {
  if (config.provider === "openai") {
    log.info("Using OpenAI model", { model: config.name, baseUrl: config.baseUrl });
    return new OpenAIAdapter({
      apiKey: config.apiKey ?? "",
      model: config.name,
      baseUrl: config.baseUrl,
      temperature: config.temperature,
      timeoutMs: config.requestTimeoutMs,
    });
  }
  log.info("Using the offline rule-based model");
  return new RuleBasedWeatherModel();
}

export function createToolRegistry(config: ParleyConfig["tools"]): ToolRegistry {
  const weather =
    config.weather.provider === "live"
      ? new WeatherTool({
          geocodingUrl: config.weather.geocodingUrl,
          forecastUrl: config.weather.forecastUrl,
        })
      : new MockWeatherTool();
  return new ToolRegistry([weather]);
}

/** Wires store, runtime and HTTP app from a validated configuration. */
export function createChatServer(config: ParleyConfig): ChatServer {
  if (config.databasePath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(config.databasePath)), { recursive: true });
  }

  const bus = new InMemoryEventBus();
  const store = new SQLiteSessionStore(config.databasePath, { bus });
  const runtime = createConversationRuntime({
    store,
    bus,
    model: createModel(config.model),
    tools: createToolRegistry(config.tools),
    settings: config,
  });
  const app = createChatApp({ service: runtime.service, heartbeatMs: config.stream.heartbeatMs });

  return {
    app,
    runtime,
    store,
    async close() {
      await runtime.service.shutdown();
      runtime.contextWindow.dispose();
      store.close();
    },
  };
}
