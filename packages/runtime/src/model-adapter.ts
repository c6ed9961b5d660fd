import { v7 as uuidv7 } from "uuid";
import type { JsonObject, NewThinkingStep } from "@parley/types";

/**
 * Messages as sent to the model adapter. These are NOT persisted turns:
 * tool calls and tool results only live for the duration of one run.
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ModelToolCall[];
}

export interface ModelToolCall {
  id: string;
  name: string;
  arguments: JsonObject;
}

export interface GenerationResult {
  text: string;
  toolCalls?: ModelToolCall[];
  /** Intermediate reasoning the model chose to expose. */
  thoughts?: NewThinkingStep[];
}

export interface GenerateOptions {
  /** Aborted when the run is cancelled. */
  signal?: AbortSignal;
  /** The session's tool-relevant context, e.g. `lastLocation`. */
  context?: JsonObject;
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full conversation and returns the model's response.
 */
export interface ModelAdapter {
  readonly name: string;
  generate(messages: ChatMessage[], options?: GenerateOptions): Promise<GenerationResult>;
}

const WEATHER_INTENT = /\b(weather|forecast|temperature|rain|raining|sunny|snow|umbrella|cold|hot|warm)\b/i;
const LOCATION = /\b(?:in|for|at)\s+(\p{Lu}[\p{L}'-]*(?:\s+\p{Lu}[\p{L}'-]*)*)/u;
const TOMORROW = /\btomorrow\b/i;
const TODAY = /\btoday\b/i;
const GREETING = /^\s*(hi|hello|hey)\b/i;

/**
 * Offline model for development and tests.
 * Pattern-matches on the conversation to drive the weather tool.
 *
 * Supported patterns:
 * - Weather question naming a place ("in Paris") → calls weather_query
 * - Weather question or bare "today"/"tomorrow" without a place → uses
 *   `lastLocation` from the session context, or asks which city
 * - Tool result → summarizes the report (or the failure)
 * - Greeting → greets back
 */
export class RuleBasedWeatherModel implements ModelAdapter {
  readonly name = "rule-based-weather";

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    const last = messages[messages.length - 1];
    if (last?.role === "tool") {
      return this.summarize(last);
    }

    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    const text = lastUser?.content ?? "";
    const when = TOMORROW.test(text) ? "tomorrow" : "today";
    const named = LOCATION.exec(text)?.[1];
    const remembered = options.context?.lastLocation;
    const fallback = typeof remembered === "string" ? remembered : undefined;
    const asksWeather = WEATHER_INTENT.test(text);
    const followUp = !asksWeather && (TOMORROW.test(text) || TODAY.test(text)) && fallback !== undefined;

    if (asksWeather || followUp) {
      const location = named ?? fallback;
      if (!location) {
        return {
          text: "Which city would you like the weather for?",
          thoughts: [
            { type: "analysis", content: "Weather question without a location", confidence: 0.6 },
          ],
        };
      }
      return {
        text: "",
        thoughts: [
          {
            type: "analysis",
            content: `Weather question about ${location} for ${when}${named ? "" : " (from earlier in the conversation)"}`,
            confidence: named ? 0.95 : 0.8,
          },
          { type: "decision", content: `Query weather_query for ${location}`, confidence: 0.9 },
        ],
        toolCalls: [{ id: uuidv7(), name: "weather_query", arguments: { location, when } }],
      };
    }

    if (GREETING.test(text)) {
      return {
        text: "Hello! Ask me about the weather anywhere.",
        thoughts: [{ type: "analysis", content: "Greeting", confidence: 0.99 }],
      };
    }

    return {
      text: 'I can help with weather questions. Try "What\'s the weather in Paris tomorrow?"',
      thoughts: [{ type: "analysis", content: "No weather intent found", confidence: 0.5 }],
    };
  }

  private summarize(toolMessage: ChatMessage): GenerationResult {
    const payload = parseToolPayload(toolMessage.content);
    const error = payload.error;
    if (error !== undefined) {
      const reason = typeof error === "object" && error !== null && !Array.isArray(error) && typeof error.message === "string"
        ? error.message
        : "the weather service failed";
      return {
        text: `Sorry, I couldn't get the weather right now (${reason}).`,
        thoughts: [
          { type: "validation", content: "Tool failed; answering without data", confidence: 0.4, error: reason },
        ],
      };
    }

    const { location, when, condition, temperatureC, highC, lowC } = payload;
    const day = when === "tomorrow" ? "Tomorrow" : "Today";
    return {
      text: `${day} in ${String(location)}: ${String(condition)}, ${String(temperatureC)}°C (high ${String(highC)}°C, low ${String(lowC)}°C).`,
      thoughts: [
        { type: "reasoning", content: `Summarizing the weather report for ${String(location)}`, confidence: 0.9 },
      ],
    };
  }
}

function parseToolPayload(content: string): JsonObject {
  try {
    const parsed = JSON.parse(content);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? parsed : {};
  } catch {
    return { error: { message: content } };
  }
}
