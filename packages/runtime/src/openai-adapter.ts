import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import { ConfigError, ModelError, createLogger } from "@parley/core";
import type { NewThinkingStep } from "@parley/types";
import type {
  ChatMessage,
  GenerateOptions,
  GenerationResult,
  ModelAdapter,
  ModelToolCall,
} from "./model-adapter.js";

const log = createLogger("openai-adapter");

const CompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

/** JSON object arguments after `TOOL: name`. */
const ToolArguments = z.record(z.string(), z.unknown());

export interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  /** Per-request timeout. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * ModelAdapter for the OpenAI chat completions API.
 * Uses the REST API directly.
 * Parses `TOOL: name {json}` from the output to support tool calling defined in the system prompt.
 * Any text before the tool line is kept as a reasoning step.
 */
export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) throw new ConfigError("OpenAI API key is required");
    this.apiKey = options.apiKey;
    this.name = options.model ?? "gpt-4o-mini";
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.temperature = options.temperature ?? 0.7;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.name,
          messages: this.convertMessages(messages),
          temperature: this.temperature,
        }),
        signal,
      });
    } catch (err) {
      throw new ModelError(`OpenAI request failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelError(`OpenAI API error ${response.status}: ${errorText}`);
    }

    const parsed = CompletionResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelError("OpenAI API returned an unexpected response shape", parsed.error);
    }
    const content = parsed.data.choices[0].message.content ?? "";
    return this.parseToolCalls(content);
  }

  private parseToolCalls(content: string): GenerationResult {
    const toolRegex = /TOOL:\s*([a-zA-Z0-9_.]+)\s*(\{.*\})/g;
    const toolCalls: ModelToolCall[] = [];
    let text = content;

    let match: RegExpExecArray | null;
    while ((match = toolRegex.exec(content)) !== null) {
      const [fullMatch, name, argsJson] = match;
      const args = safeJson(argsJson);
      const checked = ToolArguments.safeParse(args);
      if (!checked.success) {
        log.warn("Failed to parse tool call", { line: fullMatch });
        continue;
      }
      toolCalls.push({ id: uuidv7(), name, arguments: JSON.parse(argsJson) });
      // Remove the tool call line from the visible text
      text = text.replace(fullMatch, "").trim();
    }

    if (toolCalls.length === 0) return { text: content.trim() };

    const thoughts: NewThinkingStep[] = text ? [{ type: "reasoning", content: text }] : [];
    return { text: "", toolCalls, thoughts };
  }

  private convertMessages(messages: ChatMessage[]): Array<{ role: string; content: string }> {
    // Text protocol: tool results go back as user messages, tool requests as the assistant's TOOL lines.
    return messages.map((m) => {
      if (m.role === "tool") {
        return { role: "user", content: `[Tool Result: ${m.name ?? "unknown"}] ${m.content}` };
      }
      if (m.role === "assistant" && m.toolCalls?.length) {
        const lines = m.toolCalls.map((call) => `TOOL: ${call.name} ${JSON.stringify(call.arguments)}`);
        return { role: "assistant", content: [m.content, ...lines].filter(Boolean).join("\n") };
      }
      return { role: m.role, content: m.content };
    });
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
