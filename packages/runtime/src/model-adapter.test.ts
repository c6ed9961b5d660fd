import { describe, it, expect, vi } from "vitest";
import { ConfigError, ModelError } from "@parley/core";
import { RuleBasedWeatherModel, type ChatMessage } from "./model-adapter.js";
import { OpenAIAdapter } from "./openai-adapter.js";

function user(content: string): ChatMessage {
  return { role: "user", content };
}

describe("RuleBasedWeatherModel", () => {
  const model = new RuleBasedWeatherModel();

  it("asks for the weather tool when a place is named", async () => {
    const result = await model.generate([user("What's the weather in Paris tomorrow?")]);

    expect(result.text).toBe("");
    expect(result.toolCalls).toHaveLength(1);
    expect(result.toolCalls?.[0]).toMatchObject({
      name: "weather_query",
      arguments: { location: "Paris", when: "tomorrow" },
    });
    expect(result.thoughts?.map((t) => t.type)).toEqual(["analysis", "decision"]);
    expect(result.thoughts?.[0].confidence).toBe(0.95);
  });

  it("falls back to the remembered location on a follow-up", async () => {
    const result = await model.generate([user("And tomorrow?")], { context: { lastLocation: "Paris" } });

    expect(result.toolCalls?.[0].arguments).toEqual({ location: "Paris", when: "tomorrow" });
    expect(result.thoughts?.[0]).toMatchObject({
      content: "Weather question about Paris for tomorrow (from earlier in the conversation)",
      confidence: 0.8,
    });
  });

  it("asks which city when none is known", async () => {
    const result = await model.generate([user("Will it rain?")]);
    expect(result.text).toBe("Which city would you like the weather for?");
    expect(result.toolCalls).toBeUndefined();
  });

  it("summarizes a tool result", async () => {
    const report = {
      location: "Paris",
      when: "tomorrow",
      condition: "Partly cloudy",
      temperatureC: 18,
      highC: 20,
      lowC: 15,
    };
    const result = await model.generate([
      user("What's the weather in Paris tomorrow?"),
      { role: "tool", name: "weather_query", content: JSON.stringify(report) },
    ]);

    expect(result.text).toBe("Tomorrow in Paris: Partly cloudy, 18°C (high 20°C, low 15°C).");
    expect(result.thoughts?.[0].type).toBe("reasoning");
  });

  it("apologizes when the tool reported an error", async () => {
    const result = await model.generate([
      user("Weather in Oslo?"),
      {
        role: "tool",
        name: "weather_query",
        content: JSON.stringify({ error: { kind: "TIMEOUT", message: "too slow" } }),
      },
    ]);

    expect(result.text).toBe("Sorry, I couldn't get the weather right now (too slow).");
    expect(result.thoughts?.[0]).toMatchObject({ type: "validation", error: "too slow" });
  });

  it("greets back", async () => {
    const result = await model.generate([user("hello there")]);
    expect(result.text).toBe("Hello! Ask me about the weather anywhere.");
  });
});

describe("OpenAIAdapter", () => {
  function completion(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    });
  }

  it("requires an API key", () => {
    expect(() => new OpenAIAdapter({ apiKey: "" })).toThrow(ConfigError);
  });

  it("parses TOOL lines into tool calls and keeps the preamble as reasoning", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      completion('Let me check.\nTOOL: weather_query {"location": "Paris", "when": "tomorrow"}')
    );
    const adapter = new OpenAIAdapter({ apiKey: "test-secret", fetch: fetchMock });

    const result = await adapter.generate([user("Weather in Paris tomorrow?")]);

    expect(result.text).toBe("");
    expect(result.toolCalls?.[0]).toMatchObject({
      name: "weather_query",
      arguments: { location: "Paris", when: "tomorrow" },
    });
    expect(result.thoughts).toEqual([{ type: "reasoning", content: "Let me check." }]);
  });

  it("sends tool results back as user messages", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(completion("It will be mild."));
    const adapter = new OpenAIAdapter({
      apiKey: "test-secret",
      model: "test-model",
      baseUrl: "http://models.test/v1/",
      fetch: fetchMock,
    });

    const result = await adapter.generate([
      user("Weather in Paris?"),
      { role: "tool", name: "weather_query", content: '{"temperatureC":17}' },
    ]);

    expect(result).toEqual({ text: "It will be mild." });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://models.test/v1/chat/completions");
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("test-model");
    expect(body.messages).toEqual([
      { role: "user", content: "Weather in Paris?" },
      { role: "user", content: '[Tool Result: weather_query] {"temperatureC":17}' },
    ]);
  });

  it("wraps HTTP failures in ModelError", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("overloaded", { status: 500 }));
    const adapter = new OpenAIAdapter({ apiKey: "test-secret", fetch: fetchMock });

    await expect(adapter.generate([user("hi")])).rejects.toThrow(ModelError);
    await expect(adapter.generate([user("hi")])).rejects.toThrow("OpenAI API error 500: overloaded");
  });
});
