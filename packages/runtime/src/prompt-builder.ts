import type { JsonObject, ToolDescriptor, Turn } from "@parley/types";
import type { ChatMessage } from "./model-adapter.js";

/**
 * Builds the system prompt from the tool catalogue and the session's
 * carried-over context.
 */
export function buildSystemPrompt(tools: ToolDescriptor[], context: JsonObject = {}): string {
  const toolList =
    tools.length > 0
      ? tools
          .map((t) => {
            const params = Object.entries(t.parameters)
              .map(([name, description]) => `  - ${name}: ${description}`)
              .join("\n");
            return `- **${t.name}**: ${t.description}\n${params}`;
          })
          .join("\n")
      : "- (no tools available)";

  const contextLines = Object.entries(context)
    .map(([key, value]) => `- ${key}: ${JSON.stringify(value)}`)
    .join("\n");

  return `You are Parley, a conversational assistant that answers questions about the weather.

# Tools
${toolList}

# Tool Protocol
To call a tool, reply with a single line:
TOOL: <name> {"param": "value"}
The tool result comes back as a message starting with [Tool Result: <name>].
When you have what you need, answer the user in plain text without a TOOL line.

# Conversation Context
${contextLines || "- (none)"}

# Loop Protocol
1. Think about the user's request.
2. If you need live data, use a tool.
3. If you have the answer, reply to the user.
4. Never loop indefinitely.
`;
}

/** Persisted turns as model messages, in the same order. */
export function toChatMessages(turns: Turn[]): ChatMessage[] {
  return turns.map((turn): ChatMessage => ({
    role: turn.role === "agent" ? "assistant" : turn.role,
    content: turn.content,
  }));
}
