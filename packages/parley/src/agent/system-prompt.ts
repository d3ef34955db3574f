import { ACTION_MARKER, INPUT_MARKER } from "../core/constants.js";
import type { Tool } from "../tools/tool.js";

type ToolSummary = Pick<Tool, "name" | "description">;

function joinNames(names: string[]): string {
  if (names.length <= 1) return names.join("");
  return `${names.slice(0, -1).join(", ")} or ${names[names.length - 1]}`;
}

/**
 * System prompt that lists the tools and teaches the action directive.
 */
export function buildSystemPrompt(tools: readonly ToolSummary[]): string {
  if (tools.length === 0) {
    return "You are a helpful AI assistant. Answer the user's questions directly.";
  }

  const listing = tools.map((tool, index) => `${index + 1}. ${tool.name}: ${tool.description}`);

  return [
    "You are a helpful AI assistant with access to tools.",
    "",
    "You have access to the following tools:",
    ...listing,
    "",
    "When you need to use a tool, respond with:",
    `${ACTION_MARKER} <tool_name>`,
    `${INPUT_MARKER} <tool_input>`,
    "",
    "Then I will provide the tool result, and you can continue.",
    "",
    "If you don't need tools, just provide your answer directly.",
    "",
    `Tool names must be exactly: ${joinNames(tools.map((tool) => tool.name))}`,
  ].join("\n");
}
