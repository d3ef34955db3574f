import { describe, expect, it } from "vitest";
import { buildSystemPrompt } from "./system-prompt.js";

describe("buildSystemPrompt", () => {
  it("lists tools and the directive format", () => {
    const prompt = buildSystemPrompt([
      { name: "Tavily_Search", description: "Search the web" },
      { name: "Google_Trends_MCP", description: "Get trending topics" },
    ]);

    expect(prompt).toBe(
      [
        "You are a helpful AI assistant with access to tools.",
        "",
        "You have access to the following tools:",
        "1. Tavily_Search: Search the web",
        "2. Google_Trends_MCP: Get trending topics",
        "",
        "When you need to use a tool, respond with:",
        "ACTION: <tool_name>",
        "INPUT: <tool_input>",
        "",
        "Then I will provide the tool result, and you can continue.",
        "",
        "If you don't need tools, just provide your answer directly.",
        "",
        "Tool names must be exactly: Tavily_Search or Google_Trends_MCP",
      ].join("\n"),
    );
  });

  it("joins three or more names with commas", () => {
    const prompt = buildSystemPrompt([
      { name: "A", description: "a" },
      { name: "B", description: "b" },
      { name: "C", description: "c" },
    ]);

    expect(prompt.endsWith("Tool names must be exactly: A, B or C")).toBe(true);
  });

  it("omits tool instructions when there are no tools", () => {
    expect(buildSystemPrompt([])).toBe(
      "You are a helpful AI assistant. Answer the user's questions directly.",
    );
  });
});
