import {
  ChatAgent,
  createLogger,
  InMemoryConversationStore,
  isTerminalEvent,
  ToolExecutor,
  ToolRegistry,
} from "parley";
import { describe, expect, it } from "vitest";
import { collectEvents, eventTypes, streamedText } from "./events.js";
import { type ScriptedReply, ScriptedCompletionClient } from "./scripted-client.js";
import { StubTool } from "./stub-tool.js";

const logger = createLogger({ type: "hidden" });

async function runTurn(
  replies: ScriptedReply[],
  options: { tools?: StubTool[]; maxIterations?: number; generationTimeoutMs?: number } = {},
) {
  const store = new InMemoryConversationStore();
  const conversation = await store.createConversation("user-1", "Scenario");
  await store.saveMessage(conversation.id, "user-1", "user", "question");

  const client = new ScriptedCompletionClient(replies);
  const tools = options.tools ?? [
    new StubTool({ name: "Tavily_Search", label: "Web Search", response: "search results" }),
  ];
  const agent = new ChatAgent({
    completionClient: client,
    tools: new ToolExecutor(ToolRegistry.from(tools), { logger }),
    store,
    logger,
    maxIterations: options.maxIterations,
    generationTimeoutMs: options.generationTimeoutMs,
  });

  const events = await collectEvents(agent.process("question", conversation.id, "user-1"));
  const messages = await store.getMessages(conversation.id, "user-1");
  return { events, client, messages };
}

describe("agent scenarios", () => {
  it("plain answer", async () => {
    const { events, messages } = await runTurn(["The answer is 42."]);

    expect(eventTypes(events)).toEqual([
      "loading",
      "responding",
      "streaming",
      "token",
      "token",
      "token",
      "token",
      "done",
    ]);
    expect(streamedText(events).trimEnd()).toBe("The answer is 42.");
    expect(messages.map((m) => m.role)).toEqual(["user", "assistant"]);
  });

  it("one tool round completes before streaming", async () => {
    const { events, client } = await runTurn([
      "ACTION: Tavily_Search\nINPUT: latest news",
      "Summary of the news.",
    ]);

    const types = eventTypes(events);
    expect(types.indexOf("tool_activity")).toBeLessThan(types.indexOf("streaming"));
    expect(events.filter((event) => event.type === "tool_activity")).toEqual([
      {
        type: "tool_activity",
        data: { tool: "Tavily_Search", status: "started", message: "Using Web Search..." },
      },
      { type: "tool_activity", data: { tool: "Tavily_Search", status: "completed" } },
    ]);
    expect(client.calls[1]?.messages.at(-1)?.content).toBe("Tool result:\nsearch results");
  });

  it("timeout on the first call", async () => {
    const { events, messages } = await runTurn([{ text: "too late", delayMs: 200 }], {
      generationTimeoutMs: 10,
    });

    expect(eventTypes(events)).toEqual(["loading", "responding", "error"]);
    const last = events[2];
    expect(last?.type === "error" ? last.data.error : "").toContain("timed out");
    expect(messages.map((m) => m.role)).toEqual(["user"]);
  });

  it("tool that times out still reaches done", async () => {
    const slow = new StubTool({ name: "Tavily_Search", delayMs: 1000, timeoutMs: 10 });
    const { events } = await runTurn(["ACTION: Tavily_Search\nINPUT: q", "Fallback answer"], {
      tools: [slow],
    });

    expect(events).toContainEqual({
      type: "tool_activity",
      data: {
        tool: "Tavily_Search",
        status: "completed",
        error: "Tool 'Tavily_Search' timed out after 10ms",
      },
    });
    expect(eventTypes(events).at(-1)).toBe("done");
  });

  it("a model that always acts stops after maxIterations completions", async () => {
    const directive = "ACTION: Tavily_Search\nINPUT: more";
    const { events, client } = await runTurn([directive, directive, directive], {
      maxIterations: 2,
    });

    expect(client.calls).toHaveLength(2);
    expect(client.remaining).toBe(1);
    expect(eventTypes(events).at(-1)).toBe("done");
  });

  it("every started tool completes before the next generation", async () => {
    const { events } = await runTurn([
      "ACTION: Tavily_Search\nINPUT: one",
      "ACTION: Tavily_Search\nINPUT: two",
      "Done.",
    ]);

    let open: string | undefined;
    for (const event of events) {
      if (event.type === "tool_activity" && event.data.status === "started") {
        expect(open).toBeUndefined();
        open = event.data.tool;
      } else if (event.type === "tool_activity") {
        expect(event.data.tool).toBe(open);
        open = undefined;
      } else if (event.type === "responding") {
        expect(open).toBeUndefined();
      }
    }
    expect(events.filter(isTerminalEvent)).toHaveLength(1);
    expect(eventTypes(events).at(-1)).toBe("done");
  });

  it("tokens rebuild the answer with single spaces", async () => {
    const { events } = await runTurn(["  Line one\n\nline\ttwo  "]);

    expect(streamedText(events).trimEnd()).toBe("Line one line two");
  });
});
