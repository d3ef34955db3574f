import { describe, expect, it } from "vitest";
import { createLogger } from "../logging/logger.js";
import { ToolExecutor, truncateOutput, UNKNOWN_TOOL_ERROR } from "./executor.js";
import { ToolRegistry } from "./registry.js";
import { createTool } from "./tool.js";

const logger = createLogger({ type: "hidden" });

function executorFor(...tools: ReturnType<typeof createTool>[]) {
  return new ToolExecutor(ToolRegistry.from(tools), { logger, outputLimit: 50 });
}

describe("truncateOutput", () => {
  it("returns short text unchanged", () => {
    expect(truncateOutput("short", 10)).toBe("short");
    expect(truncateOutput("exactly10!", 10)).toBe("exactly10!");
  });

  it("cuts long text and appends a notice", () => {
    expect(truncateOutput("abcdefghij", 4)).toBe(
      "abcd\n\n[Output truncated: showing 4 of 10 characters]",
    );
  });
});

describe("ToolExecutor", () => {
  it("returns the tool text as payload on success", async () => {
    const executor = executorFor(
      createTool({ name: "Echo", description: "Echoes", execute: (input) => `echo: ${input}` }),
    );

    await expect(executor.invoke("Echo", "hello")).resolves.toEqual({
      success: true,
      payload: "echo: hello",
    });
  });

  it("reports unknown tools without throwing", async () => {
    const executor = executorFor();

    await expect(executor.invoke("Missing", "x")).resolves.toEqual({
      success: false,
      payload: "",
      error: UNKNOWN_TOOL_ERROR,
    });
  });

  it("matches tool names exactly", async () => {
    const executor = executorFor(createTool({ name: "Echo", description: "", execute: () => "ok" }));

    const result = await executor.invoke("echo", "x");
    expect(result.error).toBe("unknown tool");
  });

  it("converts thrown errors into failures", async () => {
    const executor = executorFor(
      createTool({
        name: "Broken",
        description: "",
        execute: () => {
          throw new Error("HTTP 500");
        },
      }),
    );

    await expect(executor.invoke("Broken", "x")).resolves.toEqual({
      success: false,
      payload: "",
      error: "HTTP 500",
    });
  });

  it("converts rejected promises into failures", async () => {
    const executor = executorFor(
      createTool({
        name: "Rejects",
        description: "",
        execute: async () => Promise.reject(new Error("connection refused")),
      }),
    );

    const result = await executor.invoke("Rejects", "x");
    expect(result).toEqual({ success: false, payload: "", error: "connection refused" });
  });

  it("times out slow tools and aborts their signal", async () => {
    let seenSignal: AbortSignal | undefined;
    const executor = executorFor(
      createTool({
        name: "Slow",
        description: "",
        timeoutMs: 20,
        execute: (_input, signal) => {
          seenSignal = signal;
          return new Promise<string>(() => {});
        },
      }),
    );

    const result = await executor.invoke("Slow", "x");

    expect(result).toEqual({
      success: false,
      payload: "",
      error: "Tool 'Slow' timed out after 20ms",
    });
    expect(seenSignal?.aborted).toBe(true);
  });

  it("applies the default timeout to tools without their own", async () => {
    const executor = new ToolExecutor(
      ToolRegistry.from([
        createTool({ name: "Hang", description: "", execute: () => new Promise<string>(() => {}) }),
      ]),
      { logger, defaultTimeoutMs: 15 },
    );

    const result = await executor.invoke("Hang", "");
    expect(result.error).toBe("Tool 'Hang' timed out after 15ms");
  });

  it("truncates long payloads to the output limit", async () => {
    const executor = executorFor(
      createTool({ name: "Long", description: "", execute: () => "x".repeat(80) }),
    );

    const result = await executor.invoke("Long", "");
    expect(result.success).toBe(true);
    expect(result.payload).toBe(
      `${"x".repeat(50)}\n\n[Output truncated: showing 50 of 80 characters]`,
    );
  });

  it("exposes labels and names", () => {
    const executor = executorFor(
      createTool({ name: "Tavily_Search", label: "Web Search", description: "", execute: () => "" }),
    );

    expect(executor.toolNames).toEqual(["Tavily_Search"]);
    expect(executor.labelFor("Tavily_Search")).toBe("Web Search");
    expect(executor.labelFor("Other")).toBe("Other");
  });
});
