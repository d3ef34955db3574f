import { describe, expect, it, vi } from "vitest";
import { TAVILY_SEARCH_URL, TavilySearchTool } from "./tavily-search.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("TavilySearchTool", () => {
  const signal = new AbortController().signal;

  it("posts the query with the API key and result limit", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ answer: null, results: [] }));
    const tool = new TavilySearchTool({ apiKey: "test-secret", maxResults: 3, fetch: fetchMock });

    await tool.call("  AI trends  ", signal);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(TAVILY_SEARCH_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: "Bearer test-secret",
      },
      body: JSON.stringify({ query: "AI trends", max_results: 3, include_answer: true }),
      signal,
    });
  });

  it("formats the answer and numbered results", async () => {
    const tool = new TavilySearchTool({
      apiKey: "test-secret",
      fetch: async () =>
        jsonResponse({
          answer: "Agents are popular.",
          results: [
            { title: "First", url: "https://example.com/1", content: "One" },
            { title: null, url: "https://example.com/2" },
          ],
        }),
    });

    const text = await tool.call("AI trends", signal);

    expect(text).toBe(
      "Search Results for 'AI trends':\n\n" +
        "Answer: Agents are popular.\n\n" +
        "Top Results:\n" +
        "\n1. First\n   URL: https://example.com/1\n   One\n" +
        "\n2. No title\n   URL: https://example.com/2\n   No content\n",
    );
  });

  it("reports when nothing was found", () => {
    const tool = new TavilySearchTool({ apiKey: "test-secret" });

    expect(tool.format({ query: "nothing", answer: "", results: [] })).toBe(
      "Search Results for 'nothing':\n\nNo results found.",
    );
  });

  it("fails without an API key", async () => {
    const fetchMock = vi.fn();
    const tool = new TavilySearchTool({ fetch: fetchMock });

    await expect(tool.call("query", signal)).rejects.toThrow(
      "Web search is not configured. Set the TAVILY_API_KEY environment variable.",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails on an empty query", async () => {
    const tool = new TavilySearchTool({ apiKey: "test-secret", fetch: vi.fn() });

    await expect(tool.call("   ", signal)).rejects.toThrow("Search query is empty");
  });

  it("fails on HTTP errors", async () => {
    const tool = new TavilySearchTool({
      apiKey: "test-secret",
      fetch: async () => new Response("denied", { status: 401, statusText: "Unauthorized" }),
    });

    await expect(tool.call("query", signal)).rejects.toThrow(
      "Tavily API error: HTTP 401 Unauthorized",
    );
  });

  it("fails on malformed bodies", async () => {
    const tool = new TavilySearchTool({
      apiKey: "test-secret",
      fetch: async () => jsonResponse({ results: "not a list" }),
    });

    await expect(tool.call("query", signal)).rejects.toThrow(
      "Tavily API returned an unexpected response",
    );
  });

  it("identifies itself to the model", () => {
    const tool = new TavilySearchTool();

    expect(tool.name).toBe("Tavily_Search");
    expect(tool.label).toBe("Web Search");
  });
});
