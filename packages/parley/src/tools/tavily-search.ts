/**
 * Web search backed by the Tavily search API.
 *
 * Requires `TAVILY_API_KEY`. Get one at https://tavily.com
 */
import { z } from "zod";
import { AbstractTool } from "./tool.js";

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

const tavilyResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  content: z.string().nullish(),
});

const tavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(tavilyResultSchema).default([]),
});

export type TavilyResult = z.infer<typeof tavilyResultSchema>;

export interface TavilySearchData {
  query: string;
  answer: string;
  results: TavilyResult[];
}

export interface TavilySearchOptions {
  apiKey?: string;
  maxResults?: number;
  timeoutMs?: number;
  endpoint?: string;
  fetch?: typeof fetch;
}

export class TavilySearchTool extends AbstractTool<TavilySearchData> {
  readonly name = "Tavily_Search";
  readonly description = "Search the web for current information, news, and recent events";
  readonly label = "Web Search";
  override readonly timeoutMs?: number;

  private readonly apiKey?: string;
  private readonly maxResults: number;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TavilySearchOptions = {}) {
    super();
    this.apiKey = options.apiKey;
    this.maxResults = options.maxResults ?? 5;
    this.timeoutMs = options.timeoutMs;
    this.endpoint = options.endpoint ?? TAVILY_SEARCH_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetch(input: string, signal: AbortSignal): Promise<TavilySearchData> {
    if (!this.apiKey) {
      throw new Error("Web search is not configured. Set the TAVILY_API_KEY environment variable.");
    }
    const query = input.trim();
    if (!query) {
      throw new Error("Search query is empty");
    }

    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        query,
        max_results: this.maxResults,
        include_answer: true,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Tavily API error: HTTP ${response.status} ${response.statusText}`.trim());
    }

    const body: unknown = await response.json();
    const parsed = tavilyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("Tavily API returned an unexpected response");
    }

    return {
      query,
      answer: parsed.data.answer ?? "",
      results: parsed.data.results,
    };
  }

  format(data: TavilySearchData): string {
    let formatted = `Search Results for '${data.query}':\n\n`;

    if (data.answer) {
      formatted += `Answer: ${data.answer}\n\n`;
    }

    if (data.results.length === 0) {
      return `${formatted}No results found.`;
    }

    formatted += "Top Results:\n";
    data.results.forEach((result, index) => {
      formatted += `\n${index + 1}. ${result.title || "No title"}\n`;
      formatted += `   URL: ${result.url || "No URL"}\n`;
      formatted += `   ${result.content || "No content"}\n`;
    });
    return formatted;
  }
}
