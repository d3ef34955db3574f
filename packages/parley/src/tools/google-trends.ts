import type { ILogObj, Logger } from "tslog";
import { z } from "zod";
import { describeError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { McpHttpClient, type McpToolCaller } from "./mcp-client.js";
import { AbstractTool } from "./tool.js";

export const TRENDING_TERMS_TOOL = "get_trending_terms";
const MAX_LISTED_TRENDS = 10;
const HEALTH_CHECK_TIMEOUT_MS = 5000;

const trendSchema = z.object({
  keyword: z.string(),
  volume: z.union([z.string(), z.number()]).nullish(),
});

const callToolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().optional(),
});

export type Trend = z.infer<typeof trendSchema> | string;

export interface TrendsData {
  geo: string;
  trends: Trend[];
}

function toTrend(entry: unknown): Trend {
  const parsed = trendSchema.safeParse(entry);
  if (parsed.success) return parsed.data;
  if (typeof entry === "string") return entry;
  return JSON.stringify(entry);
}

function parseTextItem(text: string): unknown[] {
  try {
    const value: unknown = JSON.parse(text);
    return Array.isArray(value) ? value : [value];
  } catch {
    return [text];
  }
}

/**
 * Reads trend entries out of an MCP `tools/call` result. Structured content wins;
 * otherwise each text item is read as JSON, falling back to the raw text.
 */
export function extractTrends(result: unknown): Trend[] {
  const parsed = callToolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new Error("MCP server returned an unexpected tool result");
  }

  const { content, structuredContent, isError } = parsed.data;
  const texts = content.flatMap((item) => (item.type === "text" && item.text ? [item.text] : []));

  if (isError) {
    throw new Error(texts[0] ?? "MCP tool reported an error");
  }

  if (Array.isArray(structuredContent)) {
    return structuredContent.map(toTrend);
  }
  if (typeof structuredContent === "object" && structuredContent !== null) {
    const wrapped = "result" in structuredContent ? structuredContent.result : undefined;
    if (Array.isArray(wrapped)) {
      return wrapped.map(toTrend);
    }
  }

  return texts.flatMap(parseTextItem).map(toTrend);
}

export interface GoogleTrendsOptions {
  caller: McpToolCaller;
  geo?: string;
  timeoutMs?: number;
  logger?: Logger<ILogObj>;
}

/**
 * Trending searches from a Google News Trends MCP server.
 *
 * The model's input is accepted but not forwarded: the server is asked for the
 * configured region's current trending terms.
 */
export class GoogleTrendsTool extends AbstractTool<TrendsData> {
  readonly name = "Google_Trends_MCP";
  readonly description = "Get trending topics and popular searches";
  readonly label = "Google Trends";
  override readonly timeoutMs?: number;

  private readonly caller: McpToolCaller;
  private readonly geo: string;
  private readonly logger: Logger<ILogObj>;

  constructor(options: GoogleTrendsOptions) {
    super();
    this.caller = options.caller;
    this.geo = options.geo ?? "US";
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger({ name: "parley:trends" });
  }

  async fetch(_input: string, signal: AbortSignal): Promise<TrendsData> {
    this.logger.debug("Fetching trending terms", { geo: this.geo });
    const result = await this.caller.callTool(
      TRENDING_TERMS_TOOL,
      { geo: this.geo, full_data: false },
      signal,
    );
    return { geo: this.geo, trends: extractTrends(result) };
  }

  format(data: TrendsData): string {
    const header = `Google Trends (${data.geo}):\n\n`;
    if (data.trends.length === 0) {
      return `${header}No trends data available.`;
    }

    const lines = data.trends.slice(0, MAX_LISTED_TRENDS).map((trend, index) => {
      if (typeof trend === "string") {
        return `${index + 1}. ${trend}\n`;
      }
      return `${index + 1}. ${trend.keyword} (Volume: ${trend.volume ?? "N/A"})\n`;
    });
    return header + lines.join("");
  }

  /**
   * Pings the MCP server. Resolves false instead of rejecting.
   */
  async healthCheck(timeoutMs = HEALTH_CHECK_TIMEOUT_MS): Promise<boolean> {
    try {
      await this.caller.ping(AbortSignal.timeout(timeoutMs));
      return true;
    } catch (error) {
      this.logger.warn("MCP health check failed", { error: describeError(error) });
      return false;
    }
  }

  /** Closes the MCP session. */
  close(): Promise<void> {
    return this.caller.close();
  }
}

export interface GoogleTrendsFromUrlOptions {
  mcpUrl: string;
  geo?: string;
  timeoutMs?: number;
  logger?: Logger<ILogObj>;
}

export function createGoogleTrendsTool(options: GoogleTrendsFromUrlOptions): GoogleTrendsTool {
  return new GoogleTrendsTool({
    caller: new McpHttpClient({ url: options.mcpUrl, timeoutMs: options.timeoutMs }),
    geo: options.geo,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });
}
