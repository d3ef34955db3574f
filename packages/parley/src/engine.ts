import type { ILogObj, Logger } from "tslog";
import { ChatAgent } from "./agent/agent.js";
import type { CompletionClient } from "./client/completion-client.js";
import { OpenAICompletionClient } from "./client/openai-client.js";
import type { EngineConfig } from "./core/config.js";
import { createLogger } from "./logging/logger.js";
import type { MessageStore } from "./store/message-store.js";
import { ToolExecutor } from "./tools/executor.js";
import { type GoogleTrendsTool, createGoogleTrendsTool } from "./tools/google-trends.js";
import { ToolRegistry } from "./tools/registry.js";
import { TavilySearchTool } from "./tools/tavily-search.js";
import type { Tool } from "./tools/tool.js";

export interface EngineOverrides {
  logger?: Logger<ILogObj>;
  /** Replaces the OpenAI-compatible client built from the config */
  completionClient?: CompletionClient;
  /** Replaces the default Tavily and Google Trends tools */
  tools?: Tool[];
}

export interface Engine {
  agent: ChatAgent;
  executor: ToolExecutor;
  /** Present when the default tool set is in use */
  trends?: GoogleTrendsTool;
}

/**
 * Wires the completion client, the tools and the agent from an {@link EngineConfig}.
 *
 * @example
 * ```typescript
 * const { agent } = createEngine(loadEngineConfig(), { store: new InMemoryConversationStore() });
 * ```
 */
export function createEngine(
  config: EngineConfig,
  options: EngineOverrides & { store: MessageStore },
): Engine {
  const logger = options.logger ?? createLogger();

  const completionClient =
    options.completionClient ??
    new OpenAICompletionClient({
      ...config.completion,
      defaultTimeoutMs: config.agent.generationTimeoutMs,
      logger: logger.getSubLogger({ name: "completion" }),
    });

  let trends: GoogleTrendsTool | undefined;
  let tools = options.tools;
  if (!tools) {
    trends = createGoogleTrendsTool({
      mcpUrl: config.tools.mcpUrl,
      geo: config.tools.trendsGeo,
      timeoutMs: config.tools.mcpTimeoutMs,
      logger: logger.getSubLogger({ name: "trends" }),
    });
    tools = [
      new TavilySearchTool({
        apiKey: config.tools.tavilyApiKey,
        maxResults: config.tools.tavilyMaxResults,
      }),
      trends,
    ];
  }

  const executor = new ToolExecutor(ToolRegistry.from(tools), {
    outputLimit: config.agent.toolOutputLimit,
    logger: logger.getSubLogger({ name: "executor" }),
  });

  const agent = new ChatAgent({
    completionClient,
    tools: executor,
    store: options.store,
    logger: logger.getSubLogger({ name: "agent" }),
    maxIterations: config.agent.maxIterations,
    generationTimeoutMs: config.agent.generationTimeoutMs,
    historyLimit: config.agent.historyLimit,
  });

  return { agent, executor, trends };
}
