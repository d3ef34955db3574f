// Agent loop and its event protocol
export type { Action, ActionExtractor } from "./agent/action-parser.js";
export { ActionParser } from "./agent/action-parser.js";
export type { AgentPhase, ChatAgentOptions } from "./agent/agent.js";
export { ChatAgent, renderToolResult } from "./agent/agent.js";
export type { AgentEvent, AgentEventType, TerminalEvent, ToolActivity } from "./agent/events.js";
export { isTerminalEvent, tokenize } from "./agent/events.js";
export { buildSystemPrompt } from "./agent/system-prompt.js";

// Completion clients
export type {
  BaseCompletionClientOptions,
  CompletionClient,
  CompletionOptions,
} from "./client/completion-client.js";
export { BaseCompletionClient } from "./client/completion-client.js";
export type { ChatCompletionsApi, OpenAICompletionClientOptions } from "./client/openai-client.js";
export { OpenAICompletionClient } from "./client/openai-client.js";

// Core
export type { AgentConfig, CompletionConfig, EngineConfig, Env, ToolsConfig } from "./core/config.js";
export {
  envInt,
  envPositiveNumber,
  envString,
  envStringDefault,
  envUrl,
  formatIssues,
  loadEngineConfig,
  parseEnv,
} from "./core/config.js";
export * from "./core/constants.js";
export {
  ConfigError,
  describeError,
  GenerationFailure,
  GenerationTimeout,
  isAbortError,
  ToolTimeout,
} from "./core/errors.js";
export type { ChatMessage, MessageRole } from "./core/messages.js";
export { ChatMessageBuilder } from "./core/messages.js";

export type { Engine, EngineOverrides } from "./engine.js";
export { createEngine } from "./engine.js";

// Logging
export type { LogFormat, LoggerOptions } from "./logging/logger.js";
export { createLogger } from "./logging/logger.js";

// Persistence
export type { InMemoryStoreOptions } from "./store/memory-store.js";
export { InMemoryConversationStore } from "./store/memory-store.js";
export type {
  ConversationRecord,
  ConversationStore,
  MessageRecord,
  MessageStore,
  StoredRole,
} from "./store/message-store.js";
export type { SupabaseStoreOptions } from "./store/supabase-store.js";
export { StoreError, SupabaseConversationStore } from "./store/supabase-store.js";

// Tools
export type { ToolExecutorOptions, ToolInvoker } from "./tools/executor.js";
export { ToolExecutor, truncateOutput, UNKNOWN_TOOL_ERROR } from "./tools/executor.js";
export type { GoogleTrendsOptions, Trend, TrendsData } from "./tools/google-trends.js";
export { createGoogleTrendsTool, GoogleTrendsTool } from "./tools/google-trends.js";
export type { McpHttpClientOptions, McpToolCaller } from "./tools/mcp-client.js";
export { McpHttpClient } from "./tools/mcp-client.js";
export { ToolRegistry } from "./tools/registry.js";
export type { TavilySearchData, TavilySearchOptions } from "./tools/tavily-search.js";
export { TavilySearchTool } from "./tools/tavily-search.js";
export type { CreateToolConfig, Tool, ToolResult } from "./tools/tool.js";
export { AbstractTool, createTool } from "./tools/tool.js";
