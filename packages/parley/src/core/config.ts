import { z } from "zod";
import {
  DEFAULT_COMPLETION_BASE_URL,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TOOL_OUTPUT_LIMIT,
} from "./constants.js";
import { ConfigError } from "./errors.js";

export type Env = Record<string, string | undefined>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

/** Optional string variable; blank counts as unset. */
export const envString = () => z.preprocess(blankToUndefined, z.string().trim().optional());

/** String variable with a default; blank counts as unset. */
export const envStringDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

export const envUrl = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().url().default(fallback));

export const envInt = (fallback: number, min = 1) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

export const envPositiveNumber = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().positive().default(fallback));

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validates environment variables against a zod schema.
 * @throws ConfigError listing every invalid variable
 */
export function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

const engineEnvSchema = z.object({
  GROQ_API_KEY: envString(),
  COMPLETION_BASE_URL: envUrl(DEFAULT_COMPLETION_BASE_URL),
  COMPLETION_MODEL: envStringDefault(DEFAULT_MODEL),
  COMPLETION_TEMPERATURE: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  ),
  COMPLETION_MAX_TOKENS: envInt(DEFAULT_MAX_TOKENS),
  AGENT_MAX_ITERATIONS: envInt(DEFAULT_MAX_ITERATIONS),
  AGENT_TIMEOUT: envPositiveNumber(30),
  AGENT_HISTORY_LIMIT: envInt(DEFAULT_HISTORY_LIMIT, 0),
  AGENT_TOOL_OUTPUT_LIMIT: envInt(DEFAULT_TOOL_OUTPUT_LIMIT),
  TAVILY_API_KEY: envString(),
  TAVILY_MAX_RESULTS: envInt(5),
  MCP_URL: envUrl("http://mcp:5000/mcp"),
  MCP_TIMEOUT: envPositiveNumber(10),
  TRENDS_GEO: envStringDefault("US"),
});

export interface CompletionConfig {
  apiKey?: string;
  baseURL: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AgentConfig {
  maxIterations: number;
  generationTimeoutMs: number;
  historyLimit: number;
  toolOutputLimit: number;
}

export interface ToolsConfig {
  tavilyApiKey?: string;
  tavilyMaxResults: number;
  mcpUrl: string;
  mcpTimeoutMs: number;
  trendsGeo: string;
}

export interface EngineConfig {
  completion: CompletionConfig;
  agent: AgentConfig;
  tools: ToolsConfig;
}

/**
 * Reads the engine configuration from the environment.
 * Timeouts are given in seconds and returned in milliseconds.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const parsed = parseEnv(engineEnvSchema, env);

  return {
    completion: {
      apiKey: parsed.GROQ_API_KEY,
      baseURL: parsed.COMPLETION_BASE_URL,
      model: parsed.COMPLETION_MODEL,
      temperature: parsed.COMPLETION_TEMPERATURE,
      maxTokens: parsed.COMPLETION_MAX_TOKENS,
    },
    agent: {
      maxIterations: parsed.AGENT_MAX_ITERATIONS,
      generationTimeoutMs: Math.round(parsed.AGENT_TIMEOUT * 1000),
      historyLimit: parsed.AGENT_HISTORY_LIMIT,
      toolOutputLimit: parsed.AGENT_TOOL_OUTPUT_LIMIT,
    },
    tools: {
      tavilyApiKey: parsed.TAVILY_API_KEY,
      tavilyMaxResults: parsed.TAVILY_MAX_RESULTS,
      mcpUrl: parsed.MCP_URL,
      mcpTimeoutMs: Math.round(parsed.MCP_TIMEOUT * 1000),
      trendsGeo: parsed.TRENDS_GEO,
    },
  };
}
