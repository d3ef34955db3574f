/**
 * Completion client for OpenAI-compatible chat APIs (Groq by default).
 */

import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import {
  DEFAULT_COMPLETION_BASE_URL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
} from "../core/constants.js";
import { ConfigError, GenerationFailure } from "../core/errors.js";
import type { ChatMessage } from "../core/messages.js";
import { type BaseCompletionClientOptions, BaseCompletionClient } from "./completion-client.js";

/**
 * The part of the OpenAI SDK this client calls. `new OpenAI().chat.completions` satisfies it.
 */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; maxRetries?: number },
  ): PromiseLike<{ choices: Array<{ message?: { content?: string | null } | null }> }>;
}

export interface OpenAICompletionClientOptions extends BaseCompletionClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Replaces the SDK client, e.g. in tests */
  completions?: ChatCompletionsApi;
}

function convertMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAICompletionClient extends BaseCompletionClient {
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly completions: ChatCompletionsApi;

  constructor(options: OpenAICompletionClientOptions = {}) {
    super(options);
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

    if (options.completions) {
      this.completions = options.completions;
    } else {
      if (!options.apiKey) {
        throw new ConfigError(["GROQ_API_KEY: Required"]);
      }
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL ?? DEFAULT_COMPLETION_BASE_URL,
      });
      this.completions = client.chat.completions;
    }
  }

  protected async request(messages: readonly ChatMessage[], signal: AbortSignal): Promise<string> {
    const response = await this.completions.create(
      {
        model: this.model,
        messages: messages.map(convertMessage),
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        stream: false,
      },
      { signal, maxRetries: 0 },
    );

    const content = response.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new GenerationFailure("Completion backend returned no content");
    }
    return content;
  }

  protected override describeFailure(error: unknown): string {
    const base = super.describeFailure(error);
    const message = error instanceof Error ? error.message.toLowerCase() : "";

    if (message.includes("429") || message.includes("rate limit")) {
      return `${base}\nRate limit exceeded at the completion backend.`;
    }
    if (message.includes("401") || message.includes("invalid api key")) {
      return `${base}\nAuthentication failed. Check that GROQ_API_KEY is set correctly.`;
    }
    return base;
  }
}
