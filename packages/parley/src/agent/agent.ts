/**
 * ChatAgent: the iterate/act/observe loop behind one chat turn.
 *
 * Each call to {@link ChatAgent.process} owns its own loop state, so one agent
 * instance can serve concurrent requests. Events are produced lazily: nothing
 * runs until the consumer pulls, and a consumer that stops pulling stops the loop.
 */

import type { ILogObj, Logger } from "tslog";
import type { CompletionClient } from "../client/completion-client.js";
import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_MAX_ITERATIONS,
  STATUS_LOADING,
  STATUS_RESPONDING,
  STATUS_STREAMING,
} from "../core/constants.js";
import { describeError } from "../core/errors.js";
import { type ChatMessage, ChatMessageBuilder } from "../core/messages.js";
import { createLogger } from "../logging/logger.js";
import type { MessageRecord, MessageStore } from "../store/message-store.js";
import type { ToolInvoker } from "../tools/executor.js";
import type { ToolResult } from "../tools/tool.js";
import { type Action, type ActionExtractor, ActionParser } from "./action-parser.js";
import { type AgentEvent, tokenize } from "./events.js";
import { buildSystemPrompt } from "./system-prompt.js";

export type AgentPhase =
  | "seeded"
  | "generating"
  | "acting"
  | "finalizing"
  | "streaming"
  | "persisted"
  | "done"
  | "errored";

interface LoopState {
  phase: AgentPhase;
  iteration: number;
  messages: ChatMessageBuilder;
  lastCompletion: string;
}

type SaveOutcome = { ok: true; record: MessageRecord } | { ok: false; error: unknown };

export interface ChatAgentOptions {
  completionClient: CompletionClient;
  tools: ToolInvoker;
  store: MessageStore;
  logger?: Logger<ILogObj>;
  /** Completions allowed per turn before the last one is used as the answer */
  maxIterations?: number;
  /** Limit for each completion call */
  generationTimeoutMs?: number;
  /** Prior turns replayed into the context */
  historyLimit?: number;
  /** Replaces the prompt generated from the registered tools */
  systemPrompt?: string;
  /** Replaces the ACTION/INPUT directive parser */
  parser?: ActionExtractor;
}

export class ChatAgent {
  private readonly completionClient: CompletionClient;
  private readonly tools: ToolInvoker;
  private readonly store: MessageStore;
  private readonly logger: Logger<ILogObj>;
  private readonly maxIterations: number;
  private readonly generationTimeoutMs: number;
  private readonly historyLimit: number;
  private readonly systemPrompt: string;
  private readonly parser: ActionExtractor;

  constructor(options: ChatAgentOptions) {
    this.completionClient = options.completionClient;
    this.tools = options.tools;
    this.store = options.store;
    this.logger = options.logger ?? createLogger({ name: "parley:agent" });
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.generationTimeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt(this.tools.tools);
    this.parser = options.parser ?? new ActionParser(this.tools.toolNames);

    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new Error(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  /**
   * Runs one chat turn and yields its events. The last event is always `done` or `error`.
   *
   * @example
   * ```typescript
   * for await (const event of agent.process("What's trending?", conversationId, userId)) {
   *   if (event.type === "token") process.stdout.write(event.data.token);
   * }
   * ```
   */
  async *process(
    userMessage: string,
    conversationId: string,
    userId: string,
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const state: LoopState = {
      phase: "seeded",
      iteration: 0,
      messages: new ChatMessageBuilder(),
      lastCompletion: "",
    };

    try {
      yield { type: "loading", data: { status: STATUS_LOADING } };

      const history = await this.loadHistory(conversationId, userId, userMessage);
      state.messages.addSystem(this.systemPrompt).addHistory(history).addUser(userMessage);

      this.logger.info("Processing message", {
        conversationId,
        userId,
        historyLength: history.length,
      });

      let finalText: string | undefined;
      while (finalText === undefined) {
        state.iteration++;
        if (state.iteration > this.maxIterations) {
          this.logger.warn("Max iterations reached, using last response", {
            maxIterations: this.maxIterations,
          });
          finalText = state.lastCompletion;
          break;
        }

        state.phase = "generating";
        this.logger.debug("Starting iteration", {
          iteration: state.iteration,
          maxIterations: this.maxIterations,
        });
        yield { type: "responding", data: { status: STATUS_RESPONDING } };

        const completion = await this.completionClient.complete(state.messages.build(), {
          timeoutMs: this.generationTimeoutMs,
        });
        state.lastCompletion = completion;

        const action = this.parser.parse(completion);
        if (!action) {
          this.logger.info("Final response generated", { iteration: state.iteration });
          finalText = completion;
          break;
        }

        state.phase = "acting";
        yield* this.act(action, completion, state);
      }

      state.phase = "finalizing";
      yield { type: "streaming", data: { status: STATUS_STREAMING } };

      // The save starts before streaming so a disconnect mid-stream still persists the answer
      const saving = this.persist(conversationId, userId, finalText);

      state.phase = "streaming";
      for (const token of tokenize(finalText)) {
        yield { type: "token", data: { token } };
      }

      const outcome = await saving;
      if (!outcome.ok) {
        throw outcome.error;
      }
      state.phase = "persisted";

      yield { type: "done", data: { message_id: outcome.record.id } };
      state.phase = "done";
    } catch (error) {
      const message = describeError(error);
      this.logger.error("Agent processing failed", {
        phase: state.phase,
        iteration: state.iteration,
        error: message,
      });
      state.phase = "errored";
      yield { type: "error", data: { error: message } };
    }
  }

  private async *act(
    action: Action,
    completion: string,
    state: LoopState,
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const label = this.tools.labelFor(action.toolName);
    this.logger.info("Tool action detected", {
      tool: action.toolName,
      iteration: state.iteration,
    });

    yield {
      type: "tool_activity",
      data: { tool: action.toolName, status: "started", message: `Using ${label}...` },
    };

    const result = await this.tools.invoke(action.toolName, action.input);

    yield {
      type: "tool_activity",
      data: result.success
        ? { tool: action.toolName, status: "completed" }
        : { tool: action.toolName, status: "completed", error: result.error },
    };

    state.messages.addAssistant(completion).addToolResult(renderToolResult(label, result));
  }

  /**
   * The last `historyLimit` turns before the current one. The current turn may
   * already be stored, so one extra row is read and dropped when it matches.
   */
  private async loadHistory(
    conversationId: string,
    userId: string,
    userMessage: string,
  ): Promise<ChatMessage[]> {
    if (this.historyLimit <= 0) return [];
    const recent = await this.store.getRecentMessages(conversationId, userId, this.historyLimit + 1);
    return withoutCurrentTurn(recent, userMessage).slice(-this.historyLimit);
  }

  private persist(conversationId: string, userId: string, content: string): Promise<SaveOutcome> {
    return this.store.saveMessage(conversationId, userId, "assistant", content).then(
      (record): SaveOutcome => ({ ok: true, record }),
      (error: unknown): SaveOutcome => ({ ok: false, error }),
    );
  }
}

/**
 * Text folded back into history for a tool call. Failures still produce text so
 * the model can carry on from its own knowledge.
 */
export function renderToolResult(label: string, result: ToolResult): string {
  if (result.success) {
    return result.payload;
  }
  return `${label} unavailable (error: ${result.error ?? "unknown error"}). Continue with your own background knowledge.`;
}

/**
 * Drops a trailing stored user turn equal to the message being processed, since
 * transports save the user turn before the loop starts.
 */
function withoutCurrentTurn(history: ChatMessage[], userMessage: string): ChatMessage[] {
  const last = history[history.length - 1];
  if (last && last.role === "user" && last.content === userMessage) {
    return history.slice(0, -1);
  }
  return history;
}
