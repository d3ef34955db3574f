import {
  type ChatMessage,
  type CompletionClient,
  type CompletionOptions,
  GenerationFailure,
  GenerationTimeout,
} from "parley";

/**
 * One scripted completion. A string resolves, an Error rejects, and a delayed
 * reply waits first (rejecting with GenerationTimeout when the caller's timeout
 * is shorter than the delay).
 */
export type ScriptedReply = string | Error | { text: string; delayMs: number };

export interface RecordedCompletion {
  messages: ChatMessage[];
  options: CompletionOptions;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Completion client that replays a fixed script and records every call.
 *
 * @example
 * ```typescript
 * const client = new ScriptedCompletionClient([
 *   "ACTION: Tavily_Search\nINPUT: AI news",
 *   "Here is what I found.",
 * ]);
 * ```
 */
export class ScriptedCompletionClient implements CompletionClient {
  readonly calls: RecordedCompletion[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  /** Appends replies after construction. */
  enqueue(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.replies.length;
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    this.calls.push({ messages: [...messages], options });

    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new GenerationFailure("Scripted completion client has no replies left");
    }
    if (typeof reply === "string") {
      return reply;
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const { timeoutMs } = options;
    if (timeoutMs !== undefined && timeoutMs < reply.delayMs) {
      await sleep(timeoutMs);
      throw new GenerationTimeout(timeoutMs);
    }
    await sleep(reply.delayMs);
    return reply.text;
  }
}
