import type { ILogObj, Logger } from "tslog";
import { DEFAULT_GENERATION_TIMEOUT_MS } from "../core/constants.js";
import {
  describeError,
  GenerationFailure,
  GenerationTimeout,
  isAbortError,
} from "../core/errors.js";
import type { ChatMessage } from "../core/messages.js";
import { createLogger } from "../logging/logger.js";

export interface CompletionOptions {
  /** Wall-clock limit for this call */
  timeoutMs?: number;
}

/**
 * One request/response exchange with a text-generation backend.
 *
 * Rejects with {@link GenerationTimeout} when no answer arrives in time and with
 * {@link GenerationFailure} for anything else. Single attempt, no retries.
 */
export interface CompletionClient {
  complete(messages: readonly ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface BaseCompletionClientOptions {
  defaultTimeoutMs?: number;
  logger?: Logger<ILogObj>;
}

/**
 * Template for completion clients: subclasses implement {@link BaseCompletionClient.request},
 * the base class owns the timeout and the error taxonomy.
 */
export abstract class BaseCompletionClient implements CompletionClient {
  protected readonly logger: Logger<ILogObj>;
  private readonly defaultTimeoutMs: number;

  constructor(options: BaseCompletionClientOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: "parley:completion" });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
  }

  /**
   * Sends the messages and resolves with the generated text.
   * `signal` is aborted when the caller's timeout expires.
   */
  protected abstract request(messages: readonly ChatMessage[], signal: AbortSignal): Promise<string>;

  /**
   * Message for a backend error. Override for backend-specific guidance.
   */
  protected describeFailure(error: unknown): string {
    return `Completion request failed: ${describeError(error)}`;
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const abortController = new AbortController();
    const startTime = Date.now();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const timeoutError = new GenerationTimeout(timeoutMs);
        abortController.abort(timeoutError.message);
        reject(timeoutError);
      }, timeoutMs);
    });

    try {
      const text = await Promise.race([this.request(messages, abortController.signal), timeout]);
      this.logger.debug("Completion received", {
        messageCount: messages.length,
        length: text.length,
        elapsedMs: Date.now() - startTime,
      });
      return text;
    } catch (error) {
      if (error instanceof GenerationTimeout || error instanceof GenerationFailure) {
        this.logger.error(error.message);
        throw error;
      }
      if (abortController.signal.aborted) {
        throw new GenerationTimeout(timeoutMs);
      }
      // Cancelled somewhere below us, not by the timer
      const message = isAbortError(error)
        ? "Completion request was aborted before completing"
        : this.describeFailure(error);
      const failure = new GenerationFailure(message, { cause: error });
      this.logger.error(failure.message);
      throw failure;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
