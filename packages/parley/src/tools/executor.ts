import type { ILogObj, Logger } from "tslog";
import { DEFAULT_TOOL_OUTPUT_LIMIT, DEFAULT_TOOL_TIMEOUT_MS } from "../core/constants.js";
import { describeError, ToolTimeout } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import type { ToolRegistry } from "./registry.js";
import type { Tool, ToolResult } from "./tool.js";

export const UNKNOWN_TOOL_ERROR = "unknown tool";

export interface ToolExecutorOptions {
  /** Applies to tools without their own `timeoutMs`. 0 disables the limit. */
  defaultTimeoutMs?: number;
  /** Maximum characters of tool text returned in a payload */
  outputLimit?: number;
  logger?: Logger<ILogObj>;
}

/**
 * Cuts text to `limit` characters and appends a notice with the original size.
 */
export function truncateOutput(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}\n\n[Output truncated: showing ${limit} of ${text.length} characters]`;
}

/**
 * What the agent loop needs from its tools.
 */
export interface ToolInvoker {
  readonly toolNames: string[];
  readonly tools: Tool[];
  labelFor(name: string): string;
  invoke(name: string, input: string): Promise<ToolResult>;
}

/**
 * Invokes registered tools. {@link ToolExecutor.invoke} never rejects: unknown names,
 * timeouts and thrown errors all come back as `success: false`.
 */
export class ToolExecutor implements ToolInvoker {
  private readonly logger: Logger<ILogObj>;
  private readonly defaultTimeoutMs: number;
  private readonly outputLimit: number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolExecutorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "parley:executor" });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.outputLimit = options.outputLimit ?? DEFAULT_TOOL_OUTPUT_LIMIT;
  }

  get toolNames(): string[] {
    return this.registry.getNames();
  }

  get tools(): Tool[] {
    return this.registry.getAll();
  }

  /** Display name for a tool, falling back to the raw name. */
  labelFor(name: string): string {
    return this.registry.get(name)?.label ?? name;
  }

  /**
   * Creates a promise that rejects with a ToolTimeout after the specified timeout.
   * Aborts the controller before rejecting so the tool can stop its own work.
   */
  private createTimeoutPromise(
    toolName: string,
    timeoutMs: number,
    abortController: AbortController,
  ): { promise: Promise<never>; cancel: () => void } {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const promise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const timeoutError = new ToolTimeout(toolName, timeoutMs);
        abortController.abort(timeoutError.message);
        reject(timeoutError);
      }, timeoutMs);
    });

    return {
      promise,
      cancel: () => clearTimeout(timeoutId),
    };
  }

  async invoke(name: string, input: string): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = this.registry.get(name);

    if (!tool) {
      this.logger.warn("Tool not found", { toolName: name, available: this.registry.getNames() });
      return { success: false, payload: "", error: UNKNOWN_TOOL_ERROR };
    }

    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;
    const abortController = new AbortController();

    this.logger.debug("Invoking tool", { toolName: name, input, timeoutMs });

    try {
      let text: string;
      if (timeoutMs > 0) {
        const timeout = this.createTimeoutPromise(name, timeoutMs, abortController);
        try {
          text = await Promise.race([tool.call(input, abortController.signal), timeout.promise]);
        } finally {
          timeout.cancel();
        }
      } else {
        text = await tool.call(input, abortController.signal);
      }

      const payload = truncateOutput(text, this.outputLimit);
      this.logger.info("Tool executed successfully", {
        toolName: name,
        executionTimeMs: Date.now() - startTime,
        outputLength: text.length,
        truncated: payload !== text,
      });
      return { success: true, payload };
    } catch (error) {
      const message = describeError(error);
      if (error instanceof ToolTimeout) {
        this.logger.error("Tool execution timed out", { toolName: name, timeoutMs });
      } else {
        this.logger.error("Tool execution failed", {
          toolName: name,
          error: message,
          executionTimeMs: Date.now() - startTime,
        });
      }
      return { success: false, payload: "", error: message };
    }
  }
}
