/**
 * A named capability the model can request with an action directive.
 *
 * Implementations may throw from {@link Tool.call}; the {@link ToolExecutor}
 * turns every failure into a {@link ToolResult}.
 */
export interface Tool {
  /** Identifier the model writes after `ACTION:`. Matched exactly. */
  readonly name: string;
  /** One-line description listed in the system prompt */
  readonly description: string;
  /** Display name used in `tool_activity` messages */
  readonly label: string;
  /** Per-tool time limit; the executor default applies when unset */
  readonly timeoutMs?: number;

  /**
   * Runs the tool and renders its output as text for the model.
   * The signal is aborted when the executor gives up on the call.
   */
  call(input: string, signal: AbortSignal): Promise<string>;
}

/**
 * Normalized outcome of one tool invocation.
 */
export interface ToolResult {
  success: boolean;
  payload: string;
  error?: string;
}

/**
 * Base class for tools that fetch structured data and render it separately.
 *
 * @example
 * ```typescript
 * class Clock extends AbstractTool<Date> {
 *   readonly name = "Clock";
 *   readonly description = "Current server time";
 *   readonly label = "Clock";
 *
 *   async fetch(): Promise<Date> {
 *     return new Date();
 *   }
 *
 *   format(data: Date): string {
 *     return data.toISOString();
 *   }
 * }
 * ```
 */
export abstract class AbstractTool<TData> implements Tool {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly label: string;
  readonly timeoutMs?: number;

  abstract fetch(input: string, signal: AbortSignal): Promise<TData>;

  abstract format(data: TData): string;

  async call(input: string, signal: AbortSignal): Promise<string> {
    const data = await this.fetch(input, signal);
    return this.format(data);
  }
}

export interface CreateToolConfig {
  name: string;
  description: string;
  /** Defaults to the name */
  label?: string;
  timeoutMs?: number;
  execute: (input: string, signal: AbortSignal) => string | Promise<string>;
}

/**
 * Builds a tool from a plain function.
 */
export function createTool(config: CreateToolConfig): Tool {
  return {
    name: config.name,
    description: config.description,
    label: config.label ?? config.name,
    timeoutMs: config.timeoutMs,
    call: async (input, signal) => config.execute(input, signal),
  };
}
