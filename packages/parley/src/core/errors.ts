/**
 * Error types shared by the engine, the server and the CLI.
 */

/**
 * Raised by a completion client when the backend does not answer within the
 * caller-supplied timeout.
 */
export class GenerationTimeout extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "GenerationTimeout";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised by a completion client for any transport or backend error.
 * The original error is kept as `cause`.
 */
export class GenerationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationFailure";
  }
}

/**
 * Raised inside the tool executor when a tool exceeds its time limit.
 * Never escapes the executor.
 */
export class ToolTimeout extends Error {
  public readonly toolName: string;
  public readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeout";
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when environment configuration fails validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * True for cancellations: `AbortError`, the OpenAI SDK's `APIUserAbortError`, or a
 * message mentioning abort/cancel.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error.name === "AbortError") return true;
  if (error.name === "APIUserAbortError") return true;

  const message = error.message.toLowerCase();
  if (message.includes("abort")) return true;
  if (message.includes("cancelled")) return true;
  if (message.includes("canceled")) return true;

  return false;
}

/**
 * Human-readable text for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
