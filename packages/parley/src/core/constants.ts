// Action directive markers
export const ACTION_MARKER = "ACTION:";
export const INPUT_MARKER = "INPUT:";

/** Prefix of the synthetic user turn that carries a tool result back to the model */
export const TOOL_RESULT_PREFIX = "Tool result:";

// Default configuration values
export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;
export const DEFAULT_HISTORY_LIMIT = 10;
export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_COMPLETION_BASE_URL = "https://api.groq.com/openai/v1";

/** Tool text longer than this is cut before it is folded into history */
export const DEFAULT_TOOL_OUTPUT_LIMIT = 4000;
export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

/** Default page size when listing a conversation's messages */
export const DEFAULT_MESSAGE_PAGE_SIZE = 50;

// Status texts carried by lifecycle events
export const STATUS_LOADING = "Agent is thinking...";
export const STATUS_RESPONDING = "Generating response...";
export const STATUS_STREAMING = "Streaming response...";
