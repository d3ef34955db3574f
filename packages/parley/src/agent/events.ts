// =============================================================================
// Agent event protocol
// =============================================================================

export interface ToolActivity {
  tool: string;
  status: "started" | "completed";
  message?: string;
  error?: string;
}

/**
 * Events yielded by {@link ChatAgent.process}, in state-machine order.
 * Exactly one `done` or `error` closes every sequence.
 */
export type AgentEvent =
  | { type: "loading"; data: { status: string } }
  | { type: "responding"; data: { status: string } }
  | { type: "tool_activity"; data: ToolActivity }
  | { type: "streaming"; data: { status: string } }
  | { type: "token"; data: { token: string } }
  | { type: "done"; data: { message_id: string } }
  | { type: "error"; data: { error: string } };

export type AgentEventType = AgentEvent["type"];

export type TerminalEvent = Extract<AgentEvent, { type: "done" | "error" }>;

export const isTerminalEvent = (event: AgentEvent): event is TerminalEvent =>
  event.type === "done" || event.type === "error";

/**
 * Splits final text on whitespace. Each token carries one trailing space, so
 * concatenating them gives the whitespace-joined words plus a final space.
 */
export function tokenize(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => `${word} `);
}
