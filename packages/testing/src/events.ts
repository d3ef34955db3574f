import type { AgentEvent, AgentEventType } from "parley";

/**
 * Drains an event sequence into an array.
 */
export async function collectEvents(events: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const collected: AgentEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

export function eventTypes(events: readonly AgentEvent[]): AgentEventType[] {
  return events.map((event) => event.type);
}

/** Concatenated `token` payloads. */
export function streamedText(events: readonly AgentEvent[]): string {
  return events.map((event) => (event.type === "token" ? event.data.token : "")).join("");
}
