import { TOOL_RESULT_PREFIX } from "./constants.js";

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export class ChatMessageBuilder {
  private readonly messages: ChatMessage[] = [];

  addSystem(content: string): this {
    this.messages.push({ role: "system", content });
    return this;
  }

  addUser(content: string): this {
    this.messages.push({ role: "user", content });
    return this;
  }

  addAssistant(content: string): this {
    this.messages.push({ role: "assistant", content });
    return this;
  }

  /**
   * Replays prior turns in the order given. System turns in stored history are skipped.
   */
  addHistory(history: readonly ChatMessage[]): this {
    for (const message of history) {
      if (message.role === "system") continue;
      this.messages.push({ role: message.role, content: message.content });
    }
    return this;
  }

  /**
   * Adds a tool result as a synthetic user turn, prefixed so the model can tell it
   * apart from genuine user input.
   */
  addToolResult(text: string): this {
    this.messages.push({ role: "user", content: `${TOOL_RESULT_PREFIX}\n${text}` });
    return this;
  }

  build(): ChatMessage[] {
    return [...this.messages];
  }
}
