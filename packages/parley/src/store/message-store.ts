import type { ChatMessage } from "../core/messages.js";

export type StoredRole = "user" | "assistant";

/** A persisted chat turn, shaped like its database row. */
export interface MessageRecord {
  id: string;
  conversation_id: string;
  user_id: string;
  role: StoredRole;
  content: string;
  created_at: string;
}

export interface ConversationRecord {
  id: string;
  user_id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

/**
 * What the agent loop needs from persistence.
 */
export interface MessageStore {
  /** Up to `limit` most recent turns, oldest first. */
  getRecentMessages(conversationId: string, userId: string, limit: number): Promise<ChatMessage[]>;
  saveMessage(
    conversationId: string,
    userId: string,
    role: StoredRole,
    content: string,
  ): Promise<MessageRecord>;
}

/**
 * Full persistence surface used by the HTTP server and the CLI.
 * Every read is scoped to the owning user.
 */
export interface ConversationStore extends MessageStore {
  createConversation(userId: string, title: string): Promise<ConversationRecord>;
  /** Most recently updated first */
  listConversations(userId: string): Promise<ConversationRecord[]>;
  getConversation(conversationId: string, userId: string): Promise<ConversationRecord | null>;
  /** Oldest first, at most `limit` */
  getMessages(conversationId: string, userId: string, limit?: number): Promise<MessageRecord[]>;
  /** True when the backing service answers */
  ping(): Promise<boolean>;
}

export const toChatMessage = (record: Pick<MessageRecord, "role" | "content">): ChatMessage => ({
  role: record.role,
  content: record.content,
});
