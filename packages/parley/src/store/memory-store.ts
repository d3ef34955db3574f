import { randomUUID } from "node:crypto";
import { DEFAULT_MESSAGE_PAGE_SIZE } from "../core/constants.js";
import type { ChatMessage } from "../core/messages.js";
import {
  type ConversationRecord,
  type ConversationStore,
  type MessageRecord,
  type StoredRole,
  toChatMessage,
} from "./message-store.js";

export interface InMemoryStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Process-local store for the CLI and tests. Data is lost on exit.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, ConversationRecord & { seq: number }>();
  private readonly messages: MessageRecord[] = [];
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private seq = 0;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createConversation(userId: string, title: string): Promise<ConversationRecord> {
    const timestamp = this.now().toISOString();
    const record = {
      id: this.generateId(),
      user_id: userId,
      title,
      created_at: timestamp,
      updated_at: timestamp,
      seq: ++this.seq,
    };
    this.conversations.set(record.id, record);
    return stripSeq(record);
  }

  async listConversations(userId: string): Promise<ConversationRecord[]> {
    return Array.from(this.conversations.values())
      .filter((conversation) => conversation.user_id === userId)
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at) || b.seq - a.seq)
      .map(stripSeq);
  }

  async getConversation(conversationId: string, userId: string): Promise<ConversationRecord | null> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || conversation.user_id !== userId) {
      return null;
    }
    return stripSeq(conversation);
  }

  async getMessages(
    conversationId: string,
    userId: string,
    limit = DEFAULT_MESSAGE_PAGE_SIZE,
  ): Promise<MessageRecord[]> {
    return this.messagesOf(conversationId, userId)
      .slice(0, Math.max(0, limit))
      .map((message) => ({ ...message }));
  }

  async getRecentMessages(
    conversationId: string,
    userId: string,
    limit: number,
  ): Promise<ChatMessage[]> {
    if (limit <= 0) return [];
    return this.messagesOf(conversationId, userId).slice(-limit).map(toChatMessage);
  }

  async saveMessage(
    conversationId: string,
    userId: string,
    role: StoredRole,
    content: string,
  ): Promise<MessageRecord> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || conversation.user_id !== userId) {
      throw new Error(`Conversation ${conversationId} not found`);
    }

    const timestamp = this.now().toISOString();
    const record: MessageRecord = {
      id: this.generateId(),
      conversation_id: conversationId,
      user_id: userId,
      role,
      content,
      created_at: timestamp,
    };
    this.messages.push(record);
    conversation.updated_at = timestamp;
    conversation.seq = ++this.seq;
    return { ...record };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private messagesOf(conversationId: string, userId: string): MessageRecord[] {
    return this.messages.filter(
      (message) => message.conversation_id === conversationId && message.user_id === userId,
    );
  }
}

function stripSeq({ seq: _seq, ...record }: ConversationRecord & { seq: number }): ConversationRecord {
  return record;
}
