import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { ILogObj, Logger } from "tslog";
import WebSocket from "ws";
import { z } from "zod";
import { DEFAULT_MESSAGE_PAGE_SIZE } from "../core/constants.js";
import type { ChatMessage } from "../core/messages.js";
import { createLogger } from "../logging/logger.js";
import {
  type ConversationRecord,
  type ConversationStore,
  type MessageRecord,
  type StoredRole,
  toChatMessage,
} from "./message-store.js";

const conversationRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const messageRowSchema = z.object({
  id: z.string(),
  conversation_id: z.string(),
  user_id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  created_at: z.string(),
});

interface PostgrestErrorLike {
  message: string;
}

export class StoreError extends Error {
  constructor(operation: string, cause: PostgrestErrorLike) {
    super(`Failed to ${operation}: ${cause.message}`, { cause });
    this.name = "StoreError";
  }
}

export interface SupabaseStoreOptions {
  logger?: Logger<ILogObj>;
  now?: () => Date;
}

/**
 * Conversation store over the Supabase `conversations` and `messages` tables.
 * Use a service-role key: queries filter by user id themselves.
 */
export class SupabaseConversationStore implements ConversationStore {
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => Date;

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseStoreOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "parley:store" });
    this.now = options.now ?? (() => new Date());
  }

  static fromCredentials(
    url: string,
    key: string,
    options: SupabaseStoreOptions & { fetch?: typeof fetch } = {},
  ): SupabaseConversationStore {
    const client = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
      // Node 20 has no global WebSocket for the realtime client
      realtime: { transport: WebSocket },
      global: options.fetch ? { fetch: options.fetch } : undefined,
    });
    return new SupabaseConversationStore(client, options);
  }

  async createConversation(userId: string, title: string): Promise<ConversationRecord> {
    const { data, error } = await this.client
      .from("conversations")
      .insert({ user_id: userId, title })
      .select()
      .single();
    if (error) throw new StoreError("create conversation", error);

    const conversation = conversationRowSchema.parse(data);
    this.logger.info("Conversation created", { conversationId: conversation.id });
    return conversation;
  }

  async listConversations(userId: string): Promise<ConversationRecord[]> {
    const { data, error } = await this.client
      .from("conversations")
      .select("*")
      .eq("user_id", userId)
      .order("updated_at", { ascending: false });
    if (error) throw new StoreError("list conversations", error);

    return z.array(conversationRowSchema).parse(data ?? []);
  }

  async getConversation(conversationId: string, userId: string): Promise<ConversationRecord | null> {
    const { data, error } = await this.client
      .from("conversations")
      .select("*")
      .eq("id", conversationId)
      .eq("user_id", userId)
      .maybeSingle();
    if (error) throw new StoreError("get conversation", error);

    return data ? conversationRowSchema.parse(data) : null;
  }

  async getMessages(
    conversationId: string,
    userId: string,
    limit = DEFAULT_MESSAGE_PAGE_SIZE,
  ): Promise<MessageRecord[]> {
    const { data, error } = await this.client
      .from("messages")
      .select("*")
      .eq("conversation_id", conversationId)
      .eq("user_id", userId)
      .order("created_at", { ascending: true })
      .limit(limit);
    if (error) throw new StoreError("get messages", error);

    return z.array(messageRowSchema).parse(data ?? []);
  }

  async getRecentMessages(
    conversationId: string,
    userId: string,
    limit: number,
  ): Promise<ChatMessage[]> {
    if (limit <= 0) return [];

    const { data, error } = await this.client
      .from("messages")
      .select("role, content")
      .eq("conversation_id", conversationId)
      .eq("user_id", userId)
      .order("created_at", { ascending: false })
      .limit(limit);
    if (error) throw new StoreError("get recent messages", error);

    const rows = z.array(messageRowSchema.pick({ role: true, content: true })).parse(data ?? []);
    return rows.reverse().map(toChatMessage);
  }

  async saveMessage(
    conversationId: string,
    userId: string,
    role: StoredRole,
    content: string,
  ): Promise<MessageRecord> {
    const { data, error } = await this.client
      .from("messages")
      .insert({ conversation_id: conversationId, user_id: userId, role, content })
      .select()
      .single();
    if (error) throw new StoreError("save message", error);

    const message = messageRowSchema.parse(data);
    this.logger.debug("Message saved", { messageId: message.id, role });

    const touched = await this.client
      .from("conversations")
      .update({ updated_at: this.now().toISOString() })
      .eq("id", conversationId)
      .eq("user_id", userId);
    if (touched.error) {
      this.logger.warn("Failed to update conversation timestamp", {
        conversationId,
        error: touched.error.message,
      });
    }

    return message;
  }

  async ping(): Promise<boolean> {
    const { error } = await this.client
      .from("conversations")
      .select("id", { head: true, count: "exact" })
      .limit(1);
    if (error) {
      this.logger.warn("Store health check failed", { error: error.message });
      return false;
    }
    return true;
  }
}
