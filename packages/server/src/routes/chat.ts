import { type Context, Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { streamSSE } from "hono/streaming";
import { type ConversationStore, describeError, formatIssues } from "parley";
import type { ILogObj, Logger } from "tslog";
import { z } from "zod";
import type { TokenVerifier } from "../auth/jwks.js";
import { requireAuth } from "../auth/middleware.js";
import type { AppEnv, TurnRunner } from "../types.js";

export const MAX_MESSAGE_LENGTH = 4096;

const createConversationSchema = z.object({
  title: z.string().trim().min(1).max(255),
});

const sendMessageSchema = z.object({
  conversation_id: z.string().min(1),
  content: z.string().min(1).max(MAX_MESSAGE_LENGTH),
});

async function readBody<T extends z.ZodTypeAny>(c: Context<AppEnv>, schema: T): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new HTTPException(422, { message: "Invalid JSON body" });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new HTTPException(422, { message: formatIssues(result.error).join("; ") });
  }
  return result.data;
}

export interface ChatRouteDependencies {
  agent: TurnRunner;
  store: ConversationStore;
  verifier: TokenVerifier;
  logger: Logger<ILogObj>;
}

export function createChatRoutes({ agent, store, verifier, logger }: ChatRouteDependencies) {
  const chat = new Hono<AppEnv>();
  chat.use("*", requireAuth(verifier));

  chat.post("/conversations", async (c) => {
    const { title } = await readBody(c, createConversationSchema);
    const conversation = await store.createConversation(c.var.userId, title);
    logger.info("Conversation created", {
      requestId: c.var.requestId,
      conversationId: conversation.id,
    });
    return c.json(conversation);
  });

  chat.get("/conversations", async (c) => {
    const conversations = await store.listConversations(c.var.userId);
    return c.json({ conversations, count: conversations.length });
  });

  chat.get("/conversations/:id/messages", async (c) => {
    const conversationId = c.req.param("id");
    const conversation = await store.getConversation(conversationId, c.var.userId);
    if (!conversation) {
      throw new HTTPException(404, { message: "Conversation not found" });
    }

    const messages = await store.getMessages(conversationId, c.var.userId);
    return c.json({ conversation_id: conversationId, messages, count: messages.length });
  });

  chat.post("/message", async (c) => {
    const { conversation_id: conversationId, content } = await readBody(c, sendMessageSchema);
    const { userId, requestId } = c.var;

    const conversation = await store.getConversation(conversationId, userId);
    if (!conversation) {
      throw new HTTPException(404, { message: "Conversation not found" });
    }

    await store.saveMessage(conversationId, userId, "user", content);
    logger.info("Message received", { requestId, userId, length: content.length });

    c.header("X-Accel-Buffering", "no");
    return streamSSE(
      c,
      async (stream) => {
        for await (const event of agent.process(content, conversationId, userId)) {
          if (stream.aborted) {
            logger.info("Client disconnected, stopping stream", { requestId });
            break;
          }
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event.data) });
          logger.debug("SSE event", { requestId, event: event.type });
        }
      },
      async (error, stream) => {
        const message = describeError(error);
        logger.error("Stream error", { requestId, error: message });
        await stream.writeSSE({ event: "error", data: JSON.stringify({ error: message }) });
      },
    );
  });

  return chat;
}
