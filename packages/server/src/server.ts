import { type ServerType, serve } from "@hono/node-server";
import {
  type ConversationStore,
  createEngine,
  createLogger,
  type Env,
  type EngineOverrides,
  InMemoryConversationStore,
  loadEngineConfig,
  SupabaseConversationStore,
} from "parley";
import type { ILogObj, Logger } from "tslog";
import { createApp } from "./app.js";
import { JwksKeyCache, JwksTokenVerifier, type TokenVerifier } from "./auth/jwks.js";
import { loadServerConfig, type ServerConfig } from "./config.js";

export interface StartServerOptions extends EngineOverrides {
  env?: Env;
  host?: string;
  port?: number;
  store?: ConversationStore;
  verifier?: TokenVerifier;
}

export interface RunningServer {
  url: string;
  server: ServerType;
  close(): Promise<void>;
}

function createStore(config: ServerConfig, logger: Logger<ILogObj>): ConversationStore {
  if (config.messageStore === "supabase" && config.supabase) {
    return SupabaseConversationStore.fromCredentials(config.supabase.url, config.supabase.key, {
      logger: logger.getSubLogger({ name: "store" }),
    });
  }
  logger.warn("Using the in-memory message store; conversations are lost on restart");
  return new InMemoryConversationStore();
}

function createVerifier(config: ServerConfig, logger: Logger<ILogObj>): TokenVerifier {
  if (!config.jwksUrl) {
    throw new Error("JWKS_URL or SUPABASE_URL must be set to verify bearer tokens");
  }
  const keys = new JwksKeyCache({
    url: config.jwksUrl,
    apiKey: config.supabase?.key,
    logger: logger.getSubLogger({ name: "jwks" }),
  });
  return new JwksTokenVerifier(keys, logger.getSubLogger({ name: "auth" }));
}

/**
 * Loads configuration, wires the engine and serves the API until `close()`.
 */
export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger({ name: "parley" });
  const serverConfig = loadServerConfig(env);
  const engineConfig = loadEngineConfig(env);

  const store = options.store ?? createStore(serverConfig, logger);
  const verifier = options.verifier ?? createVerifier(serverConfig, logger);
  const { agent, trends } = createEngine(engineConfig, {
    store,
    logger,
    completionClient: options.completionClient,
    tools: options.tools,
  });

  const app = createApp({
    agent,
    store,
    verifier,
    corsOrigins: serverConfig.corsOrigins,
    mcpHealthCheck: trends ? () => trends.healthCheck() : undefined,
    logger: logger.getSubLogger({ name: "http" }),
  });

  const host = options.host ?? serverConfig.host;
  const port = options.port ?? serverConfig.port;

  const server = await new Promise<ServerType>((resolve, reject) => {
    const started = serve({ fetch: app.fetch, hostname: host, port }, () => resolve(started));
    started.once("error", reject);
  });

  const url = `http://${host}:${port}`;
  logger.info("Server listening", {
    url,
    model: engineConfig.completion.model,
    messageStore: serverConfig.messageStore,
    mcpUrl: engineConfig.tools.mcpUrl,
    corsOrigins: serverConfig.corsOrigins,
  });

  return {
    url,
    server,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await trends?.close();
      logger.info("Server stopped");
    },
  };
}
