import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { type ConversationStore, createLogger, describeError } from "parley";
import type { ILogObj, Logger } from "tslog";
import type { TokenVerifier } from "./auth/jwks.js";
import { DEFAULT_CORS_ORIGINS } from "./config.js";
import { REQUEST_ID_HEADER, requestLogger } from "./middleware/request-logger.js";
import { createChatRoutes } from "./routes/chat.js";
import { createHealthRoutes } from "./routes/health.js";
import type { AppEnv, TurnRunner } from "./types.js";

export interface AppDependencies {
  agent: TurnRunner;
  store: ConversationStore;
  verifier: TokenVerifier;
  corsOrigins?: string[];
  /** Reachability of the trends MCP server, reported by `/health` */
  mcpHealthCheck?: () => Promise<boolean>;
  logger?: Logger<ILogObj>;
  now?: () => Date;
}

/**
 * Builds the HTTP application. Framework-agnostic: serve it with
 * `@hono/node-server` or call `app.request()` directly.
 */
export function createApp(deps: AppDependencies) {
  const logger = deps.logger ?? createLogger({ name: "parley:server" });
  const app = new Hono<AppEnv>();

  app.use("*", requestLogger(logger));
  app.use(
    "*",
    cors({
      origin: deps.corsOrigins ?? DEFAULT_CORS_ORIGINS,
      credentials: true,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Authorization", "Content-Type", REQUEST_ID_HEADER],
      exposeHeaders: [REQUEST_ID_HEADER],
    }),
  );

  app.route(
    "/health",
    createHealthRoutes(
      { store: () => deps.store.ping(), mcp: deps.mcpHealthCheck, now: deps.now },
      logger,
    ),
  );
  app.route(
    "/chat",
    createChatRoutes({
      agent: deps.agent,
      store: deps.store,
      verifier: deps.verifier,
      logger,
    }),
  );

  app.notFound((c) => c.json({ detail: "Not found" }, 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      const headers = error.status === 401 ? { "WWW-Authenticate": "Bearer" } : undefined;
      return c.json({ detail: error.message }, error.status, headers);
    }

    logger.error("Unhandled request error", {
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      error: describeError(error),
    });
    return c.json({ detail: "Internal server error" }, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
