export type { App, AppDependencies } from "./app.js";
export { createApp } from "./app.js";
export type { JwksKeyCacheOptions, TokenVerifier } from "./auth/jwks.js";
export { JwksKeyCache, JwksTokenVerifier } from "./auth/jwks.js";
export { extractBearerToken, requireAuth } from "./auth/middleware.js";
export type { MessageStoreKind, ServerConfig } from "./config.js";
export { DEFAULT_CORS_ORIGINS, loadServerConfig } from "./config.js";
export type { RunningServer, StartServerOptions } from "./server.js";
export { startServer } from "./server.js";
export type { AppEnv, TurnRunner } from "./types.js";
