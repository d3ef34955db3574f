import { ConfigError, type Env, envInt, envString, envStringDefault, formatIssues } from "parley";
import { z } from "zod";

export const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://frontend:3000",
  "http://localhost:3001",
];

export type MessageStoreKind = "supabase" | "memory";

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigins: string[];
  messageStore: MessageStoreKind;
  supabase?: { url: string; key: string };
  /** Unset only when there is no Supabase project to derive it from */
  jwksUrl?: string;
}

const serverEnvSchema = z.object({
  HOST: envStringDefault("0.0.0.0"),
  PORT: envInt(8000).pipe(z.number().max(65535)),
  CORS_ORIGINS: envString(),
  MESSAGE_STORE: z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? value.trim().toLowerCase() : undefined),
    z.enum(["supabase", "memory"]).default("supabase"),
  ),
  SUPABASE_URL: envString().pipe(z.string().url().optional()),
  SUPABASE_KEY: envString(),
  JWKS_URL: envString().pipe(z.string().url().optional()),
});

function parseOrigins(value: string | undefined): string[] {
  if (value === undefined) return DEFAULT_CORS_ORIGINS;
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Reads the HTTP server configuration. Supabase credentials are required when
 * messages are stored in Supabase; the JWKS URL defaults to the project's
 * `/auth/v1/.well-known/jwks.json`.
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  const parsed = result.data;

  const issues: string[] = [];
  if (parsed.MESSAGE_STORE === "supabase") {
    if (!parsed.SUPABASE_URL) issues.push("SUPABASE_URL: Required when MESSAGE_STORE is supabase");
    if (!parsed.SUPABASE_KEY) issues.push("SUPABASE_KEY: Required when MESSAGE_STORE is supabase");
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const supabase =
    parsed.SUPABASE_URL && parsed.SUPABASE_KEY
      ? { url: parsed.SUPABASE_URL.replace(/\/+$/, ""), key: parsed.SUPABASE_KEY }
      : undefined;

  return {
    host: parsed.HOST,
    port: parsed.PORT,
    corsOrigins: parseOrigins(parsed.CORS_ORIGINS),
    messageStore: parsed.MESSAGE_STORE,
    supabase,
    jwksUrl:
      parsed.JWKS_URL ?? (supabase ? `${supabase.url}/auth/v1/.well-known/jwks.json` : undefined),
  };
}
