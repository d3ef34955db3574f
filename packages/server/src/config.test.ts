import { ConfigError } from "parley";
import { describe, expect, it } from "vitest";
import { DEFAULT_CORS_ORIGINS, loadServerConfig } from "./config.js";

describe("loadServerConfig", () => {
  it("derives the JWKS URL from the Supabase project", () => {
    const config = loadServerConfig({
      SUPABASE_URL: "https://project.supabase.co/",
      SUPABASE_KEY: "test-secret",
    });

    expect(config).toEqual({
      host: "0.0.0.0",
      port: 8000,
      corsOrigins: DEFAULT_CORS_ORIGINS,
      messageStore: "supabase",
      supabase: { url: "https://project.supabase.co", key: "test-secret" },
      jwksUrl: "https://project.supabase.co/auth/v1/.well-known/jwks.json",
    });
  });

  it("parses ports, origins and an explicit JWKS URL", () => {
    const config = loadServerConfig({
      MESSAGE_STORE: "Memory",
      PORT: "9000",
      CORS_ORIGINS: "https://a.example, https://b.example,",
      JWKS_URL: "https://auth.example/jwks.json",
    });

    expect(config.messageStore).toBe("memory");
    expect(config.port).toBe(9000);
    expect(config.corsOrigins).toEqual(["https://a.example", "https://b.example"]);
    expect(config.jwksUrl).toBe("https://auth.example/jwks.json");
    expect(config.supabase).toBeUndefined();
  });

  it("requires Supabase credentials for the Supabase store", () => {
    expect(() => loadServerConfig({})).toThrow(ConfigError);
    expect(() => loadServerConfig({ SUPABASE_URL: "https://project.supabase.co" })).toThrow(
      "Invalid configuration:\n  - SUPABASE_KEY: Required when MESSAGE_STORE is supabase",
    );
  });

  it("rejects an unknown store and an invalid port", () => {
    expect(() => loadServerConfig({ MESSAGE_STORE: "redis" })).toThrow(/MESSAGE_STORE/);
    expect(() => loadServerConfig({ MESSAGE_STORE: "memory", PORT: "70000" })).toThrow(/PORT/);
  });
});
