import { decode, sign } from "hono/jwt";
import { createLogger } from "parley";
import { describe, expect, it, vi } from "vitest";
import { JwksKeyCache, JwksTokenVerifier } from "./jwks.js";
import { createTestSigner, inOneHour } from "./test-tokens.js";

const logger = createLogger({ type: "hidden" });

function jwksFetch(keys: Array<Record<string, unknown>>) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify({ keys }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    }),
  );
}

describe("JwksKeyCache", () => {
  it("fetches once and serves later lookups from the cache", async () => {
    const signer = createTestSigner("k1");
    const fetchMock = jwksFetch([signer.jwk]);
    const cache = new JwksKeyCache({
      url: "https://auth.test/jwks.json",
      apiKey: "test-secret",
      fetch: fetchMock,
      logger,
    });

    expect(await cache.getKey("k1")).toBeDefined();
    expect(await cache.getKey("k1")).toBeDefined();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ Accept: "application/json", apikey: "test-secret" });
  });

  it("shares one refresh between concurrent lookups", async () => {
    const signer = createTestSigner("k1");
    const fetchMock = jwksFetch([signer.jwk]);
    const cache = new JwksKeyCache({ url: "https://auth.test/jwks.json", fetch: fetchMock, logger });

    const keys = await Promise.all([cache.getKey("k1"), cache.getKey("k1"), cache.getKey("k1")]);

    expect(keys.every((key) => key !== undefined)).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rate-limits refreshes for unknown key ids", async () => {
    let now = 1_000;
    const fetchMock = jwksFetch([createTestSigner("k1").jwk]);
    const cache = new JwksKeyCache({
      url: "https://auth.test/jwks.json",
      fetch: fetchMock,
      logger,
      minRefreshIntervalMs: 30_000,
      now: () => now,
    });

    expect(await cache.getKey("unknown")).toBeUndefined();
    expect(await cache.getKey("unknown")).toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(1);

    now += 30_000;
    expect(await cache.getKey("unknown")).toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("ignores keys that are not P-256", async () => {
    const cache = new JwksKeyCache({
      url: "https://auth.test/jwks.json",
      fetch: jwksFetch([{ kid: "rsa", kty: "RSA", n: "abc", e: "AQAB" }, { kty: "EC" }]),
      logger,
    });

    expect(await cache.getKey("rsa")).toBeUndefined();
    expect(cache.size).toBe(0);
  });
});

describe("JwksTokenVerifier", () => {
  const signer = createTestSigner("k1");
  const verifier = new JwksTokenVerifier(
    new JwksKeyCache({ url: "https://auth.test/jwks.json", fetch: jwksFetch([signer.jwk]), logger }),
    logger,
  );

  it("issues ES256 tokens that name their key", async () => {
    const token = await signer.sign({ sub: "user-123", exp: inOneHour() });

    expect(decode(token).header).toEqual({ alg: "ES256", typ: "JWT", kid: "k1" });
  });

  it("returns the subject of a valid token", async () => {
    const token = await signer.sign({ sub: "user-123", exp: inOneHour() });

    await expect(verifier.verify(token)).resolves.toBe("user-123");
  });

  it("rejects expired tokens", async () => {
    const token = await signer.sign({ sub: "user-123", exp: Math.floor(Date.now() / 1000) - 60 });

    await expect(verifier.verify(token)).resolves.toBeNull();
  });

  it("rejects tokens signed by another key with the same kid", async () => {
    const impostor = createTestSigner("k1");
    const token = await impostor.sign({ sub: "user-123", exp: inOneHour() });

    await expect(verifier.verify(token)).resolves.toBeNull();
  });

  it("rejects tokens without a subject", async () => {
    await expect(verifier.verify(await signer.sign({ exp: inOneHour() }))).resolves.toBeNull();
  });

  it("rejects malformed tokens and other algorithms", async () => {
    await expect(verifier.verify("not-a-token")).resolves.toBeNull();
    await expect(
      verifier.verify(await sign({ sub: "user-123", exp: inOneHour() }, "test-secret", "HS256")),
    ).resolves.toBeNull();
  });

  it("rejects tokens whose key cannot be fetched", async () => {
    const failing = new JwksTokenVerifier(
      new JwksKeyCache({
        url: "https://auth.test/jwks.json",
        fetch: vi.fn(async () => new Response("unavailable", { status: 503 })),
        logger,
      }),
      logger,
    );

    await expect(failing.verify(await signer.sign({ sub: "user-123", exp: inOneHour() }))).resolves.toBeNull();
  });
});
