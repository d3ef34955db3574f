import { webcrypto } from "node:crypto";
import { decode, verify } from "hono/jwt";
import { createLogger, describeError } from "parley";
import type { ILogObj, Logger } from "tslog";
import { z } from "zod";

const jwkSchema = z
  .object({
    kid: z.string().min(1),
    kty: z.string(),
    crv: z.string().optional(),
    x: z.string().optional(),
    y: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
  })
  .passthrough();

const jwksSchema = z.object({ keys: z.array(z.unknown()) });

type Jwk = z.infer<typeof jwkSchema>;

const isP256Key = (key: Jwk) => key.kty === "EC" && key.crv === "P-256" && !!key.x && !!key.y;

export interface JwksKeyCacheOptions {
  url: string;
  /** Sent as the `apikey` header, as Supabase expects */
  apiKey?: string;
  /** Lower bound between two fetches triggered by unknown key ids */
  minRefreshIntervalMs?: number;
  fetch?: typeof fetch;
  logger?: Logger<ILogObj>;
  now?: () => number;
}

/**
 * ES256 verification keys fetched from a JWKS endpoint, keyed by `kid`.
 *
 * A lookup for an unknown `kid` refreshes the set once; concurrent lookups share
 * that refresh, and refreshes closer together than `minRefreshIntervalMs` are skipped.
 */
export class JwksKeyCache {
  private readonly keys = new Map<string, webcrypto.CryptoKey>();
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => number;
  private readonly minRefreshIntervalMs: number;
  private refreshing: Promise<void> | undefined;
  private lastRefreshAt: number | undefined;

  constructor(private readonly options: JwksKeyCacheOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger({ name: "parley:jwks" });
    this.now = options.now ?? Date.now;
    this.minRefreshIntervalMs = options.minRefreshIntervalMs ?? 30_000;
  }

  get size(): number {
    return this.keys.size;
  }

  async getKey(kid: string): Promise<webcrypto.CryptoKey | undefined> {
    const cached = this.keys.get(kid);
    if (cached) return cached;

    if (this.refreshing) {
      await this.refreshing;
    } else if (this.canRefresh()) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = undefined;
      });
      await this.refreshing;
    } else {
      this.logger.debug("Skipping JWKS refresh", { kid });
    }

    return this.keys.get(kid);
  }

  private canRefresh(): boolean {
    return (
      this.lastRefreshAt === undefined ||
      this.now() - this.lastRefreshAt >= this.minRefreshIntervalMs
    );
  }

  private async refresh(): Promise<void> {
    this.lastRefreshAt = this.now();
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) headers.apikey = this.options.apiKey;

    const response = await this.fetchImpl(this.options.url, { headers });
    if (!response.ok) {
      throw new Error(`JWKS request failed: HTTP ${response.status}`);
    }

    const { keys } = jwksSchema.parse(await response.json());
    let imported = 0;
    for (const entry of keys) {
      const parsed = jwkSchema.safeParse(entry);
      if (!parsed.success || !isP256Key(parsed.data)) continue;

      const { kid, kty, crv, x, y } = parsed.data;
      const key = await webcrypto.subtle.importKey(
        "jwk",
        { kty, crv, x, y },
        { name: "ECDSA", namedCurve: "P-256" },
        false,
        ["verify"],
      );
      this.keys.set(kid, key);
      imported++;
    }

    this.logger.info("JWKS refreshed", { url: this.options.url, keys: imported });
  }
}

/**
 * Resolves a bearer token to a user id, or null when it is not acceptable.
 */
export interface TokenVerifier {
  verify(token: string): Promise<string | null>;
}

/**
 * Verifies ES256 tokens against a {@link JwksKeyCache}; the `sub` claim is the user id.
 */
export class JwksTokenVerifier implements TokenVerifier {
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly keys: JwksKeyCache,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? createLogger({ name: "parley:auth" });
  }

  async verify(token: string): Promise<string | null> {
    try {
      const { header } = decode(token);
      if (header.alg !== "ES256" || !header.kid) {
        this.logger.warn("Rejected token with unusable header", { alg: header.alg });
        return null;
      }

      const key = await this.keys.getKey(header.kid);
      if (!key) {
        this.logger.warn("No verification key for token", { kid: header.kid });
        return null;
      }

      const payload = await verify(token, key, "ES256");
      if (typeof payload.sub !== "string" || payload.sub === "") {
        this.logger.warn("Token missing 'sub' claim");
        return null;
      }
      return payload.sub;
    } catch (error) {
      this.logger.warn("Token validation failed", { error: describeError(error) });
      return null;
    }
  }
}
