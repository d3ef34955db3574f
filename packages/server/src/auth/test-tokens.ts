import { generateKeyPairSync } from "node:crypto";
import { sign } from "hono/jwt";

type Claims = Parameters<typeof sign>[0];

export interface TestSigner {
  kid: string;
  /** Public key in JWK form, as served from a JWKS endpoint */
  jwk: Record<string, unknown>;
  sign(claims: Claims): Promise<string>;
}

/**
 * ES256 key pair that issues tokens for tests. The `kid` travels in the header.
 */
export function createTestSigner(kid = "test-key"): TestSigner {
  const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve: "P-256" });
  const privateJwk = { ...privateKey.export({ format: "jwk" }), kid, alg: "ES256" };
  return {
    kid,
    jwk: { ...publicKey.export({ format: "jwk" }), kid, alg: "ES256", use: "sig" },
    sign: (claims) => sign(claims, privateJwk, "ES256"),
  };
}

export const inOneHour = () => Math.floor(Date.now() / 1000) + 3600;
