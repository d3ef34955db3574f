import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types.js";
import type { TokenVerifier } from "./jwks.js";

/**
 * Token from an `Authorization: Bearer <token>` header, or undefined.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) return undefined;
  const [scheme, token] = parts;
  if (scheme?.toLowerCase() !== "bearer" || !token) return undefined;
  return token;
}

const unauthorized = (message: string) => new HTTPException(401, { message });

/**
 * Rejects requests without a verifiable bearer token and exposes the user id
 * as `c.var.userId`.
 */
export const requireAuth = (verifier: TokenVerifier) =>
  createMiddleware<AppEnv>(async (c, next) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    if (!token) {
      throw unauthorized("Authorization required");
    }

    const userId = await verifier.verify(token);
    if (!userId) {
      throw unauthorized("Invalid authorization token");
    }

    c.set("userId", userId);
    await next();
  });
