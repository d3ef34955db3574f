import { randomUUID } from "node:crypto";
import { createMiddleware } from "hono/factory";
import type { ILogObj, Logger } from "tslog";
import type { AppEnv } from "../types.js";

export const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Assigns a request id (reusing the caller's `X-Request-ID` when present),
 * echoes it on the response and logs method, path, status and duration.
 */
export const requestLogger = (logger: Logger<ILogObj>) =>
  createMiddleware<AppEnv>(async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    c.set("requestId", requestId);
    const startTime = Date.now();

    await next();

    c.res.headers.set(REQUEST_ID_HEADER, requestId);
    logger.info(`${c.req.method} ${c.req.path}`, {
      requestId,
      status: c.res.status,
      durationMs: Date.now() - startTime,
    });
  });
