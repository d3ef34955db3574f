import { Hono } from "hono";
import { describeError } from "parley";
import type { ILogObj, Logger } from "tslog";
import type { AppEnv } from "../types.js";

type ServiceStatus = "healthy" | "unhealthy" | "disabled";

export interface HealthChecks {
  store: () => Promise<boolean>;
  /** Omitted when the trends tool is not configured */
  mcp?: () => Promise<boolean>;
  now?: () => Date;
}

export function createHealthRoutes(checks: HealthChecks, logger: Logger<ILogObj>) {
  const now = checks.now ?? (() => new Date());

  const probe = async (
    service: string,
    check: (() => Promise<boolean>) | undefined,
  ): Promise<ServiceStatus> => {
    if (!check) return "disabled";
    try {
      return (await check()) ? "healthy" : "unhealthy";
    } catch (error) {
      logger.warn("Health check failed", { service, error: describeError(error) });
      return "unhealthy";
    }
  };

  const collect = async () => {
    const [store, mcp] = await Promise.all([
      probe("store", checks.store),
      probe("mcp", checks.mcp),
    ]);
    const services = { backend: "healthy", store, mcp } as const;
    const degraded = store === "unhealthy" || mcp === "unhealthy";
    return { degraded, services };
  };

  return new Hono<AppEnv>()
    .get("/", async (c) => {
      const { degraded, services } = await collect();
      return c.json({
        status: degraded ? "degraded" : "healthy",
        timestamp: now().toISOString(),
        services,
      });
    })
    .get("/ready", async (c) => {
      const { degraded, services } = await collect();
      return c.json({ status: degraded ? "not_ready" : "ready", services });
    })
    .get("/live", (c) => c.json({ status: "alive" }));
}
