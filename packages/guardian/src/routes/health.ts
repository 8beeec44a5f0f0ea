/**
 * Health check routes.
 *
 * GET /health - Liveness check (always 200 if server is running)
 * GET /ready  - Readiness check (503 once the ledger is closed), queued audit writes
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { GuardianService } from "../services/guardian-service.js";

export function createHealthRoutes(service: GuardianService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.ready;
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        lastAccrualAt: service.current().lastAccrualAt,
        pendingWrites: service.pendingWrites,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
