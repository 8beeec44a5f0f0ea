/**
 * GET /api/v1/agent - Executor wallet balances and destination.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAgentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const status = await c.get("service").agentStatus();
    return c.json({ data: status });
  });

  return routes;
}
