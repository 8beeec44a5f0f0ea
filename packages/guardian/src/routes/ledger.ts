/**
 * Ledger view routes.
 *
 * GET /api/v1/status - Accrue, then the ledger summary
 * GET /api/v1/budget - Accrue, then budget breakdown and projections
 * GET /api/v1/yield  - Accrue, then yield sources
 * GET /api/v1/mode   - Active spending mode
 * PUT /api/v1/mode   - Change spending mode
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetModeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/status", async (c) => {
    const status = await c.get("service").status();
    return c.json({ data: status });
  });

  routes.get("/budget", async (c) => {
    const budget = await c.get("service").budgetDetails();
    return c.json({ data: budget });
  });

  routes.get("/yield", async (c) => {
    const view = await c.get("service").yieldDetails();
    return c.json({ data: view });
  });

  routes.get("/mode", (c) => {
    return c.json({ data: c.get("service").mode() });
  });

  routes.put("/mode", validateBody(SetModeSchema), async (c) => {
    const body = c.get("validatedBody");
    const mode = await c.get("service").setMode(body.mode);
    return c.json({ data: mode });
  });

  return routes;
}
