/**
 * Spending routes.
 *
 * POST /api/v1/spend/check - Would this amount fit the budget?
 * POST /api/v1/spend       - Book a spend made outside the guardian
 * POST /api/v1/transfers   - Pay from the agent wallet and book it
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RecordSpendSchema, SpendCheckSchema, TransferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createSpendingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/spend/check", validateBody(SpendCheckSchema), async (c) => {
    const body = c.get("validatedBody");
    const check = await c.get("service").checkSpend(body.amount);
    return c.json({ data: check });
  });

  routes.post("/spend", validateBody(RecordSpendSchema), async (c) => {
    const body = c.get("validatedBody");
    const recorded = await c.get("service").recordSpend(body.amount, {
      reference: body.reference,
      category: body.category,
    });
    return c.json({ data: recorded }, 201);
  });

  routes.post("/transfers", validateBody(TransferSchema), async (c) => {
    const body = c.get("validatedBody");
    const transfer = await c.get("service").transfer(body.amount);
    return c.json({ data: transfer }, 201);
  });

  return routes;
}
