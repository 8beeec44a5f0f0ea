/**
 * Transaction history routes.
 *
 * GET /api/v1/transactions     - Newest first (?limit=, ?direction=)
 * GET /api/v1/transactions/:id - A single record
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListTransactionsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListTransactionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const records = c.get("service").history(queryResult.data);
    return c.json({ data: records });
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const record = c.get("service").transaction(id);
    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Transaction ${id} not found`), 404);
    }
    return c.json({ data: record });
  });

  return routes;
}
