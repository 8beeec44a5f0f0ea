/**
 * Hono application factory.
 *
 * Separated from main.ts for testability: tests build the app around a
 * GuardianService without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { GuardianService } from "./services/guardian-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createSpendingRoutes } from "./routes/spending.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createAgentRoutes } from "./routes/agent.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: GuardianService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Receives errors that become a 500 */
  readonly onInternalError?: ((err: Error) => void) | undefined;
  /** When provided with at least one key, /api requires X-Api-Key */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly secured: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const secured = options.auth !== undefined && options.auth.apiKeys.length > 0;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (secured && options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createLedgerRoutes());
  app.route("/api/v1", createSpendingRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/agent", createAgentRoutes());

  return { app, secured };
}
