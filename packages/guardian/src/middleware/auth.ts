/**
 * API key authentication.
 *
 * Operators send X-Api-Key; the key must be one of OPERATOR_API_KEYS.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

export interface AuthConfig {
  readonly apiKeys: readonly string[];
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const keys = new Set(config.apiKeys);

  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Missing API key"), 401);
    }
    if (!keys.has(apiKey)) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }
    await next();
  };
}
