/**
 * Request logging middleware.
 *
 * Emits one entry per request. Error responses carry the envelope's code,
 * so a 400 from validation and a 422 from the budget check are told apart
 * without reading the body again downstream.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { isErrorEnvelope, type ApiErrorCode } from "../types/error.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly level: RequestLogLevel;
  readonly errorCode?: ApiErrorCode;
}

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

async function errorCodeOf(c: Context<AppEnv>): Promise<ApiErrorCode | undefined> {
  if (c.res.status < 400) return undefined;
  if (!(c.res.headers.get("Content-Type") ?? "").includes("application/json")) {
    return undefined;
  }
  try {
    const body: unknown = await c.res.clone().json();
    return isErrorEnvelope(body) ? body.error.code : undefined;
  } catch {
    // Non-JSON body despite the header; log without a code.
    return undefined;
  }
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    const errorCode = await errorCodeOf(c);

    log({
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      level: levelForStatus(status),
      ...(errorCode !== undefined ? { errorCode } : {}),
    });
  };
}
