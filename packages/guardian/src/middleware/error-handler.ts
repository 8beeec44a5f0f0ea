/**
 * Global error handler.
 *
 * Maps GuardianError codes to HTTP statuses and produces the error
 * envelope. Anything unrecognized is a 500 with a generic message.
 */

import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  BudgetExceededError,
  CollaboratorUnavailableError,
  GuardianError,
  type GuardianErrorCode,
} from "@yield-guardian/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<GuardianErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  UNKNOWN_MODE: 400,
  BUDGET_EXCEEDED: 422,
  COLLABORATOR_UNAVAILABLE: 502,
  STORAGE_WRITE_FAILED: 503,
  CONFIGURATION_ERROR: 501,
  LEDGER_CLOSED: 503,
  INVARIANT_VIOLATION: 500,
};

export function statusFor(code: GuardianErrorCode): ContentfulStatusCode {
  return STATUS_MAP[code];
}

function detailsFor(err: GuardianError): Record<string, unknown> | undefined {
  if (err instanceof BudgetExceededError) {
    return { requested: err.requested, available: err.available };
  }
  if (err instanceof CollaboratorUnavailableError) {
    return { collaborator: err.collaborator };
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. `onInternal` receives every error that
 * becomes a 500.
 */
export function createErrorHandler(
  onInternal?: (err: Error) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof GuardianError) {
      const status = statusFor(err.code);
      if (status !== 500) {
        return c.json(createErrorEnvelope(err.code, err.message, detailsFor(err)), status);
      }
    }

    onInternal?.(err);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
