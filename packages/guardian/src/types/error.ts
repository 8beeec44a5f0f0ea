/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { GuardianErrorCode } from "@yield-guardian/types";

/**
 * Known API error codes: the domain codes plus HTTP-only ones.
 */
export type ApiErrorCode =
  | GuardianErrorCode
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

const API_ERROR_CODES: Record<ApiErrorCode, true> = {
  CONFIGURATION_ERROR: true,
  VALIDATION_ERROR: true,
  UNKNOWN_MODE: true,
  BUDGET_EXCEEDED: true,
  COLLABORATOR_UNAVAILABLE: true,
  STORAGE_WRITE_FAILED: true,
  INVARIANT_VIOLATION: true,
  LEDGER_CLOSED: true,
  UNAUTHORIZED: true,
  NOT_FOUND: true,
  INTERNAL_ERROR: true,
};

export function isApiErrorCode(value: unknown): value is ApiErrorCode {
  return typeof value === "string" && Object.hasOwn(API_ERROR_CODES, value);
}

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (value === null || typeof value !== "object" || !("error" in value)) return false;
  const { error } = value;
  return (
    error !== null &&
    typeof error === "object" &&
    "code" in error &&
    isApiErrorCode(error.code) &&
    "message" in error &&
    typeof error.message === "string"
  );
}
