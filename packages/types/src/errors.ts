/**
 * Error taxonomy shared by every package.
 *
 * Each error carries a machine-readable code; the HTTP layer maps codes
 * to status codes, the driver uses them to decide what is retryable.
 */

export type GuardianErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_MODE"
  | "BUDGET_EXCEEDED"
  | "COLLABORATOR_UNAVAILABLE"
  | "STORAGE_WRITE_FAILED"
  | "INVARIANT_VIOLATION"
  | "LEDGER_CLOSED";

export class GuardianError extends Error {
  public readonly code: GuardianErrorCode;

  constructor(code: GuardianErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GuardianError";
    this.code = code;
  }
}

/**
 * Missing or invalid startup parameters. Fatal.
 */
export class ConfigurationError extends GuardianError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Rejected input at an API boundary. No state was changed.
 */
export class ValidationError extends GuardianError {
  constructor(message: string, code: "VALIDATION_ERROR" | "UNKNOWN_MODE" = "VALIDATION_ERROR") {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class UnknownModeError extends ValidationError {
  public readonly mode: string;

  constructor(mode: string) {
    super(`Unknown spending mode '${mode}'`, "UNKNOWN_MODE");
    this.name = "UnknownModeError";
    this.mode = mode;
  }
}

/**
 * A requested transfer does not fit the available budget.
 */
export class BudgetExceededError extends GuardianError {
  public readonly requested: string;
  public readonly available: string;

  constructor(requested: string, available: string) {
    super(
      "BUDGET_EXCEEDED",
      `Cannot transfer ${requested}: available from yield is ${available}`,
    );
    this.name = "BudgetExceededError";
    this.requested = requested;
    this.available = available;
  }
}

/**
 * A network collaborator (RPC, executor) failed. The operation is skipped
 * and ledger state is unaffected.
 */
export class CollaboratorUnavailableError extends GuardianError {
  public readonly collaborator: string;

  constructor(collaborator: string, message: string, options?: { cause?: unknown }) {
    super("COLLABORATOR_UNAVAILABLE", `${collaborator}: ${message}`, options);
    this.name = "CollaboratorUnavailableError";
    this.collaborator = collaborator;
  }
}

/**
 * Audit or snapshot persistence failed. The in-memory mutation stands;
 * the write must be retried.
 */
export class StorageWriteError extends GuardianError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_WRITE_FAILED", message, options);
    this.name = "StorageWriteError";
  }
}

/**
 * An internal ledger invariant was broken. Always a programming defect.
 */
export class LedgerInvariantError extends GuardianError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "LedgerInvariantError";
  }
}

/**
 * Whether an error is transient and the operation may succeed if retried.
 */
export function isRetryableError(err: unknown): boolean {
  return (
    err instanceof CollaboratorUnavailableError ||
    err instanceof StorageWriteError
  );
}
