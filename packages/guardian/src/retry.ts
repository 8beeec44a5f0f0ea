/**
 * Retry with exponential backoff.
 *
 * Used for audit writes, which fail transiently (disk full, locked file).
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 250 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 5000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 50 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterMs: 50,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Sleep for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Hooks around each attempt.
 */
export interface RetryOptions {
  /** Whether an error is worth another attempt. Default: every error */
  readonly shouldRetry?: (err: unknown) => boolean;
  readonly sleepFn?: (ms: number) => Promise<void>;
  /** Called before sleeping ahead of the next attempt (1-based) */
  readonly onRetry?: (err: unknown, nextAttempt: number, delayMs: number) => void;
}

/**
 * Execute a function with retry on failure.
 *
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {},
): Promise<T> {
  const { shouldRetry = () => true, sleepFn = sleep, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        const delay = computeDelay(attempt, config);
        onRetry?.(err, attempt + 2, delay);
        await sleepFn(delay);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
