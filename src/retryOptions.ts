/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Number of retries after the first attempt (total tries = maxRetries + 1). */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  initialDelay: number;
  /** Maximum delay in milliseconds between retries. */
  maxDelay: number;
  /** Multiplier for exponential backoff (e.g., 2 means delay doubles each time). */
  factor: number;
  /** Optional callback executed after every failed attempt, including the last one. */
  onError?: (error: Error, attempt: number) => void;
  /** Optional callback executed before waiting for the next attempt. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Default configuration values for the retry mechanism.
 * Five retries starting at 500ms: waits of 500, 1000, 2000, 4000 and 8000ms.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  initialDelay: 500,
  maxDelay: 60_000,
  factor: 2,
  onRetry: (error, attempt, delayMs) => {
    console.warn(`Retry attempt ${attempt} failed (${error.message}). Retrying in ${delayMs}ms...`);
  },
};
