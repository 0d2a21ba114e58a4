import { RetryOptions, DEFAULT_RETRY_OPTIONS } from "./retryOptions.js";
import { RetryExhaustedError, toError } from "./errors.js";

/**
 * Computes the wait before the retry that follows failed attempt `attempt` (1-based):
 * `initialDelay * factor^(attempt - 1)`, capped at `maxDelay`.
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, "initialDelay" | "factor" | "maxDelay">): number {
    const delay = options.initialDelay * Math.pow(options.factor, attempt - 1);
    return Math.min(delay, options.maxDelay);
}

/**
 * Retries an asynchronous operation with exponential backoff.
 * @template T The return type of the async operation.
 * @param operation The asynchronous function to retry. Receives the 1-based attempt number.
 * @param options Optional retry configuration overrides.
 * @returns A promise that resolves with the result of the first successful attempt.
 * @throws {RetryExhaustedError} When all `maxRetries + 1` attempts failed; the last error is its `cause`.
 */
export async function retry<T>(
    operation: (attempt: number) => Promise<T>,
    options: Partial<RetryOptions> = {}
  ): Promise<T> {
    const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const totalAttempts = config.maxRetries + 1;

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = toError(error);
        config.onError?.(lastError, attempt);

        if (attempt >= totalAttempts) {
          break;
        }

        const waitTime = backoffDelay(attempt, config);
        config.onRetry?.(lastError, attempt, waitTime);

        await new Promise(resolve => setTimeout(resolve, waitTime));
      }
    }

    throw new RetryExhaustedError(totalAttempts, lastError);
  }
