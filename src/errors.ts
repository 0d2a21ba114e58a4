/**
 * Raised when every attempt of a retried operation has failed.
 * The last failure is kept as `cause`.
 */
export class RetryExhaustedError extends Error {
    constructor(public readonly attempts: number, cause?: Error) {
        super("All retries failed", { cause });
        this.name = "RetryExhaustedError";
    }
}

/**
 * Raised when an endpoint answers with a body that is not the expected
 * `{ "sanitizedBookExcerpt": string }` object (or the empty `{}` marker).
 */
export class SanitizerResponseError extends Error {
    constructor(message: string, public readonly response: string, cause?: unknown) {
        super(message, { cause });
        this.name = "SanitizerResponseError";
    }
}

/** Raised when an endpoint config or prompt template cannot be read or validated. */
export class ConfigurationError extends Error {
    constructor(message: string, public readonly filePath: string, cause?: unknown) {
        super(`${message} (${filePath})`, { cause });
        this.name = "ConfigurationError";
    }
}

/** Bad command line arguments or environment values. */
export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}

/** Normalizes anything thrown into an Error instance. */
export const toError = (error: unknown): Error =>
    error instanceof Error ? error : new Error(String(error));

/** Extracts a printable message from anything thrown. */
export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
