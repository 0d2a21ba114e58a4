import { z } from "zod";
import { retry } from "./retry.js";
import { RetryOptions } from "./retryOptions.js";
import { SanitizerClient } from "./sanitizerClient.js";
import { SanitizerResponseError } from "./errors.js";

/** Shape of a non-empty endpoint answer. */
const bookChunkSchema = z.object({
    sanitizedBookExcerpt: z.string(),
});

export type BookChunk = z.infer<typeof bookChunkSchema>;

/**
 * Anything that turns a raw chunk into sanitized text, or `null` when the
 * chunk should be dropped.
 */
export interface ChunkSanitizer {
    sanitizeChunk(chunkText: string): Promise<string | null>;
}

/**
 * Interprets the raw text of an endpoint answer.
 * @returns The sanitized excerpt, or `null` for an empty JSON object.
 * @throws {SanitizerResponseError} If the text is not JSON or lacks the excerpt field.
 */
export function parseSanitizerResponse(response: string): string | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(response.trim());
    } catch (error) {
        throw new SanitizerResponseError("Response is not valid JSON", response, error);
    }

    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed) && Object.keys(parsed).length === 0) {
        return null;
    }

    const result = bookChunkSchema.safeParse(parsed);
    if (!result.success) {
        throw new SanitizerResponseError("Response has no string 'sanitizedBookExcerpt' field", response, result.error);
    }
    return result.data.sanitizedBookExcerpt;
}

/**
 * Sends chunks to one endpoint and retries transport failures with
 * exponential backoff. A malformed answer is not retried.
 */
export class SanitizationService implements ChunkSanitizer {
    /**
     * @param client Client bound to the endpoint and prompt template.
     * @param retryOptions Overrides of the default schedule (5 retries from 500ms, doubling).
     * @param label Prefix for diagnostics, usually the endpoint name.
     */
    constructor(
        private readonly client: SanitizerClient,
        private readonly retryOptions: Partial<RetryOptions> = {},
        private readonly label: string = "sanitizer"
    ) {}

    /**
     * Sanitizes one chunk.
     * @returns The cleaned text, or `null` when the endpoint has nothing to keep.
     * @throws {RetryExhaustedError} If every attempt failed.
     * @throws {SanitizerResponseError} If the endpoint answered with a malformed body.
     */
    async sanitizeChunk(chunkText: string): Promise<string | null> {
        const response = await retry(() => this.client.complete(chunkText), {
            ...this.retryOptions,
            onError: (error, attempt) => {
                console.error(`[${this.label}] Request failed (attempt ${attempt}): ${error.message}`);
            },
            onRetry: (_error, _attempt, delayMs) => {
                console.warn(`[${this.label}] Retrying in ${delayMs}ms...`);
            },
        });

        return parseSanitizerResponse(response);
    }
}
