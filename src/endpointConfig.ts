import { readFile } from "fs/promises";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";

/** Providers an endpoint can be served by. */
export type EndpointProvider = "openai-compatible" | "azure";

/**
 * Describes one language-model backend. Loaded once per run and frozen.
 */
export interface EndpointConfig {
    /** Display name, used in logs and as the output sub-directory when several endpoints run. */
    readonly name: string;
    readonly provider: EndpointProvider;
    /** Base URL of an OpenAI-compatible API (e.g. http://localhost:5001/v1). */
    readonly apiBase?: string;
    readonly apiKey?: string;
    /** Model name, or the deployment name for Azure. */
    readonly model: string;
    /** Azure resource name. */
    readonly resourceName?: string;
    /** Azure API version. */
    readonly apiVersion?: string;
    readonly temperature?: number;
    /** Maximum number of tokens the model may generate per chunk. */
    readonly maxTokens?: number;
    readonly stopWords?: readonly string[];
}

const endpointConfigSchema = z
    .object({
        name: z.string().min(1).optional(),
        provider: z.enum(["openai-compatible", "azure"]).default("openai-compatible"),
        api_base: z.string().url().optional(),
        api_key: z.string().min(1).optional(),
        model: z.string().min(1),
        resource_name: z.string().min(1).optional(),
        api_version: z.string().min(1).optional(),
        temperature: z.number().min(0).max(2).optional(),
        max_tokens: z.number().int().positive().optional(),
        stop_words: z.array(z.string()).optional(),
    })
    .superRefine((value, ctx) => {
        if (value.provider === "openai-compatible" && !value.api_base) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["api_base"], message: "api_base is required for openai-compatible endpoints" });
        }
        if (value.provider === "azure" && !value.resource_name) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["resource_name"], message: "resource_name is required for azure endpoints" });
        }
    });

/** Formats zod issues as `path: message` pairs. */
export const formatIssues = (error: z.ZodError): string =>
    error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

/**
 * Validates raw (already parsed) endpoint configuration data.
 * @param raw The parsed YAML document.
 * @param filePath The file the data came from; its base name is the fallback endpoint name.
 * @param fallbackApiKey API key used when the file carries none.
 */
export function parseEndpointConfig(raw: unknown, filePath: string, fallbackApiKey?: string): EndpointConfig {
    const result = endpointConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigurationError(`Invalid endpoint configuration: ${formatIssues(result.error)}`, filePath);
    }

    const data = result.data;
    return Object.freeze({
        name: data.name ?? path.basename(filePath, path.extname(filePath)),
        provider: data.provider,
        apiBase: data.api_base,
        apiKey: data.api_key ?? fallbackApiKey,
        model: data.model,
        resourceName: data.resource_name,
        apiVersion: data.api_version,
        temperature: data.temperature,
        maxTokens: data.max_tokens,
        stopWords: data.stop_words ? Object.freeze([...data.stop_words]) : undefined,
    });
}

/**
 * Reads and validates one endpoint configuration file (YAML).
 * @throws {ConfigurationError} If the file cannot be read, is not valid YAML, or fails validation.
 */
export async function loadEndpointConfig(filePath: string, fallbackApiKey?: string): Promise<EndpointConfig> {
    let raw: unknown;
    try {
        raw = parseYaml(await readFile(filePath, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(`Could not load endpoint configuration: ${errorMessage(error)}`, filePath, error);
    }
    return parseEndpointConfig(raw, filePath, fallbackApiKey);
}
