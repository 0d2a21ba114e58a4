import * as path from "path";
import { Chunker } from "./chunker.js";
import { EndpointConfig, loadEndpointConfig } from "./endpointConfig.js";
import { PromptTemplate } from "./promptTemplate.js";
import { RetryOptions } from "./retryOptions.js";
import { ChunkSanitizer, SanitizationService } from "./sanitizationService.js";
import { createSanitizerClient } from "./sanitizerClient.js";
import { SanitizationPipeline, SanitizationSummary } from "./sanitizationPipeline.js";
import { errorMessage, toError } from "./errors.js";

/** Builds the sanitizer used for one endpoint. */
export type SanitizerFactory = (config: EndpointConfig, template: PromptTemplate) => ChunkSanitizer;

export interface EndpointRunnerOptions {
    inputDir: string;
    outputDir: string;
    /** One endpoint configuration file per concurrent run. */
    configPaths: readonly string[];
    extensions: readonly string[];
    chunker: Chunker;
    /** Loads the prompt template; called by every run, so a bad template fails each run on its own. */
    loadTemplate: () => Promise<PromptTemplate>;
    /** Overrides of the dispatcher's retry schedule. */
    retryOptions?: Partial<RetryOptions>;
    /** API key for configurations that carry none. */
    fallbackApiKey?: string;
    /** Replaces the AI SDK backed sanitizer, e.g. in tests. */
    createSanitizer?: SanitizerFactory;
}

/** Outcome of one endpoint's run. */
export type EndpointRunResult =
    | { configPath: string; endpoint: string; status: "fulfilled"; summary: SanitizationSummary }
    | { configPath: string; endpoint?: string; status: "rejected"; error: Error };

/** Turns an endpoint name into a safe directory name. */
export const toDirectoryName = (name: string): string => name.replace(/[^\w.-]+/g, "_") || "endpoint";

/**
 * Assigns each endpoint name a distinct directory name, suffixing repeats with -2, -3, ...
 */
export function uniqueDirectoryNames(names: readonly string[]): string[] {
    const used = new Set<string>();
    return names.map(name => {
        const base = toDirectoryName(name);
        let candidate = base;
        for (let suffix = 2; used.has(candidate); suffix++) {
            candidate = `${base}-${suffix}`;
        }
        used.add(candidate);
        return candidate;
    });
}

/**
 * Runs one SanitizationPipeline per endpoint configuration, all at once.
 * A failing configuration or run is logged and reported in the results;
 * it never stops the other runs. Resolves once every run has settled.
 *
 * With more than one configuration, each run writes into its own
 * `<outputDir>/<endpoint name>/` directory so outputs never interleave.
 */
export async function runEndpoints(options: EndpointRunnerOptions): Promise<EndpointRunResult[]> {
    const { configPaths } = options;
    if (configPaths.length === 0) {
        console.log("No endpoint configurations given, nothing to do.");
        return [];
    }

    const createSanitizer: SanitizerFactory = options.createSanitizer ??
        ((config, template) => new SanitizationService(createSanitizerClient(config, template), options.retryOptions, config.name));

    const loaded = await Promise.allSettled(configPaths.map(configPath => loadEndpointConfig(configPath, options.fallbackApiKey)));

    const names = loaded.map((result, index) =>
        result.status === "fulfilled" ? result.value.name : path.basename(configPaths[index], path.extname(configPaths[index]))
    );
    const directoryNames = uniqueDirectoryNames(names);
    const namespaced = configPaths.length > 1;

    const runs = loaded.map(async (result, index): Promise<EndpointRunResult> => {
        const configPath = configPaths[index];
        if (result.status === "rejected") {
            const error = toError(result.reason);
            console.error(`Error loading configuration ${configPath}: ${error.message}`);
            return { configPath, status: "rejected", error };
        }

        const config = result.value;
        const outputDir = namespaced ? path.join(options.outputDir, directoryNames[index]) : options.outputDir;
        try {
            const template = await options.loadTemplate();
            const pipeline = new SanitizationPipeline({
                inputDir: options.inputDir,
                outputDir,
                extensions: options.extensions,
                label: config.name,
                chunker: options.chunker,
                sanitizer: createSanitizer(config, template),
            });
            const summary = await pipeline.run();
            return { configPath, endpoint: config.name, status: "fulfilled", summary };
        } catch (error) {
            console.error(`Error in task for endpoint '${config.name}': ${errorMessage(error)}`);
            return { configPath, endpoint: config.name, status: "rejected", error: toError(error) };
        }
    });

    const results = await Promise.all(runs);
    const failed = results.filter(result => result.status === "rejected").length;
    console.log(`All endpoint runs finished: ${results.length - failed} succeeded, ${failed} failed.`);
    return results;
}
