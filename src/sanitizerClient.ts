import { LanguageModel, generateText } from "ai";
import { createAzure } from "@ai-sdk/azure";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { EndpointConfig } from "./endpointConfig.js";
import { PromptTemplate, buildMessages } from "./promptTemplate.js";

/**
 * Sends one chunk, wrapped in the prompt template, to a language model and
 * returns the raw text of the answer. Failures reject; no retrying happens here.
 */
export interface SanitizerClient {
    complete(chunkText: string): Promise<string>;
}

/**
 * Builds the AI SDK model for an endpoint configuration.
 */
export function createLanguageModel(config: EndpointConfig): LanguageModel {
    switch (config.provider) {
        case "azure": {
            const azure = createAzure({
                resourceName: config.resourceName,
                apiKey: config.apiKey,
                apiVersion: config.apiVersion,
            });
            return azure(config.model);
        }
        case "openai-compatible": {
            if (!config.apiBase) {
                throw new Error(`Endpoint '${config.name}' has no api_base.`);
            }
            const provider = createOpenAICompatible({
                name: config.name,
                baseURL: config.apiBase,
                apiKey: config.apiKey,
            });
            return provider.chatModel(config.model);
        }
    }
}

/**
 * SanitizerClient backed by the Vercel AI SDK.
 */
export class LanguageModelSanitizerClient implements SanitizerClient {
    constructor(
        private readonly model: LanguageModel,
        private readonly template: PromptTemplate,
        private readonly config: Pick<EndpointConfig, "temperature" | "maxTokens" | "stopWords"> = {}
    ) {}

    async complete(chunkText: string): Promise<string> {
        const response = await generateText({
            model: this.model,
            system: this.template.systemPrompt,
            messages: buildMessages(this.template, chunkText),
            temperature: this.config.temperature,
            maxTokens: this.config.maxTokens,
            stopSequences: this.config.stopWords ? [...this.config.stopWords] : undefined,
            maxRetries: 0, // retries are handled by SanitizationService
        });
        return response.text;
    }
}

/** Creates the client for one endpoint. */
export function createSanitizerClient(config: EndpointConfig, template: PromptTemplate): SanitizerClient {
    return new LanguageModelSanitizerClient(createLanguageModel(config), template, config);
}
