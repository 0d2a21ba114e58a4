import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { CoreMessage } from "ai";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { formatIssues } from "./endpointConfig.js";

/** A few-shot example exchanged before the chunk itself. */
export interface TemplateMessage {
    role: "user" | "assistant";
    content: string;
}

/**
 * The prompt wrapped around every chunk sent to an endpoint.
 */
export interface PromptTemplate {
    systemPrompt: string;
    messages: TemplateMessage[];
    /** Text placed before the chunk in the final user message. */
    preUserMessageContent?: string;
    /** Text placed after the chunk in the final user message. */
    postUserMessageContent?: string;
}

/** Location of the sanitizer template shipped with the package. */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../templates/book_txt_sanitizer.yaml", import.meta.url));

const promptTemplateSchema = z.object({
    system_prompt: z.string().min(1),
    messages: z
        .array(z.object({ role: z.enum(["user", "assistant"]), content: z.string() }))
        .default([]),
    pre_user_message_content: z.string().optional(),
    post_user_message_content: z.string().optional(),
});

/**
 * Reads a prompt template from a YAML file.
 * @throws {ConfigurationError} If the file cannot be read or does not describe a template.
 */
export async function loadPromptTemplate(filePath: string = DEFAULT_TEMPLATE_PATH): Promise<PromptTemplate> {
    let raw: unknown;
    try {
        raw = parseYaml(await readFile(filePath, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(`Could not load prompt template: ${errorMessage(error)}`, filePath, error);
    }

    const result = promptTemplateSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigurationError(`Invalid prompt template: ${formatIssues(result.error)}`, filePath);
    }

    return {
        systemPrompt: result.data.system_prompt,
        messages: result.data.messages,
        preUserMessageContent: result.data.pre_user_message_content,
        postUserMessageContent: result.data.post_user_message_content,
    };
}

/**
 * Builds the conversation for one chunk: the template's few-shot messages
 * followed by a user message holding the chunk between the optional
 * pre/post content.
 */
export function buildMessages(template: PromptTemplate, chunkText: string): CoreMessage[] {
    const history: CoreMessage[] = template.messages.map((message): CoreMessage =>
        message.role === "user"
            ? { role: "user", content: message.content }
            : { role: "assistant", content: message.content }
    );

    const userContent = [template.preUserMessageContent, chunkText, template.postUserMessageContent]
        .filter((part): part is string => part !== undefined && part !== "")
        .join("\n\n");

    return [...history, { role: "user", content: userContent }];
}
