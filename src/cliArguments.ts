import { parseArgs } from "util";
import { CliUsageError } from "./errors.js";
import { DEFAULT_MAX_CHUNK_TOKENS } from "./chunkOptions.js";
import { DEFAULT_RETRY_OPTIONS } from "./retryOptions.js";
import { DEFAULT_INPUT_EXTENSIONS, parseExtensionList } from "./utilities.js";

type Token = NonNullable<ReturnType<typeof parseArgs>["tokens"]>[number];

export const HELP = `
Usage: book-sanitizer --input <dir> --output <dir> --config <file> [<file> ...] [--config <file> ...]

Cleans up OCR'd book excerpts from text files with one or more LLM endpoints.
Each input file name.txt becomes name.txt.yaml in the output directory. With
several --config files, all endpoints run at once and each writes into its own
sub-directory named after the endpoint.

Options:
  -i, --input <dir>       Directory of text files to sanitize
  -o, --output <dir>      Directory where YAML files are written
  -c, --config <file>...  Endpoint configurations (YAML), one endpoint each; list several
                          after one --config or repeat the flag
  -t, --template <file>   Prompt template (YAML); defaults to the bundled book_txt_sanitizer
      --max-tokens <n>    Maximum tokens per chunk (default: MAX_CHUNK_TOKENS or ${DEFAULT_MAX_CHUNK_TOKENS})
  -h, --help              Show this help

Environment:
  MAX_CHUNK_TOKENS        Maximum tokens per chunk (default ${DEFAULT_MAX_CHUNK_TOKENS})
  MAX_RETRIES             Retries per chunk after the first attempt (default ${DEFAULT_RETRY_OPTIONS.maxRetries})
  RETRY_BASE_DELAY_MS     Wait before the first retry, doubled each time (default ${DEFAULT_RETRY_OPTIONS.initialDelay})
  INPUT_EXTENSIONS        Comma-separated input extensions (default ${DEFAULT_INPUT_EXTENSIONS.join(",")})
  SANITIZER_API_KEY       API key for endpoint configurations without api_key
`;

/** Everything a run needs, resolved from the command line and the environment. */
export interface RunSettings {
    inputDir: string;
    outputDir: string;
    configPaths: string[];
    templatePath?: string;
    maxTokens: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    extensions: string[];
    fallbackApiKey?: string;
}

export type CliCommand = { kind: "help" } | { kind: "run"; settings: RunSettings };

/** Parses an integer setting, rejecting anything below `min`. */
function parseIntegerSetting(name: string, value: string | undefined, fallback: number, min: number): number {
    if (value === undefined || value.trim() === "") {
        return fallback;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
        const expected = min > 0 ? "a positive integer" : "a non-negative integer";
        throw new CliUsageError(`${name} must be ${expected}, got '${value}'.`);
    }
    return parsed;
}

const CLI_OPTIONS = {
    input: { type: "string", short: "i" },
    output: { type: "string", short: "o" },
    config: { type: "string", short: "c", multiple: true },
    template: { type: "string", short: "t" },
    "max-tokens": { type: "string" },
    help: { type: "boolean", short: "h" },
} as const;

/** Runs util.parseArgs, reporting its errors as usage errors. */
function parseFlags(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: true, tokens: true });
    } catch (error) {
        throw new CliUsageError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Collects the config paths in command-line order. Arguments following a
 * --config value are more config paths (`--config a.yaml b.yaml`); any other
 * positional argument is a usage error.
 */
function collectConfigPaths(tokens: readonly Token[]): string[] {
    const configPaths: string[] = [];
    let afterConfig = false;
    for (const token of tokens) {
        if (token.kind === "option") {
            afterConfig = token.name === "config";
            if (afterConfig && token.value !== undefined) {
                configPaths.push(token.value);
            }
        } else if (token.kind === "positional") {
            if (!afterConfig) {
                throw new CliUsageError(`Unexpected argument '${token.value}'.`);
            }
            configPaths.push(token.value);
        } else {
            afterConfig = false;
        }
    }
    return configPaths;
}

/**
 * Resolves the command line and environment into run settings.
 * @throws {CliUsageError} On unknown flags, missing required flags or invalid numbers.
 */
export function parseCliArguments(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
    const { values, tokens } = parseFlags(argv);

    if (values.help) {
        return { kind: "help" };
    }

    if (!values.input) throw new CliUsageError("Missing required option --input.");
    if (!values.output) throw new CliUsageError("Missing required option --output.");
    const configPaths = collectConfigPaths(tokens ?? []);
    if (configPaths.length === 0) throw new CliUsageError("At least one --config file is required.");

    const extensions = env.INPUT_EXTENSIONS ? parseExtensionList(env.INPUT_EXTENSIONS) : [...DEFAULT_INPUT_EXTENSIONS];
    if (extensions.length === 0) {
        throw new CliUsageError("INPUT_EXTENSIONS must name at least one extension.");
    }

    return {
        kind: "run",
        settings: {
            inputDir: values.input,
            outputDir: values.output,
            configPaths,
            templatePath: values.template,
            maxTokens: values["max-tokens"] !== undefined
                ? parseIntegerSetting("--max-tokens", values["max-tokens"], DEFAULT_MAX_CHUNK_TOKENS, 1)
                : parseIntegerSetting("MAX_CHUNK_TOKENS", env.MAX_CHUNK_TOKENS, DEFAULT_MAX_CHUNK_TOKENS, 1),
            maxRetries: parseIntegerSetting("MAX_RETRIES", env.MAX_RETRIES, DEFAULT_RETRY_OPTIONS.maxRetries, 0),
            retryBaseDelayMs: parseIntegerSetting("RETRY_BASE_DELAY_MS", env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_OPTIONS.initialDelay, 0),
            extensions,
            fallbackApiKey: env.SANITIZER_API_KEY || undefined,
        },
    };
}
