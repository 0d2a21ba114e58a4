import { Chunker } from "./chunker.js";
import { HELP, parseCliArguments } from "./cliArguments.js";
import { runEndpoints } from "./endpointRunner.js";
import { CliUsageError } from "./errors.js";
import { loadPromptTemplate } from "./promptTemplate.js";

/** Exit code for bad command line arguments or environment values. */
export const USAGE_EXIT_CODE = 2;

/**
 * Parses arguments and runs every endpoint to completion.
 * Endpoint failures, including an unreadable input directory or prompt template,
 * are logged by the runner and do not change the exit code.
 * @returns The process exit code.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const command = parseCliArguments(argv, env);
    if (command.kind === "help") {
      console.log(HELP);
      return 0;
    }
    const settings = command.settings;

    console.log(`Sanitizing ${settings.inputDir} with ${settings.configPaths.length} endpoint(s), ${settings.maxTokens} tokens per chunk.`);

    await runEndpoints({
      inputDir: settings.inputDir,
      outputDir: settings.outputDir,
      configPaths: settings.configPaths,
      extensions: settings.extensions,
      chunker: new Chunker({ maxTokens: settings.maxTokens }),
      loadTemplate: () => loadPromptTemplate(settings.templatePath),
      retryOptions: { maxRetries: settings.maxRetries, initialDelay: settings.retryBaseDelayMs },
      fallbackApiKey: settings.fallbackApiKey,
    });
    return 0;
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n${HELP}`);
      return USAGE_EXIT_CODE;
    }
    console.error("FATAL ERROR during sanitization:", error);
    return 1;
  }
}
