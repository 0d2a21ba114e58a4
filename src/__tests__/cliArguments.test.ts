import { describe, it, expect } from "vitest";
import { parseCliArguments } from "../cliArguments.js";
import { CliUsageError } from "../errors.js";

const REQUIRED = ["--input", "books", "--output", "out", "--config", "llama.yaml"];

describe("parseCliArguments", () => {
  it("applies the defaults", () => {
    expect(parseCliArguments(REQUIRED, {})).toEqual({
      kind: "run",
      settings: {
        inputDir: "books",
        outputDir: "out",
        configPaths: ["llama.yaml"],
        templatePath: undefined,
        maxTokens: 500,
        maxRetries: 5,
        retryBaseDelayMs: 500,
        extensions: [".txt"],
        fallbackApiKey: undefined,
      },
    });
  });

  it("collects repeated --config flags", () => {
    const command = parseCliArguments(["-i", "books", "-o", "out", "-c", "llama.yaml", "--config", "colab.yaml"], {});

    expect(command.kind === "run" && command.settings.configPaths).toEqual(["llama.yaml", "colab.yaml"]);
  });

  it("takes several paths after one --config", () => {
    const command = parseCliArguments(["-i", "books", "-o", "out", "--config", "llama.yaml", "colab.yaml"], {});

    expect(command.kind === "run" && command.settings.configPaths).toEqual(["llama.yaml", "colab.yaml"]);
  });

  it("keeps config paths in command-line order across both forms", () => {
    const command = parseCliArguments(["-c", "a.yaml", "b.yaml", "-i", "books", "--config", "c.yaml", "-o", "out"], {});

    expect(command.kind === "run" && command.settings.configPaths).toEqual(["a.yaml", "b.yaml", "c.yaml"]);
  });

  it("reads tuning from the environment", () => {
    const command = parseCliArguments([...REQUIRED, "--template", "custom.yaml"], {
      MAX_CHUNK_TOKENS: "800",
      MAX_RETRIES: "0",
      RETRY_BASE_DELAY_MS: "250",
      INPUT_EXTENSIONS: "txt, .TEXT",
      SANITIZER_API_KEY: "test-secret",
    });

    expect(command).toMatchObject({
      kind: "run",
      settings: {
        templatePath: "custom.yaml",
        maxTokens: 800,
        maxRetries: 0,
        retryBaseDelayMs: 250,
        extensions: [".txt", ".text"],
        fallbackApiKey: "test-secret",
      },
    });
  });

  it("lets --max-tokens override MAX_CHUNK_TOKENS", () => {
    const command = parseCliArguments([...REQUIRED, "--max-tokens", "300"], { MAX_CHUNK_TOKENS: "800" });

    expect(command.kind === "run" && command.settings.maxTokens).toBe(300);
  });

  it("returns the help command", () => {
    expect(parseCliArguments(["--help"], {})).toEqual({ kind: "help" });
  });

  it("requires input, output and at least one config", () => {
    expect(() => parseCliArguments(["--output", "out", "--config", "a.yaml"], {})).toThrow("Missing required option --input.");
    expect(() => parseCliArguments(["--input", "in", "--config", "a.yaml"], {})).toThrow("Missing required option --output.");
    expect(() => parseCliArguments(["--input", "in", "--output", "out"], {})).toThrow("At least one --config file is required.");
  });

  it("rejects unknown flags and arguments outside --config", () => {
    expect(() => parseCliArguments([...REQUIRED, "--verbose"], {})).toThrow(CliUsageError);
    expect(() => parseCliArguments(["extra", ...REQUIRED], {})).toThrow("Unexpected argument 'extra'.");
    expect(() => parseCliArguments([...REQUIRED, "--max-tokens", "300", "extra"], {})).toThrow("Unexpected argument 'extra'.");
    expect(() => parseCliArguments([...REQUIRED, "--", "extra"], {})).toThrow("Unexpected argument 'extra'.");
  });

  it("rejects invalid numbers", () => {
    expect(() => parseCliArguments([...REQUIRED, "--max-tokens", "0"], {})).toThrow("--max-tokens must be a positive integer, got '0'.");
    expect(() => parseCliArguments(REQUIRED, { MAX_RETRIES: "-1" })).toThrow("MAX_RETRIES must be a non-negative integer, got '-1'.");
    expect(() => parseCliArguments(REQUIRED, { RETRY_BASE_DELAY_MS: "fast" })).toThrow(CliUsageError);
  });

  it("rejects an empty extension list", () => {
    expect(() => parseCliArguments(REQUIRED, { INPUT_EXTENSIONS: " , " })).toThrow("INPUT_EXTENSIONS must name at least one extension.");
  });
});
