import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadEndpointConfig, parseEndpointConfig } from "../endpointConfig.js";
import { ConfigurationError } from "../errors.js";

describe("parseEndpointConfig", () => {
  it("maps an OpenAI-compatible endpoint", () => {
    const config = parseEndpointConfig(
      {
        name: "llama",
        api_base: "http://localhost:5001/v1",
        api_key: "test-key",
        model: "test-model",
        temperature: 0.2,
        max_tokens: 1024,
        stop_words: ["<|im_end|>"],
      },
      "/configs/llama.yaml"
    );

    expect(config).toEqual({
      name: "llama",
      provider: "openai-compatible",
      apiBase: "http://localhost:5001/v1",
      apiKey: "test-key",
      model: "test-model",
      resourceName: undefined,
      apiVersion: undefined,
      temperature: 0.2,
      maxTokens: 1024,
      stopWords: ["<|im_end|>"],
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("names the endpoint after its file and falls back to the shared API key", () => {
    const config = parseEndpointConfig({ api_base: "http://localhost:5001/v1", model: "test-model" }, "/configs/colab.yaml", "test-secret");

    expect(config.name).toBe("colab");
    expect(config.apiKey).toBe("test-secret");
  });

  it("accepts an Azure endpoint without api_base", () => {
    const config = parseEndpointConfig(
      { provider: "azure", resource_name: "test-resource", api_version: "2024-10-21", model: "test-deployment" },
      "azure.yaml"
    );

    expect(config).toMatchObject({ provider: "azure", resourceName: "test-resource", apiVersion: "2024-10-21", model: "test-deployment" });
  });

  it("requires api_base for OpenAI-compatible endpoints", () => {
    expect(() => parseEndpointConfig({ model: "test-model" }, "local.yaml")).toThrow(
      "Invalid endpoint configuration: api_base: api_base is required for openai-compatible endpoints (local.yaml)"
    );
  });

  it("requires resource_name for Azure endpoints", () => {
    expect(() => parseEndpointConfig({ provider: "azure", model: "test-deployment" }, "azure.yaml")).toThrow(ConfigurationError);
  });

  it("rejects a missing model and an unknown provider", () => {
    expect(() => parseEndpointConfig({ api_base: "http://localhost:5001/v1" }, "a.yaml")).toThrow(ConfigurationError);
    expect(() => parseEndpointConfig({ provider: "other", model: "m" }, "b.yaml")).toThrow(ConfigurationError);
  });

  it("rejects an empty document", () => {
    expect(() => parseEndpointConfig(null, "empty.yaml")).toThrow(ConfigurationError);
  });
});

describe("loadEndpointConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "book-sanitizer-config-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reads a YAML file", async () => {
    const configPath = join(tempDir, "local.yaml");
    await writeFile(configPath, "api_base: http://localhost:5001/v1\nmodel: test-model\ntemperature: 0.5\n");

    const config = await loadEndpointConfig(configPath);

    expect(config).toMatchObject({ name: "local", apiBase: "http://localhost:5001/v1", model: "test-model", temperature: 0.5 });
  });

  it("wraps read errors", async () => {
    const configPath = join(tempDir, "missing.yaml");

    await expect(loadEndpointConfig(configPath)).rejects.toMatchObject({
      name: "ConfigurationError",
      filePath: configPath,
    });
  });

  it("wraps YAML syntax errors", async () => {
    const configPath = join(tempDir, "broken.yaml");
    await writeFile(configPath, "model: [unclosed\n");

    await expect(loadEndpointConfig(configPath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
