import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { applyOverrides, loadConfig, parseConfig, parseConfigYaml } from "../../core/config/index.js";
import { ConfigError } from "../../core/errors/index.js";
import { makeTempDir } from "../helpers/fakes.js";

describe("parseConfig", () => {
  it("should fill every default", () => {
    const config = parseConfig({});
    expect(config.inputDir).toBe("data/input");
    expect(config.outputDir).toBe("data/output");
    expect(config.outputFormat).toBe("markdown");
    expect(config.fileExtensions).toEqual([".py"]);
    expect(config.maxContextLines).toBe(50);
    expect(config.promptTemplatesPath).toBe("config/prompt_templates.yaml");
    expect(config.backend).toEqual({
      backendType: "mock",
      modelPath: "",
      contextLength: 4096,
      temperature: 0.2,
      topP: 0.9,
      maxTokens: 1024,
      batchSize: 512,
      cacheDir: "cache",
      useCache: true,
      stopSequences: ["</answer>", "Human:", "User:"],
    });
  });

  it("should map snake_case keys to the in-memory form", () => {
    const config = parseConfigYaml(
      [
        "project_name: Rates",
        "output_format: html",
        "parser:",
        "  max_context_lines: 10",
        "llm:",
        "  type: llama",
        "  model_path: models/m.gguf",
        "  context_length: 2048",
        "  gpu_layers: 8",
        "  use_cache: false",
        "  chat_format: plain",
      ].join("\n"),
    );

    expect(config.project.name).toBe("Rates");
    expect(config.outputFormat).toBe("html");
    expect(config.maxContextLines).toBe(10);
    expect(config.backend).toMatchObject({
      backendType: "llama",
      modelPath: "models/m.gguf",
      contextLength: 2048,
      gpuLayers: 8,
      useCache: false,
      chatFormat: "plain",
    });
  });

  it("should report invalid values with their path", () => {
    expect(() => parseConfig({ llm: { context_length: -1 } }, "c.yaml")).toThrow(ConfigError);
    expect(() => parseConfig({ llm: { context_length: -1 } }, "c.yaml")).toThrow(
      "Invalid c.yaml: llm.context_length: Number must be greater than 0",
    );
  });

  it("should default the extensions to those of the code language", () => {
    const java = parseConfig({ code_language: "java" });
    expect(java.codeLanguage).toBe("java");
    expect(java.fileExtensions).toEqual([".java"]);
    expect(parseConfig({ code_language: "java", file_extensions: [".java", ".jav"] }).fileExtensions).toEqual([
      ".java",
      ".jav",
    ]);
  });

  it("should reject an unknown code language", () => {
    expect(() => parseConfig({ code_language: "cobol" }, "c.yaml")).toThrow(ConfigError);
  });

  it("should read the optional log file", () => {
    expect(parseConfig({}).logFile).toBeUndefined();
    expect(parseConfig({ log_file: "logs/codescribe.log" }).logFile).toBe("logs/codescribe.log");
  });

  it("should reject unparseable YAML", () => {
    expect(() => parseConfigYaml("llm: [", "c.yaml")).toThrow("Cannot parse c.yaml");
  });
});

describe("applyOverrides", () => {
  const base = parseConfig({});

  it("should replace only what is given", () => {
    const config = applyOverrides(base, { inputDir: "src", backendType: "mistral", modelPath: "m.gguf" });
    expect(config.inputDir).toBe("src");
    expect(config.outputDir).toBe(base.outputDir);
    expect(config.backend.backendType).toBe("mistral");
    expect(config.backend.modelPath).toBe("m.gguf");
    expect(base.backend.backendType).toBe("mock");
  });

  it("should validate the output format", () => {
    expect(applyOverrides(base, { outputFormat: "HTML" }).outputFormat).toBe("html");
    expect(() => applyOverrides(base, { outputFormat: "pdf" })).toThrow("Unsupported documentation format: pdf");
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let savedModelPath: string | undefined;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    savedModelPath = process.env["CODESCRIBE_MODEL_PATH"];
    delete process.env["CODESCRIBE_MODEL_PATH"];
  });

  afterEach(async () => {
    if (savedModelPath !== undefined) {
      process.env["CODESCRIBE_MODEL_PATH"] = savedModelPath;
    } else {
      delete process.env["CODESCRIBE_MODEL_PATH"];
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should read the shipped configuration", async () => {
    const config = await loadConfig("config/config.yaml");
    expect(config.backend.backendType).toBe("mistral");
    expect(config.backend.modelPath).toBe("models/mistral-7b-instruct-v0.1.Q4_K_M.gguf");
  });

  it("should fall back to defaults when the file is missing", async () => {
    const config = await loadConfig(path.join(tempDir, "absent.yaml"));
    expect(config.backend.backendType).toBe("mock");
  });

  it("should let the environment override the model path", async () => {
    process.env["CODESCRIBE_MODEL_PATH"] = "/models/other.gguf";
    const file = path.join(tempDir, "config.yaml");
    await fs.writeFile(file, "llm:\n  type: llama\n  model_path: models/a.gguf\n");

    const config = await loadConfig(file);
    expect(config.backend.modelPath).toBe("/models/other.gguf");
  });
});
