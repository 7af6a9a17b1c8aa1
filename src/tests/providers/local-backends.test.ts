import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { GenerationError } from "../../core/errors/index.js";
import { DEFAULT_SYSTEM_PROMPT } from "../../providers/local-backend.js";
import { LlamaBackend, MistralBackend } from "../../providers/index.js";
import { fakeRuntime, generationConfig, makeTempDir } from "../helpers/fakes.js";

describe("local model backends", () => {
  let tempDir: string;
  let modelPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    modelPath = path.join(tempDir, "model.gguf");
    await fs.writeFile(modelPath, "not really a model");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("should load through the runtime when the model file exists", async () => {
      const { runtime, loadModel } = fakeRuntime();
      const backend = new MistralBackend({ modelPath, contextLength: 2048, batchSize: 256, runtime });

      expect(await backend.load()).toBe(true);
      expect(backend.isLoaded).toBe(true);
      expect(loadModel).toHaveBeenCalledWith({ modelPath, contextLength: 2048, batchSize: 256, gpuLayers: 0 });
    });

    it("should leave GPU offload to the runtime for llama unless configured", async () => {
      const { runtime, loadModel } = fakeRuntime();
      await new LlamaBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime }).load();
      await new LlamaBackend({ modelPath, contextLength: 4096, batchSize: 512, gpuLayers: 12, runtime }).load();

      expect(loadModel.mock.calls[0]?.[0].gpuLayers).toBeUndefined();
      expect(loadModel.mock.calls[1]?.[0].gpuLayers).toBe(12);
    });

    it("should return false without a model path", async () => {
      const { runtime, loadModel } = fakeRuntime();
      const backend = new LlamaBackend({ modelPath: "", contextLength: 4096, batchSize: 512, runtime });

      expect(await backend.load()).toBe(false);
      expect(backend.isLoaded).toBe(false);
      expect(loadModel).not.toHaveBeenCalled();
    });

    it("should return false when the model file is missing", async () => {
      const { runtime, loadModel } = fakeRuntime();
      const backend = new LlamaBackend({
        modelPath: path.join(tempDir, "absent.gguf"),
        contextLength: 4096,
        batchSize: 512,
        runtime,
      });

      expect(await backend.load()).toBe(false);
      expect(loadModel).not.toHaveBeenCalled();
    });

    it("should return false when the runtime fails", async () => {
      const { runtime, loadModel } = fakeRuntime();
      loadModel.mockRejectedValueOnce(new Error("unsupported architecture"));
      const backend = new MistralBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });

      expect(await backend.load()).toBe(false);
      expect(backend.isLoaded).toBe(false);
    });

    it("should not load twice", async () => {
      const { runtime, loadModel } = fakeRuntime();
      const backend = new MistralBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });

      await backend.load();
      expect(await backend.load()).toBe(true);
      expect(loadModel).toHaveBeenCalledTimes(1);
    });
  });

  describe("generate", () => {
    it("should send the formatted prompt and the sampling settings", async () => {
      const { runtime, complete } = fakeRuntime("Raw output");
      const backend = new MistralBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });
      await backend.load();

      const text = await backend.generate("Describe x", generationConfig({ maxTokens: 64, temperature: 0.1 }));

      expect(text).toBe("Raw output");
      expect(complete).toHaveBeenCalledWith(`<s>[INST] ${DEFAULT_SYSTEM_PROMPT}\n\nDescribe x [/INST]`, {
        maxTokens: 64,
        temperature: 0.1,
        topP: 0.9,
        stopSequences: ["</answer>", "Human:", "User:"],
      });
    });

    it("should throw GenerationError when not loaded", async () => {
      const { runtime } = fakeRuntime();
      const backend = new LlamaBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });

      await expect(backend.generate("x", generationConfig())).rejects.toThrow("llama model is not loaded");
    });

    it("should wrap runtime failures in GenerationError", async () => {
      const { runtime } = fakeRuntime(new Error("context window exceeded"));
      const backend = new LlamaBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });
      await backend.load();

      const failure = backend.generate("x", generationConfig());
      await expect(failure).rejects.toBeInstanceOf(GenerationError);
      await expect(failure).rejects.toThrow("llama generation failed: context window exceeded");
    });
  });

  describe("unload", () => {
    it("should dispose the model once", async () => {
      const { runtime, dispose } = fakeRuntime();
      const backend = new LlamaBackend({ modelPath, contextLength: 4096, batchSize: 512, runtime });
      await backend.load();

      await backend.unload();
      await backend.unload();

      expect(dispose).toHaveBeenCalledTimes(1);
      expect(backend.isLoaded).toBe(false);
    });
  });

  describe("prompt formats", () => {
    const options = { modelPath: "m.gguf", contextLength: 4096, batchSize: 512, systemPrompt: "SYS" };

    it("should use the Llama 2 chat format by default", () => {
      expect(new LlamaBackend(options).formatPrompt("P")).toBe("<s>[INST] <<SYS>>\nSYS\n<</SYS>>\n\nP [/INST]\n");
    });

    it("should support a plain llama format", () => {
      expect(new LlamaBackend({ ...options, chatFormat: "plain" }).formatPrompt("P")).toBe("SYS\n\nP\n");
    });

    it("should use the Mistral instruct format by default", () => {
      expect(new MistralBackend(options).formatPrompt("P")).toBe("<s>[INST] SYS\n\nP [/INST]");
    });

    it("should support the zephyr format", () => {
      expect(new MistralBackend({ ...options, chatFormat: "zephyr" }).formatPrompt("P")).toBe(
        "<|system|>\nSYS\n<|user|>\nP\n<|assistant|>",
      );
    });
  });
});
