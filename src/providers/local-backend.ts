import * as fs from "node:fs/promises";
import { GenerationError, ModelLoadError, describeError } from "../core/errors/index.js";
import { createLogger } from "../core/logger.js";
import type { GenerationConfig } from "../core/schemas/index.js";
import type { GenerationBackend } from "./backend.js";
import { nodeLlamaRuntime, type LoadedModel, type ModelRuntime } from "./model-runtime.js";

const logger = createLogger("local-backend");

export const DEFAULT_SYSTEM_PROMPT =
  "You are an expert technical writer specializing in code documentation.";

export interface LocalBackendOptions {
  modelPath: string;
  contextLength: number;
  batchSize: number;
  gpuLayers?: number;
  systemPrompt?: string;
  chatFormat?: string;
  /** Defaults to node-llama-cpp. */
  runtime?: ModelRuntime;
}

/**
 * Shared load/generate/unload for backends that run a GGUF file in-process.
 * Subclasses supply the name, GPU default and chat formatting.
 */
export abstract class LocalModelBackend implements GenerationBackend {
  abstract readonly name: string;

  protected readonly modelPath: string;
  protected readonly systemPrompt: string;
  private readonly runtime: ModelRuntime;
  private readonly contextLength: number;
  private readonly batchSize: number;
  private readonly gpuLayers: number | undefined;
  private model: LoadedModel | undefined;

  constructor(options: LocalBackendOptions) {
    this.modelPath = options.modelPath;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.runtime = options.runtime ?? nodeLlamaRuntime;
    this.contextLength = options.contextLength;
    this.batchSize = options.batchSize;
    this.gpuLayers = options.gpuLayers;
  }

  /** Wrap the prompt in the model's instruction format. */
  abstract formatPrompt(prompt: string): string;

  /** GPU layers used when the configuration leaves them out. */
  protected abstract defaultGpuLayers(): number | undefined;

  get isLoaded(): boolean {
    return this.model !== undefined;
  }

  async load(): Promise<boolean> {
    if (this.model) {
      logger.debug({ backend: this.name }, "Model already loaded");
      return true;
    }

    if (!this.modelPath) {
      return this.loadFailed(new ModelLoadError(this.name, "no model path configured"));
    }

    try {
      await fs.access(this.modelPath);
    } catch (error) {
      return this.loadFailed(
        new ModelLoadError(this.name, `model file not found: ${this.modelPath}`, { cause: error }),
      );
    }

    logger.info(
      { backend: this.name, modelPath: this.modelPath, contextLength: this.contextLength, batchSize: this.batchSize },
      "Loading model",
    );

    try {
      this.model = await this.runtime.loadModel({
        modelPath: this.modelPath,
        contextLength: this.contextLength,
        batchSize: this.batchSize,
        gpuLayers: this.gpuLayers ?? this.defaultGpuLayers(),
      });
    } catch (error) {
      return this.loadFailed(
        new ModelLoadError(this.name, `runtime failed to load model: ${describeError(error)}`, { cause: error }),
      );
    }

    logger.info({ backend: this.name }, "Model loaded");
    return true;
  }

  async generate(promptText: string, config: GenerationConfig): Promise<string> {
    const model = this.model;
    if (!model) {
      throw new GenerationError(`${this.name} model is not loaded`);
    }

    const formatted = this.formatPrompt(promptText);
    logger.debug({ backend: this.name, prompt: preview(formatted) }, "Generating");

    try {
      return await model.complete(formatted, {
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        topP: config.topP,
        stopSequences: config.stopSequences,
      });
    } catch (error) {
      throw new GenerationError(`${this.name} generation failed: ${describeError(error)}`, { cause: error });
    }
  }

  async unload(): Promise<void> {
    const model = this.model;
    this.model = undefined;
    if (model) {
      await model.dispose();
      logger.info({ backend: this.name }, "Model released");
    }
  }

  private loadFailed(error: ModelLoadError): false {
    logger.error({ backend: this.name, err: error }, error.message);
    return false;
  }
}

function preview(text: string): string {
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}
