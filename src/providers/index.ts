/**
 * Backend factory – resolves the configured backend type.
 *
 *   llama   → LlamaBackend   (node-llama-cpp, Llama 2 chat format)
 *   mistral → MistralBackend (node-llama-cpp, Mistral instruct format)
 *   mock    → MockBackend    (no model, deterministic text)
 *
 * Matching is case-insensitive; anything else is a ConfigError raised
 * before any generation happens.
 */
export { MockBackend } from "./mock-backend.js";
export { LlamaBackend } from "./llama-backend.js";
export { MistralBackend } from "./mistral-backend.js";
export { LocalModelBackend } from "./local-backend.js";
export { nodeLlamaRuntime } from "./model-runtime.js";
export type { GenerationBackend } from "./backend.js";
export type { ModelRuntime, LoadedModel, LoadModelOptions, CompletionOptions } from "./model-runtime.js";

import { ConfigError } from "../core/errors/index.js";
import { BackendTypeSchema, type BackendSettings } from "../core/schemas/index.js";
import type { GenerationBackend } from "./backend.js";
import { LlamaBackend } from "./llama-backend.js";
import type { LocalBackendOptions } from "./local-backend.js";
import { MistralBackend } from "./mistral-backend.js";
import { MockBackend } from "./mock-backend.js";
import type { ModelRuntime } from "./model-runtime.js";

export function createBackend(
  settings: Pick<
    BackendSettings,
    "backendType" | "modelPath" | "contextLength" | "batchSize" | "gpuLayers" | "systemPrompt" | "chatFormat"
  >,
  options?: { runtime?: ModelRuntime },
): GenerationBackend {
  const type = BackendTypeSchema.safeParse(settings.backendType.trim().toLowerCase());
  if (!type.success) {
    throw new ConfigError(
      `Unsupported backend type: ${settings.backendType} (expected one of ${BackendTypeSchema.options.join(", ")})`,
    );
  }

  const local: LocalBackendOptions = {
    modelPath: settings.modelPath,
    contextLength: settings.contextLength,
    batchSize: settings.batchSize,
    gpuLayers: settings.gpuLayers,
    systemPrompt: settings.systemPrompt,
    chatFormat: settings.chatFormat,
    runtime: options?.runtime,
  };

  switch (type.data) {
    case "llama":
      return new LlamaBackend(local);
    case "mistral":
      return new MistralBackend(local);
    case "mock":
      return new MockBackend();
  }
}
