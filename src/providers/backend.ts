import type { EntitySubject, GenerationConfig } from "../core/schemas/index.js";

/**
 * GenerationBackend – plug in any local text-generation model.
 * Ships with Llama and Mistral wrappers plus a deterministic MockBackend.
 */
export interface GenerationBackend {
  readonly name: string;
  readonly isLoaded: boolean;

  /**
   * Acquire the model. Idempotent. Resolves to false, never rejects,
   * when the model file or the inference runtime is unavailable.
   */
  load(): Promise<boolean>;

  /**
   * Wrap the prompt in the backend's chat format and run inference.
   * Rejects with GenerationError on any backend failure.
   * `subject` names the entity being described; only the mock uses it.
   */
  generate(promptText: string, config: GenerationConfig, subject?: EntitySubject): Promise<string>;

  /** Release the model handle. */
  unload(): Promise<void>;
}
