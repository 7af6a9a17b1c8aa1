export interface LoadModelOptions {
  modelPath: string;
  contextLength: number;
  batchSize: number;
  /** Layers offloaded to the GPU. Undefined lets the runtime decide. */
  gpuLayers?: number;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  topP: number;
  stopSequences: readonly string[];
}

export interface LoadedModel {
  complete(text: string, options: CompletionOptions): Promise<string>;
  dispose(): Promise<void>;
}

/** Seam between the backends and the inference library. */
export interface ModelRuntime {
  loadModel(options: LoadModelOptions): Promise<LoadedModel>;
}

/**
 * GGUF inference through node-llama-cpp. The library (and its native
 * binaries) is imported on first load only, so a broken install surfaces
 * as a failed load rather than a crash at start-up.
 */
export const nodeLlamaRuntime: ModelRuntime = {
  async loadModel(options: LoadModelOptions): Promise<LoadedModel> {
    const { getLlama, LlamaCompletion } = await import("node-llama-cpp");

    const llama = await getLlama();
    const model = await llama.loadModel({
      modelPath: options.modelPath,
      gpuLayers: options.gpuLayers ?? "auto",
    });
    const context = await model.createContext({
      contextSize: options.contextLength,
      batchSize: options.batchSize,
    });
    const sequence = context.getSequence();
    const completion = new LlamaCompletion({ contextSequence: sequence });

    return {
      async complete(text: string, completionOptions: CompletionOptions): Promise<string> {
        // Every request starts from an empty context.
        await sequence.clearHistory();
        return completion.generateCompletion(text, {
          maxTokens: completionOptions.maxTokens,
          temperature: completionOptions.temperature,
          topP: completionOptions.topP,
          customStopTriggers: [...completionOptions.stopSequences],
        });
      },
      async dispose(): Promise<void> {
        completion.dispose();
        await context.dispose();
        await model.dispose();
        await llama.dispose();
      },
    };
  },
};
