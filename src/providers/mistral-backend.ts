import { z } from "zod";
import { ConfigError } from "../core/errors/index.js";
import { LocalModelBackend, type LocalBackendOptions } from "./local-backend.js";

export const MistralChatFormatSchema = z.enum(["instruct", "zephyr", "plain"]);
export type MistralChatFormat = z.infer<typeof MistralChatFormatSchema>;

/** Mistral instruct models (and Zephyr fine-tunes). CPU only unless gpuLayers is set. */
export class MistralBackend extends LocalModelBackend {
  readonly name = "mistral";
  readonly chatFormat: MistralChatFormat;

  constructor(options: LocalBackendOptions) {
    super(options);
    const format = MistralChatFormatSchema.safeParse(options.chatFormat ?? "instruct");
    if (!format.success) {
      throw new ConfigError(`Unsupported chat format for mistral: ${options.chatFormat}`);
    }
    this.chatFormat = format.data;
  }

  formatPrompt(prompt: string): string {
    switch (this.chatFormat) {
      case "instruct":
        return `<s>[INST] ${this.systemPrompt}\n\n${prompt} [/INST]`;
      case "zephyr":
        return `<|system|>\n${this.systemPrompt}\n<|user|>\n${prompt}\n<|assistant|>`;
      case "plain":
        return `${this.systemPrompt}\n\n${prompt}\n`;
    }
  }

  protected defaultGpuLayers(): number {
    return 0;
  }
}
