import { z } from "zod";
import { ConfigError } from "../core/errors/index.js";
import { LocalModelBackend, type LocalBackendOptions } from "./local-backend.js";

export const LlamaChatFormatSchema = z.enum(["llama2", "plain"]);
export type LlamaChatFormat = z.infer<typeof LlamaChatFormatSchema>;

/**
 * Llama 2 chat models. GPU offload defaults to whatever the runtime
 * detects.
 */
export class LlamaBackend extends LocalModelBackend {
  readonly name = "llama";
  readonly chatFormat: LlamaChatFormat;

  constructor(options: LocalBackendOptions) {
    super(options);
    const format = LlamaChatFormatSchema.safeParse(options.chatFormat ?? "llama2");
    if (!format.success) {
      throw new ConfigError(`Unsupported chat format for llama: ${options.chatFormat}`);
    }
    this.chatFormat = format.data;
  }

  formatPrompt(prompt: string): string {
    if (this.chatFormat === "plain") {
      return `${this.systemPrompt}\n\n${prompt}\n`;
    }
    return `<s>[INST] <<SYS>>\n${this.systemPrompt}\n<</SYS>>\n\n${prompt} [/INST]\n`;
  }

  protected defaultGpuLayers(): number | undefined {
    return undefined;
  }
}
