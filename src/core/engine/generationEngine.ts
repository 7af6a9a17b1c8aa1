import { GenerationError, describeError } from "../errors/index.js";
import { createLogger } from "../logger.js";
import type { ResponseCache } from "../cache/responseCache.js";
import { buildCondensedPrompt, buildMinimalPrompt } from "../prompts/condense.js";
import type { PromptBuilder } from "../prompts/promptBuilder.js";
import type {
  CodeEntity,
  EntitySubject,
  GenerationConfig,
  GenerationResult,
  GenerationSource,
} from "../schemas/index.js";
import { TextCleaner } from "../text/textCleaner.js";
import type { GenerationBackend } from "../../providers/backend.js";
import { MockBackend } from "../../providers/mock-backend.js";

const logger = createLogger("generation-engine");

/** Share of the context window a prompt may use; the rest is left for the response. */
export const PROMPT_BUDGET_RATIO = 0.5;

/** Whitespace-delimited word count. Exact tokenisation is backend specific. */
export function estimateTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

export function promptBudget(contextLength: number): number {
  return Math.floor(contextLength * PROMPT_BUDGET_RATIO);
}

export interface GenerationEngineOptions {
  backend: GenerationBackend;
  promptBuilder: PromptBuilder;
  config: GenerationConfig;
  /** Omit to disable caching. */
  cache?: ResponseCache;
  /** Used when the backend cannot be loaded. */
  fallbackBackend?: GenerationBackend;
}

type LoadState = "unloaded" | "loaded" | "failed";

interface LadderStage {
  source: Extract<GenerationSource, "direct" | "condensed" | "fallback">;
  prompt: string;
}

/**
 * GenerationEngine – turns one entity into cleaned documentation text.
 *
 *   cache hit                      → cache
 *   backend cannot load            → mock
 *   prompt within budget           → direct, else skip to condensation
 *   direct fails                   → condensed (first code block + name + kind)
 *   condensed fails                → fallback ("briefly describe a <kind> named <name>")
 *   fallback fails                 → GenerationError
 *
 * At most three backend calls per entity. Every successful result is
 * cleaned once and cached under the ORIGINAL prompt.
 *
 * The engine owns the backend: call dispose() to release the model.
 */
export class GenerationEngine {
  private readonly backend: GenerationBackend;
  private readonly fallbackBackend: GenerationBackend;
  private readonly promptBuilder: PromptBuilder;
  private readonly cache: ResponseCache | undefined;
  private readonly config: GenerationConfig;
  private readonly cleaner: TextCleaner;
  private loadState: LoadState = "unloaded";

  constructor(options: GenerationEngineOptions) {
    this.backend = options.backend;
    this.fallbackBackend = options.fallbackBackend ?? new MockBackend();
    this.promptBuilder = options.promptBuilder;
    this.cache = options.cache;
    this.config = options.config;
    this.cleaner = new TextCleaner(options.config.stopSequences);
  }

  get backendName(): string {
    return this.loadState === "failed" ? this.fallbackBackend.name : this.backend.name;
  }

  /** Build the entity's prompt and generate for it. */
  async generate(entity: CodeEntity): Promise<GenerationResult> {
    const prompt = this.promptBuilder.build(entity);
    return this.generateForPrompt(prompt, { kind: entity.kind, name: entity.name });
  }

  async generateForPrompt(prompt: string, subject: EntitySubject): Promise<GenerationResult> {
    const log = logger.child({ entity: subject.name, kind: subject.kind });

    const cached = await this.cache?.get(prompt);
    if (cached !== undefined) {
      log.debug("Using cached documentation");
      return { text: cached, source: "cache" };
    }

    const mock = await this.resolveMock();
    if (mock) {
      const raw = await mock.generate(prompt, this.config, subject);
      return this.finish(prompt, this.cleaner.clean(raw), "mock");
    }

    const estimate = estimateTokens(prompt);
    const budget = promptBudget(this.config.contextLength);
    const stages: LadderStage[] = [];

    if (estimate <= budget) {
      stages.push({ source: "direct", prompt });
    } else {
      log.info({ estimate, budget }, "Prompt exceeds budget, condensing");
    }

    const condensed = buildCondensedPrompt(prompt);
    stages.push({ source: "condensed", prompt: condensed.prompt });
    stages.push({ source: "fallback", prompt: buildMinimalPrompt(condensed.kind, condensed.name) });

    let lastError: unknown;
    for (const stage of stages) {
      try {
        const text = await this.attempt(stage.prompt, subject);
        log.debug({ source: stage.source }, "Generated documentation");
        return this.finish(prompt, text, stage.source);
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        lastError = error;
        log.warn({ source: stage.source, reason: error.message }, "Generation stage failed");
      }
    }

    throw new GenerationError(
      `All generation stages failed for ${subject.kind} "${subject.name}": ${describeError(lastError)}`,
      { cause: lastError },
    );
  }

  /** Release the model handle. The engine reloads lazily if used again. */
  async dispose(): Promise<void> {
    if (this.backend.isLoaded) {
      await this.backend.unload();
    }
    this.loadState = "unloaded";
  }

  /** The backend to use instead of the ladder, if the real model is out of reach. */
  private async resolveMock(): Promise<GenerationBackend | undefined> {
    if (this.backend instanceof MockBackend) return this.backend;
    return (await this.ensureLoaded()) ? undefined : this.fallbackBackend;
  }

  private async ensureLoaded(): Promise<boolean> {
    if (this.loadState === "unloaded") {
      const loaded = await this.backend.load();
      this.loadState = loaded ? "loaded" : "failed";
      if (!loaded) {
        logger.warn(
          { backend: this.backend.name, fallback: this.fallbackBackend.name },
          "Backend unavailable, using fallback backend",
        );
      }
    }
    return this.loadState === "loaded";
  }

  private async attempt(prompt: string, subject: EntitySubject): Promise<string> {
    const raw = await this.backend.generate(prompt, this.config, subject);
    const text = this.cleaner.clean(raw);
    if (text === "") {
      throw new GenerationError(`${this.backend.name} returned no usable text`);
    }
    return text;
  }

  private async finish(prompt: string, text: string, source: GenerationSource): Promise<GenerationResult> {
    await this.cache?.put(prompt, text);
    return { text, source };
  }
}
