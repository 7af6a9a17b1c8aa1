import { ResponseCache } from "../cache/responseCache.js";
import type { AppConfig } from "../config/index.js";
import { GenerationEngine } from "../engine/generationEngine.js";
import { createLogger } from "../logger.js";
import { createExtractor } from "../parser/index.js";
import { PromptBuilder } from "../prompts/promptBuilder.js";
import { PromptTemplateStore } from "../prompts/templateStore.js";
import { createRenderer, writeDocuments } from "../render/index.js";
import { GenerationConfigSchema } from "../schemas/index.js";
import { createBackend } from "../../providers/index.js";
import type { GenerationBackend } from "../../providers/backend.js";
import type { ModelRuntime } from "../../providers/model-runtime.js";
import { DocumentationRun, type RunResult } from "./documentationRun.js";
import { extractSources } from "./sources.js";

const logger = createLogger("session");

export interface SessionOptions {
  /** Replaces the backend the configuration names. */
  backend?: GenerationBackend;
  runtime?: ModelRuntime;
  templates?: PromptTemplateStore;
}

/**
 * Wire the engine described by the configuration. Fails with ConfigError
 * (unknown backend, bad templates) before anything is generated.
 */
export async function createEngine(config: AppConfig, options: SessionOptions = {}): Promise<GenerationEngine> {
  const backend = options.backend ?? createBackend(config.backend, { runtime: options.runtime });
  const templates = options.templates ?? (await PromptTemplateStore.fromFile(config.promptTemplatesPath));

  return new GenerationEngine({
    backend,
    promptBuilder: new PromptBuilder(templates),
    config: GenerationConfigSchema.parse(config.backend),
    cache: config.backend.useCache ? new ResponseCache(config.backend.cacheDir) : undefined,
  });
}

export interface ProjectResult extends RunResult {
  written: string[];
  backend: string;
}

/** Extract, generate and render documentation for the whole input directory. */
export async function documentProject(config: AppConfig, options: SessionOptions = {}): Promise<ProjectResult> {
  const selection = createRenderer(config.outputFormat, {
    codeLanguage: config.codeLanguage,
    includeSource: config.includeSource,
  });
  const extractor = createExtractor(config.codeLanguage);
  const engine = await createEngine(config, options);

  try {
    const structures = await extractSources(config.inputDir, {
      extensions: config.fileExtensions,
      maxContextLines: config.maxContextLines,
      extractor,
    });
    logger.info({ inputDir: config.inputDir, files: structures.length }, "Source files found");

    const run = new DocumentationRun(engine);
    const result = await run.run(structures);
    const written = await writeDocuments(selection, result.files, {
      outputDir: config.outputDir,
      project: config.project,
      generateIndex: config.generateIndex,
    });
    return { ...result, written, backend: engine.backendName };
  } finally {
    await engine.dispose();
  }
}
