export * from "./core/schemas/index.js";
export * from "./core/errors/index.js";
export { createLogger, setLogLevel, addLogFile } from "./core/logger.js";
export { PromptTemplateStore, findInvalidPlaceholder } from "./core/prompts/templateStore.js";
export { PromptBuilder, buildPrompt } from "./core/prompts/promptBuilder.js";
export {
  buildCondensedPrompt,
  buildMinimalPrompt,
  classifyPromptKind,
  extractCodeBlocks,
  extractEntityName,
  type PromptKind,
} from "./core/prompts/condense.js";
export { ResponseCache, digestPrompt } from "./core/cache/responseCache.js";
export { TextCleaner, ROLE_MARKERS } from "./core/text/textCleaner.js";
export {
  GenerationEngine,
  estimateTokens,
  promptBudget,
  type GenerationEngineOptions,
} from "./core/engine/generationEngine.js";
export { DocumentationRun, ERROR_MARKER_PREFIX, type RunResult } from "./core/pipeline/documentationRun.js";
export { createEngine, documentProject, type SessionOptions } from "./core/pipeline/session.js";
export { extractSources, listSourceFiles, type ExtractSourcesOptions } from "./core/pipeline/sources.js";
export {
  createExtractor,
  extractorForPath,
  extractJavaStructure,
  extractPythonStructure,
  CodeLanguageSchema,
  LANGUAGE_EXTENSIONS,
  type CodeLanguage,
  type SourceExtractor,
  type ExtractorOptions,
} from "./core/parser/index.js";
export { createRenderer, writeDocuments, MarkdownRenderer, HtmlRenderer } from "./core/render/index.js";
export { loadConfig, parseConfig, parseConfigYaml, applyOverrides, type AppConfig } from "./core/config/index.js";
export * from "./providers/index.js";
