import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, isNotFoundError } from "../errors/index.js";
import { createLogger } from "../logger.js";
import { CodeLanguageSchema, LANGUAGE_EXTENSIONS } from "../parser/index.js";
import { BackendSettingsSchema, DEFAULT_STOP_SEQUENCES, type BackendSettings } from "../schemas/index.js";
import type { ProjectInfo } from "../render/markdownRenderer.js";

const logger = createLogger("config");

export const DEFAULT_CONFIG_PATH = "config/config.yaml";

// ── File format (snake_case, as written in config.yaml) ───────────────
const LlmBlockSchema = z
  .object({
    type: z.string().min(1).default("mock"),
    model_path: z.string().default(""),
    context_length: z.number().int().positive().default(4096),
    temperature: z.number().min(0).max(2).default(0.2),
    top_p: z.number().min(0).max(1).default(0.9),
    max_tokens: z.number().int().positive().default(1024),
    batch_size: z.number().int().positive().default(512),
    gpu_layers: z.number().int().optional(),
    cache_dir: z.string().min(1).default("cache"),
    use_cache: z.boolean().default(true),
    stop_sequences: z.array(z.string()).default(DEFAULT_STOP_SEQUENCES),
    system_prompt: z.string().optional(),
    chat_format: z.string().optional(),
  })
  .default({});

export const ConfigFileSchema = z.object({
  project_name: z.string().default("Code Documentation"),
  project_description: z.string().default(""),
  input_dir: z.string().min(1).default("data/input"),
  output_dir: z.string().min(1).default("data/output"),
  code_language: CodeLanguageSchema.default("python"),
  // Defaults to the extensions of code_language.
  file_extensions: z.array(z.string().min(1)).min(1).optional(),
  output_format: z.enum(["markdown", "html"]).default("markdown"),
  generate_index: z.boolean().default(true),
  include_source: z.boolean().default(true),
  parser: z
    .object({
      max_context_lines: z.number().int().nonnegative().default(50),
    })
    .default({}),
  llm: LlmBlockSchema,
  prompt_templates: z.string().min(1).default("config/prompt_templates.yaml"),
  log_file: z.string().min(1).optional(),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ── In-memory form ────────────────────────────────────────────────────
export interface AppConfig {
  project: ProjectInfo;
  inputDir: string;
  outputDir: string;
  codeLanguage: ConfigFile["code_language"];
  fileExtensions: string[];
  outputFormat: ConfigFile["output_format"];
  generateIndex: boolean;
  includeSource: boolean;
  maxContextLines: number;
  promptTemplatesPath: string;
  /** Log lines are also appended here when set. */
  logFile?: string;
  backend: BackendSettings;
}

export interface ConfigOverrides {
  inputDir?: string;
  outputDir?: string;
  outputFormat?: string;
  modelPath?: string;
  backendType?: string;
}

export function parseConfig(data: unknown, origin = "configuration"): AppConfig {
  const parsed = ConfigFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw ConfigError.fromZod(origin, parsed.error);
  }
  const file = parsed.data;
  const llm = file.llm;

  const backend = BackendSettingsSchema.parse({
    backendType: llm.type,
    modelPath: llm.model_path,
    contextLength: llm.context_length,
    temperature: llm.temperature,
    topP: llm.top_p,
    maxTokens: llm.max_tokens,
    batchSize: llm.batch_size,
    gpuLayers: llm.gpu_layers,
    cacheDir: llm.cache_dir,
    useCache: llm.use_cache,
    stopSequences: llm.stop_sequences,
    systemPrompt: llm.system_prompt,
    chatFormat: llm.chat_format,
  });

  return {
    project: { name: file.project_name, description: file.project_description },
    inputDir: file.input_dir,
    outputDir: file.output_dir,
    codeLanguage: file.code_language,
    fileExtensions: file.file_extensions ?? [...LANGUAGE_EXTENSIONS[file.code_language]],
    outputFormat: file.output_format,
    generateIndex: file.generate_index,
    includeSource: file.include_source,
    maxContextLines: file.parser.max_context_lines,
    promptTemplatesPath: file.prompt_templates,
    logFile: file.log_file,
    backend,
  };
}

export function parseConfigYaml(source: string, origin = "configuration"): AppConfig {
  let data: unknown;
  try {
    data = parseYaml(source);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${origin}`, { cause: error });
  }
  return parseConfig(data, origin);
}

/**
 * Load the YAML configuration. A missing file yields the defaults;
 * CODESCRIBE_MODEL_PATH, when set, replaces the configured model path.
 */
export async function loadConfig(filepath: string = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let config: AppConfig;
  try {
    config = parseConfigYaml(await fs.readFile(filepath, "utf-8"), filepath);
  } catch (error) {
    if (!isNotFoundError(error)) throw error;
    logger.warn({ filepath }, "Configuration file not found, using defaults");
    config = parseConfig({}, filepath);
  }

  const envModelPath = process.env["CODESCRIBE_MODEL_PATH"];
  if (envModelPath) {
    config = applyOverrides(config, { modelPath: envModelPath });
  }
  return config;
}

export function applyOverrides(config: AppConfig, overrides: ConfigOverrides): AppConfig {
  let outputFormat = config.outputFormat;
  if (overrides.outputFormat !== undefined) {
    const format = ConfigFileSchema.shape.output_format.safeParse(overrides.outputFormat.toLowerCase());
    if (!format.success) {
      throw new ConfigError(`Unsupported documentation format: ${overrides.outputFormat}`);
    }
    outputFormat = format.data;
  }

  return {
    ...config,
    inputDir: overrides.inputDir ?? config.inputDir,
    outputDir: overrides.outputDir ?? config.outputDir,
    outputFormat,
    backend: {
      ...config.backend,
      modelPath: overrides.modelPath ?? config.backend.modelPath,
      backendType: overrides.backendType ?? config.backend.backendType,
    },
  };
}
