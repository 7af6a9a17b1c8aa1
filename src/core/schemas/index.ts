import { z } from "zod";

// ── Entities ──────────────────────────────────────────────────────────
export const EntityKindSchema = z.enum(["module", "class", "function", "variable"]);
export type EntityKind = z.infer<typeof EntityKindSchema>;

export const ENTITY_KINDS: readonly EntityKind[] = EntityKindSchema.options;

export const CodeEntitySchema = z.object({
  kind: EntityKindSchema,
  name: z.string().min(1),
  sourceSnippet: z.string(),
  enclosingContext: z.string().default(""),
});
export type CodeEntity = z.infer<typeof CodeEntitySchema>;

export const CodeEntityListSchema = z.array(CodeEntitySchema);

/** Kind and name only – all the mock backend and the fallback prompts need. */
export type EntitySubject = Pick<CodeEntity, "kind" | "name">;

// ── Generation ────────────────────────────────────────────────────────
export const BackendTypeSchema = z.enum(["llama", "mistral", "mock"]);
export type BackendType = z.infer<typeof BackendTypeSchema>;

export const DEFAULT_STOP_SEQUENCES = ["</answer>", "Human:", "User:"];

export const GenerationConfigSchema = z.object({
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0.2),
  topP: z.number().min(0).max(1).default(0.9),
  contextLength: z.number().int().positive().default(4096),
  batchSize: z.number().int().positive().default(512),
  stopSequences: z.array(z.string()).default(DEFAULT_STOP_SEQUENCES),
});
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;

export const GenerationSourceSchema = z.enum(["cache", "direct", "condensed", "fallback", "mock"]);
export type GenerationSource = z.infer<typeof GenerationSourceSchema>;

export interface GenerationResult {
  text: string;
  source: GenerationSource;
}

/** Settings of the `llm` block once validated and camel-cased. */
export const BackendSettingsSchema = GenerationConfigSchema.extend({
  backendType: z.string().min(1).default("mock"),
  modelPath: z.string().default(""),
  cacheDir: z.string().default("cache"),
  useCache: z.boolean().default(true),
  gpuLayers: z.number().int().optional(),
  systemPrompt: z.string().optional(),
  chatFormat: z.string().optional(),
});
export type BackendSettings = z.infer<typeof BackendSettingsSchema>;

// ── Documentation output ──────────────────────────────────────────────
export type DocumentationSource = GenerationSource | "error";

export interface DocumentedEntity {
  entity: CodeEntity;
  text: string;
  source: DocumentationSource;
  error?: string;
}

export interface ClassStructure {
  entity: CodeEntity;
  methods: CodeEntity[];
  attributes: CodeEntity[];
}

/** Entities extracted from one source file. */
export interface FileStructure {
  /** Path relative to the input directory. */
  path: string;
  module: CodeEntity;
  imports: string[];
  classes: ClassStructure[];
  functions: CodeEntity[];
  variables: CodeEntity[];
}

export interface DocumentedClass {
  doc: DocumentedEntity;
  methods: DocumentedEntity[];
  attributes: DocumentedEntity[];
}

export interface FileDocumentation {
  path: string;
  module: DocumentedEntity;
  imports: string[];
  classes: DocumentedClass[];
  functions: DocumentedEntity[];
  variables: DocumentedEntity[];
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  files: number;
  entities: number;
  failed: number;
  bySource: Partial<Record<DocumentationSource, number>>;
}
