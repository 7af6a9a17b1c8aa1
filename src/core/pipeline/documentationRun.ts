import { v4 as uuidv4 } from "uuid";
import { GenerationError } from "../errors/index.js";
import { createLogger } from "../logger.js";
import type { GenerationEngine } from "../engine/generationEngine.js";
import type {
  CodeEntity,
  DocumentationSource,
  DocumentedEntity,
  FileDocumentation,
  FileStructure,
  RunSummary,
} from "../schemas/index.js";

const logger = createLogger("documentation-run");

export const ERROR_MARKER_PREFIX = "Error generating documentation:";

export interface RunResult {
  summary: RunSummary;
  files: FileDocumentation[];
}

/**
 * Documentation run
 * Sends every entity of every file through the generation engine, one at a
 * time, in source order:
 *   module → classes (class, methods, attributes) → functions → variables
 *
 * A GenerationError is recorded as an error marker for that entity only;
 * configuration errors abort the run.
 */
export class DocumentationRun {
  readonly runId: string;
  private readonly counts: Partial<Record<DocumentationSource, number>> = {};
  private entities = 0;
  private failed = 0;

  constructor(private readonly engine: GenerationEngine, runId: string = uuidv4()) {
    this.runId = runId;
  }

  async documentEntity(entity: CodeEntity): Promise<DocumentedEntity> {
    this.entities += 1;
    let documented: DocumentedEntity;
    try {
      const result = await this.engine.generate(entity);
      documented = { entity, text: result.text, source: result.source };
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.failed += 1;
      logger.error({ runId: this.runId, entity: entity.name, kind: entity.kind, err: error }, "Entity failed");
      documented = {
        entity,
        text: `${ERROR_MARKER_PREFIX} ${error.message}`,
        source: "error",
        error: error.message,
      };
    }
    this.counts[documented.source] = (this.counts[documented.source] ?? 0) + 1;
    return documented;
  }

  async documentFile(structure: FileStructure): Promise<FileDocumentation> {
    logger.info({ runId: this.runId, file: structure.path }, "Documenting file");

    const module = await this.documentEntity(structure.module);

    const classes: FileDocumentation["classes"] = [];
    for (const cls of structure.classes) {
      const doc = await this.documentEntity(cls.entity);
      const methods: DocumentedEntity[] = [];
      for (const method of cls.methods) {
        methods.push(await this.documentEntity(method));
      }
      const attributes: DocumentedEntity[] = [];
      for (const attribute of cls.attributes) {
        attributes.push(await this.documentEntity(attribute));
      }
      classes.push({ doc, methods, attributes });
    }

    const functions: DocumentedEntity[] = [];
    for (const fn of structure.functions) {
      functions.push(await this.documentEntity(fn));
    }

    const variables: DocumentedEntity[] = [];
    for (const variable of structure.variables) {
      variables.push(await this.documentEntity(variable));
    }

    return { path: structure.path, module, imports: structure.imports, classes, functions, variables };
  }

  async run(structures: FileStructure[]): Promise<RunResult> {
    const startedAt = new Date().toISOString();
    logger.info({ runId: this.runId, files: structures.length }, "Documentation run started");

    const files: FileDocumentation[] = [];
    for (const structure of structures) {
      files.push(await this.documentFile(structure));
    }

    const summary = this.summarize(startedAt, files.length);
    logger.info({ ...summary }, "Documentation run finished");
    return { summary, files };
  }

  summarize(startedAt: string, files: number): RunSummary {
    return {
      runId: this.runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      files,
      entities: this.entities,
      failed: this.failed,
      bySource: { ...this.counts },
    };
  }
}
