import { describe, it, expect } from "vitest";
import { GenerationEngine } from "../../core/engine/generationEngine.js";
import { ConfigError, GenerationError } from "../../core/errors/index.js";
import { DocumentationRun, ERROR_MARKER_PREFIX } from "../../core/pipeline/documentationRun.js";
import { PromptBuilder } from "../../core/prompts/promptBuilder.js";
import { PromptTemplateStore } from "../../core/prompts/templateStore.js";
import type { FileStructure } from "../../core/schemas/index.js";
import { MockBackend } from "../../providers/mock-backend.js";
import { ScriptedBackend, entity, generationConfig } from "../helpers/fakes.js";

function engineWith(backend: ScriptedBackend | MockBackend, store = PromptTemplateStore.withDefaults()) {
  return new GenerationEngine({ backend, promptBuilder: new PromptBuilder(store), config: generationConfig() });
}

function structure(): FileStructure {
  return {
    path: "rates.py",
    module: entity({ kind: "module", name: "rates", sourceSnippet: "" }),
    imports: ["import math"],
    classes: [
      {
        entity: entity({ kind: "class", name: "Policy" }),
        methods: [entity({ name: "renew" })],
        attributes: [entity({ kind: "variable", name: "holder" })],
      },
    ],
    functions: [entity({ name: "quote" })],
    variables: [entity({ kind: "variable", name: "RATE" })],
  };
}

describe("DocumentationRun", () => {
  it("should document every entity in source order", async () => {
    const backend = new ScriptedBackend(["m", "c", "r", "h", "q", "v"]);
    const run = new DocumentationRun(engineWith(backend), "run-1");

    const doc = await run.documentFile(structure());

    expect(doc.module.text).toBe("m");
    expect(doc.classes[0]?.doc.text).toBe("c");
    expect(doc.classes[0]?.methods[0]?.text).toBe("r");
    expect(doc.classes[0]?.attributes[0]?.text).toBe("h");
    expect(doc.functions[0]?.text).toBe("q");
    expect(doc.variables[0]?.text).toBe("v");
    expect(doc.imports).toEqual(["import math"]);
  });

  it("should record a failed entity as an error marker and carry on", async () => {
    const backend = new ScriptedBackend([
      new GenerationError("a"),
      new GenerationError("b"),
      new GenerationError("c"),
      "Second works.",
    ]);
    const run = new DocumentationRun(engineWith(backend), "run-2");

    const failed = await run.documentEntity(entity({ name: "first" }));
    const ok = await run.documentEntity(entity({ name: "second" }));

    expect(failed.source).toBe("error");
    expect(failed.text).toBe(`${ERROR_MARKER_PREFIX} All generation stages failed for function "first": c`);
    expect(failed.error).toBe('All generation stages failed for function "first": c');
    expect(ok).toMatchObject({ text: "Second works.", source: "direct" });

    const summary = run.summarize("2024-01-01T00:00:00.000Z", 0);
    expect(summary).toMatchObject({ runId: "run-2", entities: 2, failed: 1, bySource: { error: 1, direct: 1 } });
  });

  it("should abort on configuration errors", async () => {
    const run = new DocumentationRun(engineWith(new MockBackend(), new PromptTemplateStore()));
    await expect(run.documentEntity(entity())).rejects.toBeInstanceOf(ConfigError);
  });

  it("should summarise a whole run", async () => {
    const run = new DocumentationRun(engineWith(new MockBackend()));
    const result = await run.run([structure(), { ...structure(), path: "other.py" }]);

    expect(result.files.map((f) => f.path)).toEqual(["rates.py", "other.py"]);
    expect(result.summary.files).toBe(2);
    expect(result.summary.entities).toBe(12);
    expect(result.summary.bySource).toEqual({ mock: 12 });
    expect(result.summary.runId).toBe(run.runId);
  });
});
