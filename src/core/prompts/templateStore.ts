import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, TemplateError, isNotFoundError } from "../errors/index.js";
import { createLogger } from "../logger.js";
import { ENTITY_KINDS, EntityKindSchema, type EntityKind } from "../schemas/index.js";
import { TEMPLATE_TOKEN } from "./promptBuilder.js";

const logger = createLogger("prompt-templates");

export const PLACEHOLDERS = ["name", "code", "context"] as const;

const DEFAULT_TEMPLATES: Record<EntityKind, string> = {
  module: [
    "Generate documentation for this module: {name}",
    "",
    "Code:",
    "```",
    "{code}",
    "```",
    "",
    "Context: {context}",
    "",
    "Explain the purpose of the module and summarise its key components.",
  ].join("\n"),
  class: [
    "Generate documentation for this class: {name}",
    "",
    "Code:",
    "```",
    "{code}",
    "```",
    "",
    "Context: {context}",
    "",
    "Explain the purpose of the class, its key attributes and an overview of its methods.",
  ].join("\n"),
  function: [
    "Generate documentation for this function: {name}",
    "",
    "Code:",
    "```",
    "{code}",
    "```",
    "",
    "Context: {context}",
    "",
    "Explain what the function does, its parameters and its return value.",
  ].join("\n"),
  variable: [
    "Generate documentation for this variable: {name}",
    "",
    "Code:",
    "```",
    "{code}",
    "```",
    "",
    "Context: {context}",
    "",
    "Explain the purpose of the variable and its typical values.",
  ].join("\n"),
};

// Keys other than the four entity kinds (e.g. an "example" template) are ignored.
const TemplateFileSchema = z.record(z.string(), z.unknown());

/**
 * Checks that every brace in the template belongs to one of the three
 * placeholders or to a `{{` / `}}` escape. Returns the offending fragment,
 * or undefined when valid.
 */
export function findInvalidPlaceholder(template: string): string | undefined {
  const stripped = template.replace(TEMPLATE_TOKEN, "");
  const stray = stripped.match(/\{[^{}]*\}?|\}/);
  return stray?.[0];
}

/**
 * PromptTemplateStore – one template per entity kind.
 * Populated at start-up, never changed afterwards.
 */
export class PromptTemplateStore {
  private readonly templates = new Map<EntityKind, string>();

  static withDefaults(): PromptTemplateStore {
    const store = new PromptTemplateStore();
    for (const kind of ENTITY_KINDS) {
      store.register(kind, DEFAULT_TEMPLATES[kind]);
    }
    return store;
  }

  /**
   * Load templates from a YAML mapping of kind → template. Kinds the file
   * leaves out keep the built-in default; a missing file means all defaults.
   */
  static async fromFile(filepath: string): Promise<PromptTemplateStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filepath, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.warn({ filepath }, "Prompt templates file not found, using built-in templates");
        return PromptTemplateStore.withDefaults();
      }
      throw new ConfigError(`Cannot read prompt templates ${filepath}`, { cause: error });
    }
    return PromptTemplateStore.fromYaml(raw, filepath);
  }

  static fromYaml(source: string, origin = "prompt templates"): PromptTemplateStore {
    let data: unknown;
    try {
      data = parseYaml(source);
    } catch (error) {
      throw new ConfigError(`Cannot parse ${origin}`, { cause: error });
    }

    const parsed = TemplateFileSchema.safeParse(data ?? {});
    if (!parsed.success) {
      throw ConfigError.fromZod(origin, parsed.error);
    }

    const store = PromptTemplateStore.withDefaults();
    for (const [key, value] of Object.entries(parsed.data)) {
      const kind = EntityKindSchema.safeParse(key);
      if (!kind.success) continue;
      if (typeof value !== "string") {
        throw new TemplateError(`Template for "${key}" in ${origin} must be a string`);
      }
      store.register(kind.data, value);
    }
    logger.debug({ origin, kinds: store.kinds() }, "Prompt templates loaded");
    return store;
  }

  /** Register (or replace) the template of a kind. Throws TemplateError when malformed. */
  register(kind: EntityKind, template: string): void {
    const invalid = findInvalidPlaceholder(template);
    if (invalid !== undefined) {
      throw new TemplateError(
        `Template for "${kind}" contains "${invalid}"; only {${PLACEHOLDERS.join("}, {")}} are allowed`,
      );
    }
    this.templates.set(kind, template);
  }

  get(kind: EntityKind): string {
    const template = this.templates.get(kind);
    if (template === undefined) {
      throw new TemplateError(`No prompt template registered for "${kind}"`);
    }
    return template;
  }

  has(kind: EntityKind): boolean {
    return this.templates.has(kind);
  }

  kinds(): EntityKind[] {
    return Array.from(this.templates.keys());
  }
}
