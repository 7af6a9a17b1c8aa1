import type { CodeEntity } from "../schemas/index.js";
import type { PromptTemplateStore } from "./templateStore.js";

/** A placeholder, or an escaped `{{` / `}}` standing for a literal brace. */
export const TEMPLATE_TOKEN = /\{\{|\}\}|\{(name|code|context)\}/g;

/**
 * Fill a template with the entity's name, snippet and enclosing context.
 * Pure and whitespace-preserving: the result is what the cache hashes.
 */
export function buildPrompt(template: string, entity: CodeEntity): string {
  const values: Record<string, string> = {
    name: entity.name,
    code: entity.sourceSnippet,
    context: entity.enclosingContext,
  };
  // Single pass, so placeholder-like text inside the values is left alone.
  return template.replace(TEMPLATE_TOKEN, (token: string, key: string | undefined) => {
    if (key === undefined) return token === "{{" ? "{" : "}";
    return values[key] ?? "";
  });
}

/** Builds prompts from the template registered for each entity kind. */
export class PromptBuilder {
  constructor(private readonly templates: PromptTemplateStore) {}

  build(entity: CodeEntity): string {
    return buildPrompt(this.templates.get(entity.kind), entity);
  }
}
