import { classifyPromptKind, extractEntityName } from "../core/prompts/condense.js";
import type { EntitySubject, GenerationConfig } from "../core/schemas/index.js";
import type { GenerationBackend } from "./backend.js";

/**
 * MockBackend – deterministic, model-free descriptions.
 * Used when no model can be loaded, and in tests.
 *
 * The text depends only on the subject's kind and name (or, without a
 * subject, on what the prompt heuristics find), and always contains the name.
 */
export class MockBackend implements GenerationBackend {
  readonly name = "mock";
  readonly isLoaded = true;

  async load(): Promise<boolean> {
    return true;
  }

  async generate(promptText: string, _config: GenerationConfig, subject?: EntitySubject): Promise<string> {
    const kind = subject?.kind ?? classifyPromptKind(promptText);
    const name = subject?.name ?? extractEntityName(promptText);
    return describe(kind, name);
  }

  async unload(): Promise<void> {}
}

function describe(kind: string, name: string): string {
  const words = humanize(name);
  switch (kind) {
    case "class":
      return [
        `The class \`${name}\` groups the state and behaviour related to ${words}.`,
        "",
        "Key features include:",
        "- Holding the data its methods operate on",
        "- Validating that data before it is used",
        "- Exposing operations for the rest of the code base",
      ].join("\n");
    case "function":
      return [
        `The function \`${name}\` performs the ${words} operation.`,
        "",
        "It takes the inputs declared in its signature, applies its logic and returns the result to the caller.",
      ].join("\n");
    case "variable":
      return [
        `The variable \`${name}\` stores the ${words} value.`,
        "",
        "It holds configuration or state read by the surrounding code.",
      ].join("\n");
    case "module":
      return [
        `The module \`${name}\` collects related classes, functions and values.`,
        "",
        "It is imported by the parts of the project that need its functionality.",
      ].join("\n");
    default:
      return `\`${name}\` is part of the documented code base.`;
  }
}

function humanize(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/[_\-.]+/g, " ")
    .trim()
    .toLowerCase();
}
