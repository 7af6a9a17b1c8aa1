/**
 * Heuristics used to shrink a prompt that does not fit the model's context.
 *
 * They read the prompt text only and are best effort: an ambiguous prompt
 * (one mentioning both "class" and "def", say) is classified by the fixed
 * precedence class > function > variable > module > code.
 */

export type PromptKind = "class" | "function" | "variable" | "module" | "code";

const CODE_FENCE = /```(?:[\w+#.-]*[ \t]*\n)?([\s\S]*?)```/g;

/** Contents of every triple-backtick block, trimmed, in order of appearance. */
export function extractCodeBlocks(text: string): string[] {
  return Array.from(text.matchAll(CODE_FENCE), (match) => (match[1] ?? "").trim());
}

export function classifyPromptKind(text: string): PromptKind {
  const lower = text.toLowerCase();
  if (lower.includes("class")) return "class";
  if (lower.includes("function") || lower.includes("def ")) return "function";
  if (lower.includes("variable")) return "variable";
  if (lower.includes("module")) return "module";
  return "code";
}

/**
 * Entity name from a `Name: x` / `Class Name: x` label line, else the first
 * `class X` or `def x`, else the classified kind. The label must open a
 * line outside the code blocks, so `name` inside the code is never taken for it.
 */
export function extractEntityName(text: string): string {
  const prose = text.replace(CODE_FENCE, "");
  const labelled = /^[ \t]*(?:[A-Za-z]+[ \t]+)?name:[ \t]*([^\n\r]+)/im.exec(prose)?.[1]?.trim();
  if (labelled) return labelled;

  const className = /class\s+(\w+)/.exec(text)?.[1];
  if (className) return className;

  const functionName = /def\s+(\w+)/.exec(text)?.[1];
  if (functionName) return functionName;

  return classifyPromptKind(text);
}

export interface CondensedPrompt {
  prompt: string;
  kind: PromptKind;
  name: string;
}

/** Kind, name and the first code block (or the whole prompt when there is none). */
export function buildCondensedPrompt(original: string): CondensedPrompt {
  const kind = classifyPromptKind(original);
  const name = extractEntityName(original);
  const code = extractCodeBlocks(original)[0] ?? original;

  const prompt = [
    `Generate documentation for this ${kind}: ${name}`,
    "",
    "Here's the essential part of the code:",
    "",
    "```",
    code,
    "```",
    "",
    "Provide a concise explanation of its purpose and behaviour.",
  ].join("\n");

  return { prompt, kind, name };
}

export function buildMinimalPrompt(kind: string, name: string): string {
  return `Briefly describe a ${kind} named ${name}.`;
}
