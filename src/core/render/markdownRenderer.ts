import type { DocumentedEntity, FileDocumentation } from "../schemas/index.js";

export interface ProjectInfo {
  name: string;
  description: string;
}

export interface MarkdownOptions {
  /** Fence language for source snippets. */
  codeLanguage: string;
  includeSource: boolean;
  /** Extension of the per-file documents the index links to. */
  linkExtension: string;
}

const DEFAULTS: MarkdownOptions = {
  codeLanguage: "python",
  includeSource: true,
  linkExtension: ".md",
};

/** Source path with its extension swapped for the document's. */
export function documentPath(sourcePath: string, extension: string): string {
  const normalized = sourcePath.split("\\").join("/");
  const dot = normalized.lastIndexOf(".");
  const slash = normalized.lastIndexOf("/");
  const stem = dot > slash + 1 ? normalized.slice(0, dot) : normalized;
  return `${stem}${extension}`;
}

/**
 * Builds one Markdown document per source file, plus the project index.
 * Empty sections are left out.
 */
export class MarkdownRenderer {
  private readonly options: MarkdownOptions;

  constructor(options: Partial<MarkdownOptions> = {}) {
    this.options = { ...DEFAULTS, ...options };
  }

  renderFile(doc: FileDocumentation): string {
    const out: string[] = [`# ${doc.module.entity.name}`, "", `**Source:** \`${doc.path}\``, ""];

    out.push("## Overview", "", doc.module.text, "");

    if (doc.imports.length > 0) {
      out.push("## Imports", "");
      for (const line of doc.imports) out.push(`- \`${line}\``);
      out.push("");
    }

    if (doc.classes.length > 0) {
      out.push("## Classes", "");
      for (const cls of doc.classes) {
        this.entitySection(out, cls.doc, "###");
        if (cls.attributes.length > 0) {
          out.push("#### Attributes", "");
          for (const attribute of cls.attributes) this.entitySection(out, attribute, "#####");
        }
        if (cls.methods.length > 0) {
          out.push("#### Methods", "");
          for (const method of cls.methods) this.entitySection(out, method, "#####");
        }
      }
    }

    if (doc.functions.length > 0) {
      out.push("## Functions", "");
      for (const fn of doc.functions) this.entitySection(out, fn, "###");
    }

    if (doc.variables.length > 0) {
      out.push("## Variables", "");
      for (const variable of doc.variables) this.entitySection(out, variable, "###");
    }

    return `${out.join("\n").trimEnd()}\n`;
  }

  renderIndex(project: ProjectInfo, sourcePaths: string[]): string {
    const out: string[] = [`# ${project.name}`, ""];
    if (project.description) out.push(project.description, "");
    out.push("## Files", "");
    for (const sourcePath of [...sourcePaths].sort()) {
      out.push(`- [${sourcePath}](${documentPath(sourcePath, this.options.linkExtension)})`);
    }
    return `${out.join("\n")}\n`;
  }

  private entitySection(out: string[], doc: DocumentedEntity, heading: string): void {
    out.push(`${heading} \`${doc.entity.name}\``, "", doc.text, "");
    if (this.options.includeSource && doc.entity.sourceSnippet.trim() !== "") {
      out.push(fence(doc.entity.sourceSnippet, this.options.codeLanguage), "");
    }
  }
}

function fence(code: string, language: string): string {
  // A longer fence than any run of backticks inside the code.
  const longest = Math.max(2, ...Array.from(code.matchAll(/`+/g), (m) => m[0].length));
  const marker = "`".repeat(longest + 1);
  return `${marker}${language}\n${code}\n${marker}`;
}
