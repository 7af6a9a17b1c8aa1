import { marked } from "marked";
import type { FileDocumentation } from "../schemas/index.js";
import { MarkdownRenderer, type MarkdownOptions, type ProjectInfo } from "./markdownRenderer.js";

const STYLE = `
body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; line-height: 1.5; }
pre { background: #f6f8fa; padding: 1rem; overflow-x: auto; border-radius: 6px; }
code { font-family: ui-monospace, monospace; }
h2 { border-bottom: 1px solid #d0d7de; padding-bottom: 0.3rem; }
`.trim();

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Markdown documents converted with marked and wrapped in a standalone page. */
export class HtmlRenderer {
  private readonly markdown: MarkdownRenderer;

  constructor(options: Partial<Omit<MarkdownOptions, "linkExtension">> = {}) {
    this.markdown = new MarkdownRenderer({ ...options, linkExtension: ".html" });
  }

  async renderFile(doc: FileDocumentation): Promise<string> {
    return this.page(doc.module.entity.name, this.markdown.renderFile(doc));
  }

  async renderIndex(project: ProjectInfo, sourcePaths: string[]): Promise<string> {
    return this.page(project.name, this.markdown.renderIndex(project, sourcePaths));
  }

  private async page(title: string, markdown: string): Promise<string> {
    const body = await marked.parse(markdown);
    return [
      "<!DOCTYPE html>",
      '<html lang="en">',
      "<head>",
      '<meta charset="utf-8">',
      `<title>${escapeHtml(title)}</title>`,
      `<style>\n${STYLE}\n</style>`,
      "</head>",
      "<body>",
      body.trim(),
      "</body>",
      "</html>",
      "",
    ].join("\n");
  }
}
