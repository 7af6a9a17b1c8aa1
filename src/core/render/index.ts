import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../errors/index.js";
import { createLogger } from "../logger.js";
import type { FileDocumentation } from "../schemas/index.js";
import { HtmlRenderer } from "./htmlRenderer.js";
import { MarkdownRenderer, documentPath, type MarkdownOptions, type ProjectInfo } from "./markdownRenderer.js";

export { MarkdownRenderer, documentPath, type ProjectInfo } from "./markdownRenderer.js";
export { HtmlRenderer, escapeHtml } from "./htmlRenderer.js";

const logger = createLogger("document-writer");

export type OutputFormat = "markdown" | "html";

export interface DocumentRenderer {
  renderFile(doc: FileDocumentation): string | Promise<string>;
  renderIndex(project: ProjectInfo, sourcePaths: string[]): string | Promise<string>;
}

export interface RendererSelection {
  renderer: DocumentRenderer;
  format: OutputFormat;
  extension: string;
}

export function createRenderer(
  format: string,
  options: Partial<Omit<MarkdownOptions, "linkExtension">> = {},
): RendererSelection {
  switch (format.trim().toLowerCase()) {
    case "markdown":
    case "md":
      return { renderer: new MarkdownRenderer(options), format: "markdown", extension: ".md" };
    case "html":
      return { renderer: new HtmlRenderer(options), format: "html", extension: ".html" };
    default:
      throw new ConfigError(`Unsupported documentation format: ${format}`);
  }
}

export interface WriteDocumentsOptions {
  outputDir: string;
  project: ProjectInfo;
  generateIndex: boolean;
}

/** Write one document per source file (and the index). Returns the written paths. */
export async function writeDocuments(
  selection: RendererSelection,
  files: FileDocumentation[],
  options: WriteDocumentsOptions,
): Promise<string[]> {
  const written: string[] = [];

  for (const doc of files) {
    const target = path.join(options.outputDir, documentPath(doc.path, selection.extension));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await selection.renderer.renderFile(doc), "utf-8");
    logger.debug({ file: target }, "Document written");
    written.push(target);
  }

  if (options.generateIndex) {
    const target = path.join(options.outputDir, `index${selection.extension}`);
    await fs.mkdir(options.outputDir, { recursive: true });
    const index = await selection.renderer.renderIndex(
      options.project,
      files.map((doc) => doc.path),
    );
    await fs.writeFile(target, index, "utf-8");
    written.push(target);
  }

  logger.info({ outputDir: options.outputDir, documents: written.length }, "Documentation written");
  return written;
}
