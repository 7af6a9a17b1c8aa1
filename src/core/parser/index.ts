/**
 * Source extractors by language.
 *
 *   python → extractPythonStructure (.py)
 *   java   → extractJavaStructure   (.java)
 */
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";
import type { FileStructure } from "../schemas/index.js";
import type { ExtractorOptions } from "./context.js";
import { extractJavaStructure } from "./javaExtractor.js";
import { extractPythonStructure } from "./pythonExtractor.js";

export { extractJavaStructure } from "./javaExtractor.js";
export { extractPythonStructure } from "./pythonExtractor.js";
export type { ExtractorOptions } from "./context.js";

export type SourceExtractor = (
  source: string,
  relativePath: string,
  options?: Partial<ExtractorOptions>,
) => FileStructure;

export const CodeLanguageSchema = z.enum(["python", "java"]);
export type CodeLanguage = z.infer<typeof CodeLanguageSchema>;

/** File extensions scanned when the configuration names none. */
export const LANGUAGE_EXTENSIONS: Record<CodeLanguage, string[]> = {
  python: [".py"],
  java: [".java"],
};

export function createExtractor(language: string): SourceExtractor {
  const parsed = CodeLanguageSchema.safeParse(language.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `Unsupported code language: ${language} (expected one of ${CodeLanguageSchema.options.join(", ")})`,
    );
  }
  switch (parsed.data) {
    case "python":
      return extractPythonStructure;
    case "java":
      return extractJavaStructure;
  }
}

/** The extractor of the language that owns the file's extension, if any. */
export function extractorForPath(filePath: string): SourceExtractor | undefined {
  const extension = path.extname(filePath).toLowerCase();
  const language = CodeLanguageSchema.options.find((candidate) => LANGUAGE_EXTENSIONS[candidate].includes(extension));
  return language ? createExtractor(language) : undefined;
}
