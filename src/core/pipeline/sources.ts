import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../errors/index.js";
import { extractPythonStructure } from "../parser/pythonExtractor.js";
import { extractorForPath, type SourceExtractor } from "../parser/index.js";
import type { FileStructure } from "../schemas/index.js";

const SKIPPED_DIRECTORIES = new Set(["node_modules", "__pycache__", ".git", ".venv", "venv", "target", ".gradle"]);

/** Files under `root` with one of the extensions, relative to `root`, sorted. */
export async function listSourceFiles(root: string, extensions: string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(full);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
        found.push(path.relative(root, full).split(path.sep).join("/"));
      }
    }
  };

  try {
    await walk(root);
  } catch (error) {
    throw new ConfigError(`Cannot read input directory ${root}`, { cause: error });
  }
  return found.sort();
}

export interface ExtractSourcesOptions {
  extensions: string[];
  maxContextLines: number;
  /** For files whose extension belongs to no known language. */
  extractor?: SourceExtractor;
}

/** Extract every listed file, `.py` and `.java` files with their own language's extractor. */
export async function extractSources(root: string, options: ExtractSourcesOptions): Promise<FileStructure[]> {
  const fallback = options.extractor ?? extractPythonStructure;
  const files = await listSourceFiles(root, options.extensions);
  const structures: FileStructure[] = [];
  for (const file of files) {
    const source = await fs.readFile(path.join(root, file), "utf-8");
    const extract = extractorForPath(file) ?? fallback;
    structures.push(extract(source, file, { maxContextLines: options.maxContextLines }));
  }
  return structures;
}
