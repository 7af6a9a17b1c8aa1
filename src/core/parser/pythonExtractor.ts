import * as path from "node:path";
import type { ClassStructure, CodeEntity, FileStructure } from "../schemas/index.js";
import { DEFAULT_EXTRACTOR_OPTIONS, surroundingLines, type ExtractorOptions } from "./context.js";

const IMPORT_LINE = /^(?:import\s+\S.*|from\s+\S+\s+import\s+\S.*)$/;
const CLASS_LINE = /^class\s+(\w+)/;
const DEF_LINE = /^(?:async\s+)?def\s+(\w+)/;
const ASSIGNMENT = /^([A-Za-z_]\w*)\s*(?::[^=]*)?=(?!=)/;
const SELF_ASSIGNMENT = /self\.([A-Za-z_]\w*)\s*(?::[^=]*)?=(?!=)/g;

interface Block {
  /** First line of the block, decorators included. */
  start: number;
  /** Line of the `class` / `def` / assignment itself. */
  header: number;
  /** Exclusive end. */
  end: number;
}

/**
 * Line-oriented Python scanner.
 *
 * Finds the module docstring, imports, top-level classes (with their
 * methods and attributes), top-level functions and module-level
 * assignments. Indentation decides where blocks end; it does not parse
 * expressions, so code that puts block content at column 0 (inside a
 * multi-line string, say) can cut a block short.
 */
export function extractPythonStructure(
  source: string,
  relativePath: string,
  options: Partial<ExtractorOptions> = {},
): FileStructure {
  const { maxContextLines } = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
  const lines = source.split(/\r?\n/);
  const contextAt = (line: number): string => surroundingLines(lines, line, maxContextLines);

  const module: CodeEntity = {
    kind: "module",
    name: path.parse(relativePath).name,
    sourceSnippet: source,
    enclosingContext: moduleDocstring(source),
  };

  const imports: string[] = [];
  const classes: ClassStructure[] = [];
  const functions: CodeEntity[] = [];
  const variables: CodeEntity[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    if (isBlankOrComment(line) || indentOf(line) > 0) {
      i += 1;
      continue;
    }

    if (IMPORT_LINE.test(line)) {
      imports.push(line.trim());
      i += 1;
      continue;
    }

    const start = i;
    let header = i;
    while (header < lines.length && (lines[header] ?? "").startsWith("@")) {
      header += 1;
    }
    const headerLine = lines[header] ?? "";

    const className = CLASS_LINE.exec(headerLine)?.[1];
    const functionName = DEF_LINE.exec(headerLine)?.[1];
    const variableName = ASSIGNMENT.exec(headerLine)?.[1];

    if (className) {
      const block: Block = { start, header, end: indentedBlockEnd(lines, header, 0) };
      classes.push(extractClass(lines, className, block, contextAt));
      i = block.end;
    } else if (functionName) {
      const end = indentedBlockEnd(lines, header, 0);
      functions.push({
        kind: "function",
        name: functionName,
        sourceSnippet: snippet(lines, start, end),
        enclosingContext: contextAt(header),
      });
      i = end;
    } else if (variableName && header === start) {
      const end = bracketedEnd(lines, header);
      variables.push({
        kind: "variable",
        name: variableName,
        sourceSnippet: snippet(lines, header, end),
        enclosingContext: contextAt(header),
      });
      i = end;
    } else {
      i = header + 1;
    }
  }

  return { path: relativePath, module, imports, classes, functions, variables };
}

function extractClass(
  lines: string[],
  name: string,
  block: Block,
  contextAt: (line: number) => string,
): ClassStructure {
  const entity: CodeEntity = {
    kind: "class",
    name,
    sourceSnippet: snippet(lines, block.start, block.end),
    enclosingContext: contextAt(block.header),
  };

  const methods: CodeEntity[] = [];
  const attributes: CodeEntity[] = [];
  const seenAttributes = new Set<string>();
  const bodyIndent = firstBodyIndent(lines, block.header + 1, block.end);
  if (bodyIndent === undefined) {
    return { entity, methods, attributes };
  }

  const addAttribute = (attribute: string, line: number): void => {
    if (seenAttributes.has(attribute)) return;
    seenAttributes.add(attribute);
    attributes.push({
      kind: "variable",
      name: attribute,
      sourceSnippet: (lines[line] ?? "").trim(),
      enclosingContext: `Attribute of class ${name}`,
    });
  };

  let i = block.header + 1;
  while (i < block.end) {
    const line = lines[i] ?? "";
    if (isBlankOrComment(line) || indentOf(line) !== bodyIndent) {
      i += 1;
      continue;
    }

    const start = i;
    let header = i;
    while (header < block.end && (lines[header] ?? "").trim().startsWith("@")) {
      header += 1;
    }
    const body = (lines[header] ?? "").trim();

    const methodName = DEF_LINE.exec(body)?.[1];
    if (methodName) {
      const end = indentedBlockEnd(lines, header, bodyIndent, block.end);
      methods.push({
        kind: "function",
        name: methodName,
        sourceSnippet: snippet(lines, start, end),
        enclosingContext: `Method of class ${name}\n\n${contextAt(header)}`,
      });
      for (let j = header + 1; j < end; j += 1) {
        for (const match of (lines[j] ?? "").matchAll(SELF_ASSIGNMENT)) {
          if (match[1]) addAttribute(match[1], j);
        }
      }
      i = end;
      continue;
    }

    const attributeName = header === start ? ASSIGNMENT.exec(body)?.[1] : undefined;
    if (attributeName) {
      addAttribute(attributeName, header);
    }
    i = header + 1;
  }

  return { entity, methods, attributes };
}

function moduleDocstring(source: string): string {
  const match = /^\s*(?:#[^\n]*\n\s*)*(?:[rRuU]?)("""|''')([\s\S]*?)\1/.exec(source);
  return match?.[2]?.trim() ?? "";
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith("#");
}

/** End (exclusive) of the block opened at `header`: the next code line indented at or below `indent`. */
function indentedBlockEnd(lines: string[], header: number, indent: number, limit = lines.length): number {
  let end = header + 1;
  let lastCode = header;
  while (end < limit) {
    const line = lines[end] ?? "";
    if (!isBlankOrComment(line)) {
      if (indentOf(line) <= indent) break;
      lastCode = end;
    }
    end += 1;
  }
  return lastCode + 1;
}

/** End (exclusive) of a statement whose brackets may span several lines. */
function bracketedEnd(lines: string[], start: number): number {
  let depth = 0;
  let i = start;
  do {
    for (const char of stripStrings(lines[i] ?? "")) {
      if (char === "(" || char === "[" || char === "{") depth += 1;
      else if (char === ")" || char === "]" || char === "}") depth -= 1;
    }
    i += 1;
  } while (depth > 0 && i < lines.length);
  return i;
}

function stripStrings(line: string): string {
  return line.replace(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g, "").replace(/#.*$/, "");
}

function firstBodyIndent(lines: string[], from: number, to: number): number | undefined {
  for (let i = from; i < to; i += 1) {
    const line = lines[i] ?? "";
    if (!isBlankOrComment(line)) return indentOf(line);
  }
  return undefined;
}

function snippet(lines: string[], start: number, end: number): string {
  return lines.slice(start, end).join("\n");
}
