import * as path from "node:path";
import type { ClassStructure, CodeEntity, FileStructure } from "../schemas/index.js";
import { DEFAULT_EXTRACTOR_OPTIONS, surroundingLines, type ExtractorOptions } from "./context.js";

const PACKAGE = /^\s*package\s+([\w.]+)\s*;/m;
const IMPORT = /^\s*import\s+(?:static\s+)?[\w.]+(?:\.\*)?\s*;/gm;
const TYPE_DECLARATION = /(?<![\w$.@])(class|interface|enum)\s+([A-Za-z_$][\w$]*)/g;
const NESTED_TYPE = /(?:^|\s)(?:class|interface|enum)\s+[A-Za-z_$]/;
const LEADING_ANNOTATION = /^@[\w$.]+\s*(?:\([^()]*\))?\s*/;
const TRAILING_NAME = /([A-Za-z_$][\w$]*)\s*(?:\[\s*\]\s*)*$/;
const BRACKETED = /<[^<>]*>|\([^()]*\)|\{[^{}]*\}/g;

interface DocComment {
  /** Offset just past the closing `*\/`. */
  end: number;
  text: string;
}

/** A class-body member: a `;`-terminated statement or a header followed by a `{…}` block. */
interface Member {
  start: number;
  end: number;
  header: string;
  block: boolean;
}

/**
 * Brace-matching Java scanner.
 *
 * Comments and string literals are blanked out first, so braces and
 * keywords inside them never count. Every class, interface and enum is
 * reported, nested ones included, each with the methods (constructors
 * too) and fields declared directly in its body. The Javadoc right above
 * a declaration is added to its context.
 */
export function extractJavaStructure(
  source: string,
  relativePath: string,
  options: Partial<ExtractorOptions> = {},
): FileStructure {
  const { maxContextLines } = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
  const { masked, docs } = maskSource(source);
  const lines = source.split(/\r?\n/);
  const lineOf = (offset: number): number => source.slice(0, offset).split("\n").length - 1;
  const docAt = (offset: number): string | undefined => docBefore(docs, masked, offset);
  const contextAt = (offset: number, centre: number): string => {
    const around = surroundingLines(lines, lineOf(centre), maxContextLines);
    const doc = docAt(offset);
    return doc ? `${doc}\n\n${around}` : around;
  };

  const packageName = PACKAGE.exec(masked)?.[1];
  const module: CodeEntity = {
    kind: "module",
    name: path.parse(relativePath).name,
    sourceSnippet: source,
    enclosingContext: packageName ? `Package ${packageName}` : "",
  };
  const imports = Array.from(masked.matchAll(IMPORT), (match) => match[0].trim());

  const classes: ClassStructure[] = [];
  for (const match of masked.matchAll(TYPE_DECLARATION)) {
    const keyword = match[1];
    const name = match[2];
    const at = match.index ?? 0;
    const open = masked.indexOf("{", at);
    if (!name || open === -1) continue;
    const close = matchingBrace(masked, open);
    const start = declarationStart(masked, at);

    const entity: CodeEntity = {
      kind: "class",
      name,
      sourceSnippet: source.slice(start, close + 1),
      enclosingContext: contextAt(start, at),
    };

    const methods: CodeEntity[] = [];
    const attributes: CodeEntity[] = [];
    const bodyStart = keyword === "enum" ? enumConstantsEnd(masked, open + 1, close) : open + 1;

    for (const member of scanMembers(masked, bodyStart, close)) {
      const first = member.start + (member.header.length - member.header.trimStart().length);
      const header = stripAnnotations(member.header.trim()).replace(/\s+/g, " ");
      if (header === "" || NESTED_TYPE.test(header)) continue;

      const paren = header.indexOf("(");
      const equals = header.indexOf("=");
      if (paren > 0 && (equals === -1 || equals > paren)) {
        const methodName = TRAILING_NAME.exec(header.slice(0, paren))?.[1];
        if (!methodName) continue;
        methods.push({
          kind: "function",
          name: methodName,
          sourceSnippet: source.slice(Math.max(member.start, lineStart(masked, first)), member.end),
          enclosingContext: `Method of class ${name}\n\n${contextAt(first, first)}`,
        });
      } else if (!member.block) {
        const doc = docAt(first);
        const snippet = source.slice(first, member.end).trim();
        for (const field of fieldNames(header)) {
          attributes.push({
            kind: "variable",
            name: field,
            sourceSnippet: snippet,
            enclosingContext: doc ? `Field of class ${name}\n\n${doc}` : `Field of class ${name}`,
          });
        }
      }
    }

    classes.push({ entity, methods, attributes });
  }

  return { path: relativePath, module, imports, classes, functions: [], variables: [] };
}

/** Blank out comments and literals (offsets and line breaks kept) and collect Javadoc comments. */
function maskSource(source: string): { masked: string; docs: DocComment[] } {
  const parts: string[] = [];
  const docs: DocComment[] = [];
  let plainStart = 0;
  let i = 0;
  while (i < source.length) {
    const end = literalEnd(source, i);
    if (end === undefined) {
      i += 1;
      continue;
    }
    const literal = source.slice(i, end);
    if (literal.startsWith("/**") && !literal.startsWith("/**/")) {
      docs.push({ end, text: cleanJavadoc(literal) });
    }
    parts.push(source.slice(plainStart, i), literal.replace(/[^\n]/g, " "));
    i = end;
    plainStart = end;
  }
  parts.push(source.slice(plainStart));
  return { masked: parts.join(""), docs };
}

/** End of the comment or literal opening at `i`, if one does. */
function literalEnd(source: string, i: number): number | undefined {
  if (source.startsWith("//", i)) {
    const newline = source.indexOf("\n", i);
    return newline === -1 ? source.length : newline;
  }
  if (source.startsWith("/*", i)) {
    const close = source.indexOf("*/", i + 2);
    return close === -1 ? source.length : close + 2;
  }
  if (source.startsWith('"""', i)) {
    const close = source.indexOf('"""', i + 3);
    return close === -1 ? source.length : close + 3;
  }
  const quote = source[i];
  if (quote !== '"' && quote !== "'") return undefined;
  let j = i + 1;
  while (j < source.length && source[j] !== quote && source[j] !== "\n") {
    j += source[j] === "\\" ? 2 : 1;
  }
  return Math.min(j + 1, source.length);
}

function cleanJavadoc(comment: string): string {
  const body = comment.endsWith("*/") ? comment.slice(3, -2) : comment.slice(3);
  return body.replace(/\n[ \t]*\*[ \t]?/g, "\n").trim();
}

/** The Javadoc separated from `offset` by whitespace only. */
function docBefore(docs: DocComment[], masked: string, offset: number): string | undefined {
  const preceding = docs.filter((doc) => doc.end <= offset);
  const doc = preceding[preceding.length - 1];
  if (doc && masked.slice(doc.end, offset).trim() === "") return doc.text;
  return undefined;
}

function lineStart(text: string, offset: number): number {
  return text.lastIndexOf("\n", offset - 1) + 1;
}

/** Start of the line declaring the type at `index`, widened over annotation lines above it. */
function declarationStart(masked: string, index: number): number {
  let start = lineStart(masked, index);
  while (start > 0) {
    const previous = lineStart(masked, start - 1);
    if (!masked.slice(previous, start).trim().startsWith("@")) break;
    start = previous;
  }
  return start;
}

function matchingBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i += 1) {
    const char = text[i];
    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return text.length - 1;
}

/** Offset just past the `;` that ends an enum's constant list. */
function enumConstantsEnd(text: string, from: number, to: number): number {
  let parens = 0;
  for (let i = from; i < to; i += 1) {
    const char = text[i];
    if (char === "(") parens += 1;
    else if (char === ")") parens -= 1;
    else if (char === "{") i = matchingBrace(text, i);
    else if (char === ";" && parens === 0) return i + 1;
  }
  return to;
}

function scanMembers(text: string, from: number, to: number): Member[] {
  const members: Member[] = [];
  let segment = from;
  let parens = 0;
  let i = from;
  while (i < to) {
    const char = text[i];
    if (char === "(") {
      parens += 1;
    } else if (char === ")") {
      parens -= 1;
    } else if (char === "{") {
      const close = matchingBrace(text, i);
      const header = text.slice(segment, i);
      // Array initializers, lambdas and anonymous classes belong to the statement around them.
      if (parens === 0 && !header.includes("=")) {
        members.push({ start: segment, end: close + 1, header, block: true });
        segment = close + 1;
      }
      i = close + 1;
      continue;
    } else if (char === ";" && parens === 0) {
      members.push({ start: segment, end: i + 1, header: text.slice(segment, i), block: false });
      segment = i + 1;
    }
    i += 1;
  }
  return members;
}

function stripAnnotations(header: string): string {
  let rest = header;
  let annotation = LEADING_ANNOTATION.exec(rest);
  while (annotation) {
    rest = rest.slice(annotation[0].length);
    annotation = LEADING_ANNOTATION.exec(rest);
  }
  return rest;
}

/** Declared names of a field statement: `int a = 1, b[];` → a, b. */
function fieldNames(header: string): string[] {
  let declarators = header;
  let previous: string;
  do {
    previous = declarators;
    declarators = declarators.replace(BRACKETED, "");
  } while (declarators !== previous);

  return declarators.split(",").flatMap((part) => {
    const name = TRAILING_NAME.exec(part.split("=")[0] ?? "")?.[1];
    return name ? [name] : [];
  });
}
