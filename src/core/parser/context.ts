export interface ExtractorOptions {
  /** Lines of surrounding code attached to each entity as context. */
  maxContextLines: number;
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = { maxContextLines: 50 };

/** Up to `maxLines` lines centred on `line`. */
export function surroundingLines(lines: readonly string[], line: number, maxLines: number): string {
  const half = Math.floor(maxLines / 2);
  const start = Math.max(0, line - half);
  const end = Math.min(lines.length, line + half);
  return lines.slice(start, end).join("\n");
}
