/** Instruction-format artifacts removed wherever they appear. */
const FORMAT_ARTIFACTS = ["[/INST]", "<|assistant|>", "</s>"];

/** Role and end markers that always cut the response, on top of the configured stop sequences. */
export const ROLE_MARKERS = ["</answer>", "Human:", "User:", "Assistant:", "<|user|>", "<|system|>", "\n\n\n"];

/**
 * TextCleaner – normalises raw model output.
 * Keeps only the text before the earliest stop or role marker.
 */
export class TextCleaner {
  private readonly markers: string[];

  constructor(stopSequences: readonly string[] = []) {
    this.markers = [...new Set([...stopSequences, ...ROLE_MARKERS])].filter((m) => m.length > 0);
  }

  clean(raw: string): string {
    let text = raw;
    for (const artifact of FORMAT_ARTIFACTS) {
      text = text.split(artifact).join("");
    }
    text = text.trim();

    let cut = text.length;
    for (const marker of this.markers) {
      const index = text.indexOf(marker);
      if (index !== -1 && index < cut) {
        cut = index;
      }
    }
    return text.slice(0, cut).trim();
  }
}
