import { normalizeText, tokenize } from "../retrieval/tokenize.js";

/** Phrases that point back at an earlier conversation. */
export const DEFAULT_REFERENCE_CUES: readonly string[] = [
  "이전에",
  "이전 프로젝트",
  "지난번",
  "지난 번",
  "저번",
  "예전에",
  "전에 했던",
  "전에 말했던",
  "전에 얘기했던",
  "지난 프로젝트",
  "지난 대화",
  "previously",
  "last time",
  "earlier",
  "last project",
  "as we discussed",
  "remember when"
];

export type CueMatch = {
  cue: string;
  index: number;
};

const WORD_CHAR = /[\p{L}\p{N}]/u;
const LATIN_END = /[a-z]$/;

function collapse(text: string): string {
  return normalizeText(text).replace(/\s+/g, " ").trim();
}

/**
 * Case-insensitive whole-phrase cue matcher. A cue must start at a word
 * boundary; cues ending in a Latin letter must also end at one, while Korean
 * cues may be followed by a particle ("지난번에").
 */
export class ReferenceDetector {
  readonly cues: readonly string[];

  constructor(params: { cues?: readonly string[]; extraCues?: readonly string[] } = {}) {
    const all = [...(params.cues ?? DEFAULT_REFERENCE_CUES), ...(params.extraCues ?? [])]
      .map(collapse)
      .filter((c) => c.length > 0);
    this.cues = [...new Set(all)];
  }

  detect(message: string): boolean {
    return this.match(message) !== null;
  }

  /** Earliest cue in the message; the longer cue wins at the same position. */
  match(message: string): CueMatch | null {
    const text = collapse(message);
    let best: CueMatch | null = null;
    for (const cue of this.cues) {
      const index = this.firstOccurrence(text, cue);
      if (index < 0) continue;
      if (!best || index < best.index || (index === best.index && cue.length > best.cue.length)) {
        best = { cue, index };
      }
    }
    return best;
  }

  /**
   * Search text for a detected message: the message without its cue phrases,
   * or the whole message when nothing searchable is left.
   */
  queryFor(message: string): string {
    let text = collapse(message);
    for (const cue of [...this.cues].sort((a, b) => b.length - a.length)) {
      let index = this.firstOccurrence(text, cue);
      while (index >= 0) {
        text = `${text.slice(0, index)} ${text.slice(index + cue.length)}`;
        index = this.firstOccurrence(text, cue);
      }
    }
    const stripped = text.replace(/\s+/g, " ").trim();
    return tokenize(stripped).length > 0 ? stripped : collapse(message);
  }

  private firstOccurrence(text: string, cue: string): number {
    let from = 0;
    while (from <= text.length - cue.length) {
      const index = text.indexOf(cue, from);
      if (index < 0) return -1;
      if (this.atBoundary(text, cue, index)) return index;
      from = index + 1;
    }
    return -1;
  }

  private atBoundary(text: string, cue: string, index: number): boolean {
    const before = index > 0 ? text[index - 1] ?? "" : "";
    if (before && WORD_CHAR.test(before)) return false;
    if (LATIN_END.test(cue)) {
      const after = text[index + cue.length] ?? "";
      if (after && WORD_CHAR.test(after)) return false;
    }
    return true;
  }
}
