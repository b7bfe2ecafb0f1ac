/**
 * Lexical helpers shared by the pattern definitions.
 */

export interface RawPair {
  input: string;
  /** null when the output slot is empty or a placeholder such as "?" */
  output: string | null;
}

const LABELLED_PAIR = /^\s*input\s*:\s*([\s\S]*?)\s*(?:(?:→|->|=>)\s*)?output\s*:\s*([\s\S]*)$/i;
const LEADING_INPUT_LABEL = /^\s*input\s*:\s*/i;
const ARROW = /\s*(?:→|->|=>)\s*/;
const TRAILING_PUNCTUATION = /[.;,]+$/;
const PLACEHOLDER = /^(?:\?+|_+|what\??)$/i;

/** Collapse internal whitespace runs and trim. */
export function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Clean an output slot. Returns null for an empty slot or a placeholder.
 * Trailing sentence punctuation is dropped; decimals like "3.5" survive.
 */
export function cleanOutput(raw: string): string | null {
  const cleaned = normalizeSpace(raw).replace(TRAILING_PUNCTUATION, '').trim();
  if (!cleaned || PLACEHOLDER.test(cleaned)) return null;
  return cleaned;
}

/**
 * Split one item into input and output.
 *
 * Accepts `Input: x Output: y` (an arrow between the two is allowed) and
 * `x → y` / `x -> y` / `x => y`. Returns null when neither shape is present.
 */
export function splitPair(text: string): RawPair | null {
  const labelled = LABELLED_PAIR.exec(text);
  if (labelled) {
    return {
      input: normalizeSpace(labelled[1] ?? ''),
      output: cleanOutput(labelled[2] ?? ''),
    };
  }

  const body = text.replace(LEADING_INPUT_LABEL, '');
  const arrow = ARROW.exec(body);
  if (!arrow) return null;

  return {
    input: normalizeSpace(body.slice(0, arrow.index)),
    output: cleanOutput(body.slice(arrow.index + arrow[0].length)),
  };
}

/**
 * Split text into sentences on `.`, `;`, `!` and newlines.
 * A `.` between two digits is a decimal point and does not split.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<!\d)\.|\.(?!\d)|[;!\n]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function countMatches(pattern: RegExp, text: string): number {
  return [...text.matchAll(pattern)].length;
}
