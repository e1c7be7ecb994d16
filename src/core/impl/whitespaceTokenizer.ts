import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const WHITESPACE = /\s/;
const WORD_CHAR = /[\p{L}\p{N}]/u;

function isSpace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

function isWordChar(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

export interface WhitespaceTokenizerOptions {
  /**
   * Trim leading/trailing characters that are neither letters nor digits
   * ("#SQL," -> "sql"). Tokens left empty are dropped. Defaults to false,
   * i.e. tokens are exactly the whitespace-delimited substrings.
   */
  stripPunctuation?: boolean;
}

/** Lowercases a term. Index and query paths both go through this. */
export function foldCase(term: string): string {
  return term.toLowerCase();
}

/**
 * Whitespace tokenizer:
 * - splits on runs of whitespace
 * - optionally lowercases (default on)
 * - optionally trims punctuation at token edges
 * - yields token positions (token index)
 */
export class WhitespaceTokenizer implements Tokenizer {
  private readonly stripPunctuation: boolean;

  constructor(opts: WhitespaceTokenizerOptions = {}) {
    this.stripPunctuation = opts.stripPunctuation ?? false;
  }

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;

    const n = text.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      // skip separators
      while (i < n && isSpace(text.charAt(i))) i++;
      if (i >= n) break;

      let start = i;
      while (i < n && !isSpace(text.charAt(i))) i++;
      let end = i;

      if (this.stripPunctuation) {
        while (start < end && !isWordChar(text.charAt(start))) start++;
        while (end > start && !isWordChar(text.charAt(end - 1))) end--;
        if (start === end) continue;
      }

      let term = text.slice(start, end);
      if (normalizeCase) term = foldCase(term);

      yield { term, position, startOffset: start, endOffset: end };
      position++;
    }
  }
}
