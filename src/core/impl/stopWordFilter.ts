import type { StopWordSet, Term, Token } from "../types.js";
import type { TokenFilter } from "../tokenFilter.js";
import { foldCase } from "./whitespaceTokenizer.js";

export class StopWordFilter implements TokenFilter {
  private readonly stopWords: Set<string>;

  constructor(stopWords: Iterable<string>) {
    this.stopWords = new Set();
    for (const w of stopWords) this.stopWords.add(foldCase(w));
  }

  /** Expects an already case-folded term. */
  isStopWord(term: Term): boolean {
    return this.stopWords.has(term);
  }

  *filter(tokens: Iterable<Token>): Iterable<Token> {
    for (const tok of tokens) {
      if (!this.stopWords.has(tok.term)) yield tok;
    }
  }

  words(): StopWordSet {
    return this.stopWords;
  }
}
