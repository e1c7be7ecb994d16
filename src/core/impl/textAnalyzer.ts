import type { Term, Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Stemmer } from "../stemmer.js";
import { InvalidInputError } from "../errors.js";
import type { StopWordFilter } from "./stopWordFilter.js";

export interface AnalyzerDeps {
  tokenizer: Tokenizer;
  stopWords: StopWordFilter;
  stemmer: Stemmer;
}

/**
 * tokenize -> case-fold -> drop stop words -> conflate.
 *
 * Stop words are removed before conflation, so a stop word is never stemmed
 * even if the stem table has an entry for it. A stem that is itself a stop
 * word is dropped too. Index build and query share one instance.
 */
export class TextAnalyzer {
  constructor(private readonly deps: AnalyzerDeps) {}

  /** Distinct terms of `text`, in order of first occurrence. */
  analyze(text: string): Term[] {
    const seen = new Set<Term>();
    for (const tok of this.deps.stopWords.filter(this.tokens(text))) {
      const stem = this.conflate(tok.term);
      if (stem !== undefined) seen.add(stem);
    }
    return Array.from(seen);
  }

  /**
   * Normalizes a single query keyword. Undefined means the keyword was a stop
   * word or blank, which matches nothing.
   */
  normalizeTerm(raw: string): Term | undefined {
    const tokens = Array.from(this.tokens(raw));
    if (tokens.length > 1) {
      throw new InvalidInputError(`expected a single keyword, got ${tokens.length}: "${raw}"`);
    }
    const [tok] = Array.from(this.deps.stopWords.filter(tokens));
    return tok ? this.conflate(tok.term) : undefined;
  }

  private conflate(term: Term): Term | undefined {
    const stem = this.deps.stemmer.conflate(term);
    return this.deps.stopWords.isStopWord(stem) ? undefined : stem;
  }

  private tokens(text: string): Iterable<Token> {
    return this.deps.tokenizer.tokenize(text, { normalizeCase: true });
  }
}
