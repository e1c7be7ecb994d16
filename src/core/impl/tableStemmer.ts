import type { Term } from "../types.js";
import type { Stemmer } from "../stemmer.js";
import { foldCase } from "./whitespaceTokenizer.js";

/**
 * Lookup-table conflation. Several surface forms may share one stem; a term
 * missing from the table is returned unchanged.
 */
export class TableStemmer implements Stemmer {
  private readonly table = new Map<Term, Term>();

  constructor(entries: Iterable<readonly [string, string]> = []) {
    for (const [surface, stem] of entries) {
      this.table.set(foldCase(surface), foldCase(stem));
    }
  }

  conflate(term: Term): Term {
    return this.table.get(term) ?? term;
  }
}
