import type { DocId, PostingSet, Term } from "../types.js";
import type { IndexStats, InvertedIndex } from "../invertedIndex.js";

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - term -> Set<docId>
 *
 * Takes ownership of the postings map handed to it; callers must not mutate
 * it afterwards. Lookups are a single Map.get.
 */
export class MemoryInvertedIndex implements InvertedIndex {
  constructor(
    private readonly termToDocs: ReadonlyMap<Term, PostingSet>,
    private readonly docCount: number,
  ) {}

  getPostings(term: Term): PostingSet | undefined {
    return this.termToDocs.get(term);
  }

  hasTerm(term: Term): boolean {
    const s = this.termToDocs.get(term);
    return !!s && s.size > 0;
  }

  terms(): Term[] {
    return Array.from(this.termToDocs.keys()).sort();
  }

  getStats(): IndexStats {
    return { docCount: this.docCount, termCount: this.termToDocs.size };
  }

  toJSON(): Record<Term, DocId[]> {
    const out: Record<Term, DocId[]> = {};
    for (const term of this.terms()) {
      out[term] = sortIds(this.termToDocs.get(term) ?? []);
    }
    return out;
  }
}

export function sortIds(ids: Iterable<DocId>): DocId[] {
  return Array.from(ids).sort((a, b) => a - b);
}
