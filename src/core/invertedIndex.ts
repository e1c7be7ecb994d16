import type { DocId, PostingSet, Term } from "./types.js";

export interface IndexStats {
  docCount: number;
  termCount: number;
}

/**
 * Inverted index mapping term -> set of doc ids.
 *
 * Contract notes:
 * - records presence only (no frequencies, no positions)
 * - read-only once built; a changed stop-word set or stem table means a new index
 */
export interface InvertedIndex {
  getPostings(term: Term): PostingSet | undefined;
  hasTerm(term: Term): boolean;

  /** All indexed terms, sorted. */
  terms(): Term[];

  getStats(): IndexStats;

  /** Plain-value form: sorted terms, ascending ids. */
  toJSON(): Record<Term, DocId[]>;
}
