/** Shared core types used by module contracts. */

export type DocId = number;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Character offsets into the source text. */
  startOffset: number;
  endOffset: number;
}

/** A stored document. Immutable once inserted. */
export interface Document {
  id: DocId;
  text: string;
}

/** Case-folded words excluded from indexing and querying. */
export type StopWordSet = ReadonlySet<string>;

/** Surface form -> stem. Many-to-one; a word absent from the table is its own stem. */
export type StemTable = ReadonlyMap<string, string>;

export type PostingSet = ReadonlySet<DocId>;
