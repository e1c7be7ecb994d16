export type { DocId, Document, PostingSet, StemTable, StopWordSet, Term, Token } from "./types.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export type { TokenFilter } from "./tokenFilter.js";
export type { Stemmer } from "./stemmer.js";
export type { InvertedIndex, IndexStats } from "./invertedIndex.js";
export type { DocumentStore } from "./documentStore.js";
export { IndexError, InvalidInputError, NotFoundError, isIndexError, type IndexErrorCode } from "./errors.js";
export * from "./impl/index.js";
