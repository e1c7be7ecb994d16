import type { DocId, Document, StemTable, StopWordSet, Term } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { Tokenizer } from "../tokenizer.js";
import { InvalidInputError } from "../errors.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { StopWordFilter } from "./stopWordFilter.js";
import { TableStemmer } from "./tableStemmer.js";
import { TextAnalyzer } from "./textAnalyzer.js";
import { WhitespaceTokenizer } from "./whitespaceTokenizer.js";

export function assertDocId(id: unknown): asserts id is DocId {
  if (typeof id !== "number" || !Number.isSafeInteger(id)) {
    throw new InvalidInputError(`document id must be an integer, got ${String(id)}`);
  }
}

export function createAnalyzer(tokenizer: Tokenizer, stopWords: StopWordSet, stems: StemTable): TextAnalyzer {
  return new TextAnalyzer({
    tokenizer,
    stopWords: new StopWordFilter(stopWords),
    stemmer: new TableStemmer(stems),
  });
}

/**
 * Builds a fresh inverted index from a bulk document source.
 *
 * Every build starts from an empty map, so building twice from the same
 * inputs yields equal indexes regardless of document order.
 */
export class IndexBuilder {
  constructor(private readonly tokenizer: Tokenizer = new WhitespaceTokenizer()) {}

  build(documents: Iterable<Document>, stopWords: StopWordSet, stems: StemTable): InvertedIndex {
    return this.buildWith(documents, createAnalyzer(this.tokenizer, stopWords, stems));
  }

  buildWith(documents: Iterable<Document>, analyzer: TextAnalyzer): InvertedIndex {
    const termToDocs = new Map<Term, Set<DocId>>();
    const seen = new Set<DocId>();

    for (const doc of documents) {
      assertDocId(doc.id);
      if (seen.has(doc.id)) {
        throw new InvalidInputError(`duplicate document id ${doc.id}`);
      }
      seen.add(doc.id);

      // analyze() already dedupes, so each term adds the id once
      for (const term of analyzer.analyze(doc.text)) {
        let postings = termToDocs.get(term);
        if (!postings) {
          postings = new Set();
          termToDocs.set(term, postings);
        }
        postings.add(doc.id);
      }
    }

    return new MemoryInvertedIndex(termToDocs, seen.size);
  }
}
