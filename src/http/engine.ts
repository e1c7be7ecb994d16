import {
  MemorySearchEngine,
  WhitespaceTokenizer,
  type AnalysisConfig,
  type Query,
  type TermLookup,
} from "../core/impl/index.js";
import type { DocId, Document, StemTable, StopWordSet } from "../core/types.js";

export interface EngineStats {
  documentCount: number;
  termCount: number;
}

export interface SearchResponse {
  ids: DocId[];
  documents?: Document[];
}

/** What the HTTP layer needs from the index. */
export interface Engine {
  loadDocuments(docs: Document[]): EngineStats;
  configure(config: AnalysisConfig): EngineStats;
  getDocument(id: DocId): Document;
  lookupTerm(term: string): TermLookup;
  search(q: Query): SearchResponse;
  stats(): EngineStats;
}

export interface InMemoryEngineOptions {
  stopWords?: StopWordSet;
  stems?: StemTable;
  documents?: Document[];
  stripPunctuation?: boolean;
}

export function createInMemoryEngine(opts: InMemoryEngineOptions = {}): Engine {
  const engine = new MemorySearchEngine({
    tokenizer: new WhitespaceTokenizer({ stripPunctuation: opts.stripPunctuation }),
    stopWords: opts.stopWords,
    stems: opts.stems,
  });
  if (opts.documents?.length) engine.loadDocuments(opts.documents);

  const stats = (): EngineStats => {
    const s = engine.stats();
    return { documentCount: s.docCount, termCount: s.termCount };
  };

  return {
    loadDocuments(docs) {
      engine.loadDocuments(docs);
      return stats();
    },
    configure(config) {
      engine.configure(config);
      return stats();
    },
    getDocument(id) {
      return engine.getDocument(id);
    },
    lookupTerm(term) {
      return engine.queries().lookup(term);
    },
    search(q) {
      return engine.search(q);
    },
    stats,
  };
}
