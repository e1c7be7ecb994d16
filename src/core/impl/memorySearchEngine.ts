import type { DocId, Document, StemTable, StopWordSet } from "../types.js";
import type { IndexStats, InvertedIndex } from "../invertedIndex.js";
import type { DocumentStore } from "../documentStore.js";
import type { Tokenizer } from "../tokenizer.js";
import { IndexBuilder, createAnalyzer } from "./indexBuilder.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";
import { QueryEngine, type Query, type QueryResult } from "./queryEngine.js";
import { WhitespaceTokenizer } from "./whitespaceTokenizer.js";

export interface AnalysisConfig {
  stopWords?: Iterable<string>;
  /** surface form -> stem */
  stems?: Iterable<readonly [string, string]>;
}

export interface EngineDeps {
  tokenizer?: Tokenizer;
  store?: DocumentStore;
  stopWords?: StopWordSet;
  stems?: StemTable;
}

interface Snapshot {
  index: InvertedIndex;
  queries: QueryEngine;
}

/**
 * Owns the document store, the analysis inputs and the published index.
 *
 * A rebuild runs against a fresh structure and is published by one reference
 * swap, so a reader holding the previous snapshot keeps a complete index.
 */
export class MemorySearchEngine {
  private readonly tokenizer: Tokenizer;
  private readonly builder: IndexBuilder;
  private readonly store: DocumentStore;
  private stopWords: StopWordSet;
  private stems: StemTable;
  private snapshot: Snapshot;

  constructor(deps: EngineDeps = {}) {
    this.tokenizer = deps.tokenizer ?? new WhitespaceTokenizer();
    this.builder = new IndexBuilder(this.tokenizer);
    this.store = deps.store ?? new MemoryDocumentStore();
    this.stopWords = deps.stopWords ?? new Set<string>();
    this.stems = deps.stems ?? new Map<string, string>();
    this.snapshot = this.buildSnapshot();
  }

  loadDocuments(docs: Iterable<Document>): void {
    this.store.add(docs);
    this.rebuild();
  }

  /** Replaces stop words and/or stems; always a full rebuild. */
  configure(config: AnalysisConfig): void {
    if (config.stopWords) this.stopWords = new Set(config.stopWords);
    if (config.stems) this.stems = new Map(config.stems);
    this.rebuild();
  }

  rebuild(): void {
    this.snapshot = this.buildSnapshot();
  }

  search(query: Query): QueryResult {
    return this.snapshot.queries.run(query);
  }

  /** Query engine over the currently published index. */
  queries(): QueryEngine {
    return this.snapshot.queries;
  }

  index(): InvertedIndex {
    return this.snapshot.index;
  }

  getDocument(id: DocId): Document {
    return this.snapshot.queries.document(id);
  }

  stats(): IndexStats {
    return this.snapshot.index.getStats();
  }

  private buildSnapshot(): Snapshot {
    const analyzer = createAnalyzer(this.tokenizer, this.stopWords, this.stems);
    // frozen copy: phrase scans and text lookups see the same documents as the index
    const store = new MemoryDocumentStore(this.store.all());
    const index = this.builder.buildWith(store.all(), analyzer);
    return { index, queries: new QueryEngine({ index, analyzer, store }) };
  }
}
