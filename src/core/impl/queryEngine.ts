import type { DocId, Document, Term } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { DocumentStore } from "../documentStore.js";
import { InvalidInputError } from "../errors.js";
import { sortIds } from "./memoryInvertedIndex.js";
import type { TextAnalyzer } from "./textAnalyzer.js";

export const QUERY_MODES = ["single", "or", "phrase"] as const;
export type QueryMode = (typeof QUERY_MODES)[number];

export interface PhraseOptions {
  /** Match case exactly. Defaults to false. */
  caseSensitive?: boolean;
  /**
   * Treat the pattern as a regular expression instead of a literal substring.
   * Patterns run on the JS regex engine with no time limit; one with
   * catastrophic backtracking, e.g. `(a+)+$`, blocks the event loop while it
   * scans. Only enable for trusted callers.
   */
  regex?: boolean;
}

export type Query =
  | { mode: "single"; term: string; includeText?: boolean }
  | { mode: "or"; terms: string[]; includeText?: boolean }
  | ({ mode: "phrase"; pattern: string; includeText?: boolean } & PhraseOptions);

export interface QueryResult {
  ids: DocId[];
  /** Present when the query asked for text; same order as `ids`. */
  documents?: Document[];
}

export interface TermLookup {
  /** null when the keyword is a stop word */
  normalized: Term | null;
  ids: DocId[];
}

export function parseQueryMode(value: unknown): QueryMode {
  const mode = QUERY_MODES.find((m) => m === value);
  if (!mode) {
    throw new InvalidInputError(`unknown query mode ${JSON.stringify(value)}; expected one of: ${QUERY_MODES.join(", ")}`);
  }
  return mode;
}

export interface QueryEngineDeps {
  index: InvertedIndex;
  analyzer: TextAnalyzer;
  store: DocumentStore;
}

/**
 * Evaluates queries against one built index.
 *
 * Keyword queries normalize their terms through the analyzer that built the
 * index and resolve each with a single postings lookup. Phrase queries ignore
 * the index and scan raw document text (linear in corpus size), because the
 * index keeps neither order nor position.
 */
export class QueryEngine {
  constructor(private readonly deps: QueryEngineDeps) {}

  single(term: string): DocId[] {
    return this.lookup(term).ids;
  }

  /** Normalized form of one keyword plus its postings. */
  lookup(term: string): TermLookup {
    const normalized = this.deps.analyzer.normalizeTerm(term);
    if (normalized === undefined) return { normalized: null, ids: [] };
    return { normalized, ids: sortIds(this.deps.index.getPostings(normalized) ?? []) };
  }

  /** Union of postings. Stop-word terms add nothing; only stop words -> []. */
  any(terms: Iterable<string>): DocId[] {
    const out = new Set<DocId>();
    for (const raw of terms) {
      const normalized = this.deps.analyzer.normalizeTerm(raw);
      if (normalized === undefined) continue;
      for (const id of this.deps.index.getPostings(normalized) ?? []) out.add(id);
    }
    return sortIds(out);
  }

  phrase(pattern: string, options: PhraseOptions = {}): DocId[] {
    const matches = compilePhrase(pattern, options);
    const out: DocId[] = [];
    for (const doc of this.deps.store.all()) {
      if (matches(doc.text)) out.push(doc.id);
    }
    return out;
  }

  run(query: Query): QueryResult {
    const ids = this.evaluate(query);
    return query.includeText ? { ids, documents: this.deps.store.getMany(ids) } : { ids };
  }

  document(id: DocId): Document {
    return this.deps.store.get(id);
  }

  private evaluate(query: Query): DocId[] {
    switch (query.mode) {
      case "single":
        return this.single(query.term);
      case "or":
        return this.any(query.terms);
      case "phrase":
        return this.phrase(query.pattern, query);
    }
  }
}

function compilePhrase(pattern: string, options: PhraseOptions): (text: string) => boolean {
  if (!pattern.length) throw new InvalidInputError("phrase pattern must be non-empty");
  const caseSensitive = options.caseSensitive ?? false;

  if (options.regex) {
    let re: RegExp;
    try {
      re = new RegExp(pattern, caseSensitive ? "u" : "iu");
    } catch (e) {
      throw new InvalidInputError(`invalid regular expression: ${e instanceof Error ? e.message : String(e)}`);
    }
    return (text) => re.test(text);
  }

  if (caseSensitive) return (text) => text.includes(pattern);
  const needle = pattern.toLowerCase();
  return (text) => text.toLowerCase().includes(needle);
}
