export { WhitespaceTokenizer, foldCase, type WhitespaceTokenizerOptions } from "./whitespaceTokenizer.js";
export { StopWordFilter } from "./stopWordFilter.js";
export { TableStemmer } from "./tableStemmer.js";
export { TextAnalyzer, type AnalyzerDeps } from "./textAnalyzer.js";
export { MemoryInvertedIndex, sortIds } from "./memoryInvertedIndex.js";
export { IndexBuilder, assertDocId, createAnalyzer } from "./indexBuilder.js";
export { MemoryDocumentStore } from "./memoryDocumentStore.js";
export {
  QueryEngine,
  QUERY_MODES,
  parseQueryMode,
  type PhraseOptions,
  type Query,
  type QueryEngineDeps,
  type QueryMode,
  type QueryResult,
  type TermLookup,
} from "./queryEngine.js";
export { MemorySearchEngine, type AnalysisConfig, type EngineDeps } from "./memorySearchEngine.js";
