import { getConfig, loadDocuments, loadStemTable, loadStopWords } from "./config.js";
import { createInMemoryEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";

const config = getConfig();

const [stopWords, stems, documents] = await Promise.all([
  loadStopWords(config.STOP_WORDS_PATH),
  loadStemTable(config.STEM_TABLE_PATH),
  config.DOCUMENTS_PATH ? loadDocuments(config.DOCUMENTS_PATH) : Promise.resolve([]),
]);

const engine = createInMemoryEngine({ stopWords, stems, documents, stripPunctuation: config.STRIP_PUNCTUATION });
const { documentCount, termCount } = engine.stats();
console.log(`index built: ${documentCount} documents, ${termCount} terms (${stopWords.size} stop words, ${stems.size} stems)`);

const { server, port } = await startServer({ port: config.PORT, engine, verbose: config.VERBOSE, allowRegex: config.ALLOW_REGEX });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);
