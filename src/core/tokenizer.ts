import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, lowercase every token. Defaults to true. */
  normalizeCase?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - the returned iterable is lazy; calling `tokenize` again restarts it
 * - case folding must be the same routine used for query terms
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
