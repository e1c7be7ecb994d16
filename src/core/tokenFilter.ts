import type { Token } from "./types.js";

/**
 * Drops tokens from a stream. Side-effect-free; surviving tokens keep their
 * input order.
 */
export interface TokenFilter {
  filter(tokens: Iterable<Token>): Iterable<Token>;
}
