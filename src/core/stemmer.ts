import type { Term } from "./types.js";

/**
 * Maps a case-folded term to its canonical stem.
 * Must be pure: same input, same output, no state beyond the static table.
 */
export interface Stemmer {
  conflate(term: Term): Term;
}
