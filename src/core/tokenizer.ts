import type { Term } from "./types.js";

/**
 * Turns raw text into normalized terms.
 *
 * Contract notes:
 * - output is lowercased, with punctuation and stop-words removed
 * - deterministic for a given input
 * - the core never re-validates tokens it receives
 */
export interface Tokenizer {
  tokenize(text: string): Term[];
}
