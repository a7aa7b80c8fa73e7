import natural from "natural";

import type { SentenceSegmenter } from "../segmenter.js";

/**
 * Sentence splitter backed by natural's rule-based SentenceTokenizer.
 * `abbreviations` (e.g. "Dr.") are tokens whose period does not end a sentence.
 */
export class NaturalSentenceSegmenter implements SentenceSegmenter {
  private readonly sentences: InstanceType<typeof natural.SentenceTokenizer>;

  constructor(abbreviations: string[] = []) {
    this.sentences = new natural.SentenceTokenizer(abbreviations);
  }

  segment(passage: string): string[] {
    if (!passage.trim()) return [];
    return this.sentences
      .tokenize(passage)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
}
