/**
 * Splits a passage of text into sentences, in reading order.
 * Implementations return trimmed, non-blank sentences only.
 */
export interface SentenceSegmenter {
  segment(passage: string): string[];
}
