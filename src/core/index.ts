export type * from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { SentenceSegmenter } from "./segmenter.js";
export type { CorpusLoader, CorpusLoadOptions } from "./corpusLoader.js";
export type { Heap, TopKSelector } from "./heap.js";
export * from "./errors.js";
export * from "./impl/index.js";
