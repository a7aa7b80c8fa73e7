export * from "./idf.js";
export * from "./fileRanker.js";
export * from "./sentenceRanker.js";
export * from "./stableTopK.js";
export * from "./limits.js";
export * from "./naturalTokenizer.js";
export * from "./naturalSentenceSegmenter.js";
export * from "./fsCorpusLoader.js";
export * from "./questionAnswerer.js";
