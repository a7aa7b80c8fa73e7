/** Shared core types used by module contracts. */

export type DocId = string;
/** Sentences are identified by their own text. */
export type SentenceId = string;
export type Term = string;

/** Normalized tokens of one document or sentence, in reading order. */
export type TokenSequence = readonly Term[];

/**
 * Id -> tokens. Map insertion order is the enumeration order rankers fall back
 * to when scores are equal.
 */
export type TokenizedDocuments<Id extends string = DocId> = ReadonlyMap<Id, TokenSequence>;

/** Term -> natural-log inverse document frequency. */
export type IdfTable = ReadonlyMap<Term, number>;

export type Query = ReadonlySet<Term>;

/** Raw text keyed by file name. */
export type Corpus = ReadonlyMap<DocId, string>;

/** Partial IDF computation; mergeable across document partitions. */
export interface DocumentFrequencies {
  documentCount: number;
  frequencies: ReadonlyMap<Term, number>;
}

export interface FileScore {
  id: DocId;
  /** sum over query terms of tf * idf */
  score: number;
}

export interface SentenceScore {
  id: SentenceId;
  /** sum of idf over distinct query terms present */
  matchingWordMeasure: number;
  /** share of the sentence's tokens that are query terms, in [0, 1] */
  queryTermDensity: number;
}
