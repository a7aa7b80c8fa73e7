import { DomainError } from "../errors.js";
import type { TopKSelector } from "../heap.js";
import type { IdfTable, Query, SentenceId, SentenceScore, TokenSequence, TokenizedDocuments } from "../types.js";
import { idfOf } from "./idf.js";
import { assertCount } from "./limits.js";
import { StableTopKSelector } from "./stableTopK.js";

function scoreSentence(id: SentenceId, tokens: TokenSequence, query: Query, idfs: IdfTable): SentenceScore {
  if (tokens.length === 0) {
    throw new DomainError(`sentence has no tokens, density is undefined: ${JSON.stringify(id)}`);
  }

  const present = new Set<string>();
  let hits = 0;
  for (const t of tokens) {
    if (!query.has(t)) continue;
    hits++;
    present.add(t);
  }

  // each distinct query term counts once, summed in query order so equal term sets give equal sums
  let matchingWordMeasure = 0;
  for (const t of query) {
    if (present.has(t)) matchingWordMeasure += idfOf(idfs, t);
  }

  return { id, matchingWordMeasure, queryTermDensity: hits / tokens.length };
}

/** (matching-word measure, query-term density) per sentence, in enumeration order. */
export function scoreSentences(
  query: Query,
  sentences: TokenizedDocuments<SentenceId>,
  idfs: IdfTable,
): SentenceScore[] {
  const out: SentenceScore[] = [];
  for (const [id, tokens] of sentences) out.push(scoreSentence(id, tokens, query, idfs));
  return out;
}

/** Measure desc, then density desc. */
export function compareSentenceScores(a: SentenceScore, b: SentenceScore): number {
  return b.matchingWordMeasure - a.matchingWordMeasure || b.queryTermDensity - a.queryTermDensity;
}

/**
 * Ranks scored sentences and keeps the best `n`. Sentences equal on both
 * criteria keep their extraction order.
 */
export function rankSentences(
  query: Query,
  sentences: TokenizedDocuments<SentenceId>,
  idfs: IdfTable,
  n: number,
  selector: TopKSelector<SentenceScore> = new StableTopKSelector(),
): SentenceScore[] {
  assertCount(n, "sentence match count");
  return selector.topK(scoreSentences(query, sentences, idfs), n, compareSentenceScores);
}

export function topSentences(
  query: Query,
  sentences: TokenizedDocuments<SentenceId>,
  idfs: IdfTable,
  n: number,
  selector?: TopKSelector<SentenceScore>,
): SentenceId[] {
  return rankSentences(query, sentences, idfs, n, selector).map((s) => s.id);
}
