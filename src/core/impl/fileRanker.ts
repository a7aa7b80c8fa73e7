import type { TopKSelector } from "../heap.js";
import type { DocId, FileScore, IdfTable, Query, Term, TokenizedDocuments } from "../types.js";
import { idfOf } from "./idf.js";
import { assertCount } from "./limits.js";
import { StableTopKSelector } from "./stableTopK.js";

function termCounts(tokens: readonly Term[], query: Query): Map<Term, number> {
  const counts = new Map<Term, number>();
  for (const t of tokens) {
    if (query.has(t)) counts.set(t, (counts.get(t) ?? 0) + 1);
  }
  return counts;
}

/**
 * TF-IDF score per file, in enumeration order.
 *
 * score = sum over query terms present in the file of (raw count * idf).
 * Terms missing from `idfs` weigh 0; query terms absent from the file add nothing.
 * Terms are summed in query order, so files holding the same counts score identically.
 */
export function scoreFiles(query: Query, files: TokenizedDocuments, idfs: IdfTable): FileScore[] {
  const out: FileScore[] = [];
  for (const [id, tokens] of files) {
    let score = 0;
    const counts = termCounts(tokens, query);
    for (const term of query) {
      const tf = counts.get(term);
      if (tf) score += tf * idfOf(idfs, term);
    }
    out.push({ id, score });
  }
  return out;
}

export function compareFileScores(a: FileScore, b: FileScore): number {
  return b.score - a.score;
}

/**
 * Up to `n` file ids, highest TF-IDF first. Equal scores keep the files'
 * enumeration order.
 */
export function topFiles(
  query: Query,
  files: TokenizedDocuments,
  idfs: IdfTable,
  n: number,
  selector: TopKSelector<FileScore> = new StableTopKSelector(),
): DocId[] {
  assertCount(n, "file match count");
  return selector.topK(scoreFiles(query, files, idfs), n, compareFileScores).map((s) => s.id);
}
