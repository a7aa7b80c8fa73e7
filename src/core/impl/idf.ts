import { DomainError } from "../errors.js";
import type { DocumentFrequencies, IdfTable, Term, TokenizedDocuments } from "../types.js";

/**
 * Counts, for every term, how many documents contain it at least once.
 * Valid on an empty partition.
 */
export function countDocumentFrequencies<Id extends string>(documents: TokenizedDocuments<Id>): DocumentFrequencies {
  const frequencies = new Map<Term, number>();

  for (const tokens of documents.values()) {
    for (const term of new Set(tokens)) {
      frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
    }
  }

  return { documentCount: documents.size, frequencies };
}

/**
 * Sums two partial counts. Associative and commutative, so partitions can be
 * counted independently and merged in any order.
 */
export function mergeDocumentFrequencies(a: DocumentFrequencies, b: DocumentFrequencies): DocumentFrequencies {
  const frequencies = new Map(a.frequencies);
  for (const [term, df] of b.frequencies) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + df);
  }
  return { documentCount: a.documentCount + b.documentCount, frequencies };
}

/** idf(t) = ln(N / df(t)); no smoothing, so a term in every document gets 0. */
export function finalizeIdfs(counts: DocumentFrequencies): IdfTable {
  const n = counts.documentCount;
  if (n <= 0) throw new DomainError("cannot compute IDF over zero documents");

  const idfs = new Map<Term, number>();
  for (const [term, df] of counts.frequencies) {
    idfs.set(term, Math.log(n / df));
  }
  return idfs;
}

export function computeIdfs<Id extends string>(documents: TokenizedDocuments<Id>): IdfTable {
  return finalizeIdfs(countDocumentFrequencies(documents));
}

/** Unseen terms weigh nothing. */
export function idfOf(idfs: IdfTable, term: Term): number {
  return idfs.get(term) ?? 0;
}
