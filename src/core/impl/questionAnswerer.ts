import type { TopKSelector } from "../heap.js";
import type { SentenceSegmenter } from "../segmenter.js";
import type { Tokenizer } from "../tokenizer.js";
import type {
  Corpus,
  DocId,
  FileScore,
  IdfTable,
  SentenceId,
  SentenceScore,
  Term,
  TokenSequence,
} from "../types.js";
import { topFiles } from "./fileRanker.js";
import { computeIdfs } from "./idf.js";
import { rankSentences } from "./sentenceRanker.js";
import { StableTopKSelector } from "./stableTopK.js";

export interface AnswerOptions {
  /** how many files to pull sentences from */
  fileMatches?: number;
  /** how many sentences to return */
  sentenceMatches?: number;
}

export interface AnswererDeps {
  tokenizer: Tokenizer;
  segmenter: SentenceSegmenter;
  fileTopK?: TopKSelector<FileScore>;
  sentenceTopK?: TopKSelector<SentenceScore>;
}

/** Tokenized corpus plus its file-level IDF table. Immutable once built. */
export interface IndexedCorpus {
  texts: Corpus;
  files: ReadonlyMap<DocId, TokenSequence>;
  idfs: IdfTable;
}

export interface Answer {
  /** distinct query terms, in first-seen order */
  query: Term[];
  files: DocId[];
  sentences: SentenceScore[];
}

/**
 * Two-stage retrieval: rank files by TF-IDF, then rank the sentences of the
 * best files against an IDF table computed over those sentences only.
 */
export class QuestionAnswerer {
  private readonly fileMatches: number;
  private readonly sentenceMatches: number;
  private readonly fileTopK: TopKSelector<FileScore>;
  private readonly sentenceTopK: TopKSelector<SentenceScore>;

  constructor(
    private readonly deps: AnswererDeps,
    options: AnswerOptions = {},
  ) {
    this.fileMatches = options.fileMatches ?? 1;
    this.sentenceMatches = options.sentenceMatches ?? 1;
    this.fileTopK = deps.fileTopK ?? new StableTopKSelector();
    this.sentenceTopK = deps.sentenceTopK ?? new StableTopKSelector();
  }

  indexCorpus(texts: Corpus): IndexedCorpus {
    const files = new Map<DocId, TokenSequence>();
    for (const [id, text] of texts) files.set(id, this.deps.tokenizer.tokenize(text));

    // an empty corpus has no IDF table; answer() short-circuits on it
    const idfs: IdfTable = files.size ? computeIdfs(files) : new Map();
    return { texts, files, idfs };
  }

  answer(corpus: IndexedCorpus, rawQuery: string): Answer {
    const terms = new Set(this.deps.tokenizer.tokenize(rawQuery));
    const query = Array.from(terms);
    // a query with no terms still ranks: every score is 0 and enumeration order decides
    if (corpus.files.size === 0) return { query, files: [], sentences: [] };

    const files = topFiles(terms, corpus.files, corpus.idfs, this.fileMatches, this.fileTopK);

    const candidates = this.extractSentences(files.map((id) => corpus.texts.get(id) ?? ""));
    if (candidates.size === 0) return { query, files, sentences: [] };

    // scoped to the candidate sentences, never merged with the file table
    const sentenceIdfs = computeIdfs(candidates);
    const sentences = rankSentences(terms, candidates, sentenceIdfs, this.sentenceMatches, this.sentenceTopK);

    return { query, files, sentences };
  }

  /** Passages are lines; sentences with no tokens left are dropped. */
  private extractSentences(texts: string[]): Map<SentenceId, TokenSequence> {
    const out = new Map<SentenceId, TokenSequence>();
    for (const text of texts) {
      for (const passage of text.split("\n")) {
        for (const sentence of this.deps.segmenter.segment(passage)) {
          const tokens = this.deps.tokenizer.tokenize(sentence);
          if (tokens.length) out.set(sentence, tokens);
        }
      }
    }
    return out;
  }
}
