import { readFileSync } from "node:fs";
import natural from "natural";
import { z } from "zod";

import { ConfigError } from "../errors.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Term } from "../types.js";

/** English stop-words shipped with natural; read once, never mutated. */
export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set(natural.stopwords);

// a word is letters, marks and digits, optionally joined by apostrophes;
// any other run of non-space characters comes out as its own token
const WORD_OR_SYMBOLS = /[\p{L}\p{M}\p{N}]+(?:['\u2019][\p{L}\p{M}\p{N}]+)*|[^\s\p{L}\p{M}\p{N}]+/gu;
const PUNCTUATION_ONLY = /^[\p{P}\p{S}]+$/u;

const StopWordList = z.array(z.string());

/**
 * Loads a replacement stop-word list: a JSON array of strings, or one word per
 * line. Meant to be called once at start-up.
 */
export function loadStopWords(path: string): ReadonlySet<string> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (e) {
    throw new ConfigError(`cannot read stop-word list '${path}'`, { QA_STOPWORDS_PATH: [String(e)] });
  }

  let words: string[];
  if (raw.trimStart().startsWith("[")) {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`stop-word list '${path}' is not valid JSON`, { QA_STOPWORDS_PATH: [String(e)] });
    }
    const parsed = StopWordList.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(`stop-word list '${path}' must be a JSON array of strings`, {
        QA_STOPWORDS_PATH: parsed.error.issues.map((i) => i.message),
      });
    }
    words = parsed.data;
  } else {
    words = raw.split(/\r?\n/);
  }

  return new Set(words.map((w) => w.trim().toLowerCase()).filter(Boolean));
}

/**
 * Word tokenizer backed by natural:
 * - lowercases the input
 * - splits into words (any script, inner apostrophes kept) and symbol runs
 * - drops tokens made only of punctuation or symbols
 * - drops stop-words
 */
export class NaturalTokenizer implements Tokenizer {
  private readonly words = new natural.RegexpTokenizer({ pattern: WORD_OR_SYMBOLS, gaps: false });

  constructor(private readonly stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {}

  tokenize(text: string): Term[] {
    const out: Term[] = [];
    for (const word of this.words.tokenize(text.toLowerCase()) ?? []) {
      if (!word || PUNCTUATION_ONLY.test(word)) continue;
      if (this.stopWords.has(word)) continue;
      out.push(word);
    }
    return out;
  }
}
