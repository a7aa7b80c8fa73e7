import { createInterface } from "node:readline";

import { loadConfig } from "../config/index.js";
import type { CorpusLoader } from "../core/corpusLoader.js";
import { UsageError } from "../core/errors.js";
import {
  DEFAULT_STOP_WORDS,
  FsCorpusLoader,
  loadStopWords,
  NaturalSentenceSegmenter,
  NaturalTokenizer,
  QuestionAnswerer,
} from "../core/impl/index.js";
import { createLogger } from "./logger.js";
import { formatProblem, problem } from "./problem.js";

export const USAGE = "Usage: tfidf-qa <corpus-directory>";

export interface CliIo {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  loader?: CorpusLoader;
  /** false strips colour from diagnostics */
  color?: boolean;
}

/** First line of input, or "" on EOF. The prompt is shown to terminals only. */
async function readQuery(io: CliIo): Promise<string> {
  if (io.stdin.isTTY) io.stdout.write("Query: ");
  const rl = createInterface({ input: io.stdin, terminal: false });
  try {
    for await (const line of rl) return line;
    return "";
  } finally {
    rl.close();
  }
}

/**
 * `tfidf-qa <corpus-directory>`: reads one query from stdin and prints the best
 * matching sentence(s), one per line. Resolves to the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIo, opts: CliOptions = {}): Promise<number> {
  try {
    if (args.length !== 1) throw new UsageError(USAGE);
    const directory = args[0] ?? "";

    const config = loadConfig(opts.env ?? process.env);
    const log = createLogger({ level: config.logLevel, stream: io.stderr, color: opts.color });

    const stopWords = config.stopWordsPath ? loadStopWords(config.stopWordsPath) : DEFAULT_STOP_WORDS;
    const answerer = new QuestionAnswerer(
      { tokenizer: new NaturalTokenizer(stopWords), segmenter: new NaturalSentenceSegmenter() },
      { fileMatches: config.fileMatches, sentenceMatches: config.sentenceMatches },
    );

    const loader = opts.loader ?? new FsCorpusLoader();
    const texts = await loader.load(directory, { extensions: config.extensions });
    const corpus = answerer.indexCorpus(texts);
    log.debug("corpus indexed", { directory, files: corpus.files.size, vocabulary: corpus.idfs.size });
    if (texts.size === 0) log.warn(`no ${config.extensions.join("/")} files in '${directory}'`);

    const result = answerer.answer(corpus, await readQuery(io));
    log.debug("query", { terms: result.query });
    log.debug("top files", { files: result.files });
    for (const s of result.sentences) {
      log.debug("sentence", { measure: s.matchingWordMeasure, density: s.queryTermDensity, text: s.id });
    }
    if (result.query.length === 0) log.info("query has no searchable terms");

    for (const s of result.sentences) io.stdout.write(`${s.id}\n`);
    return 0;
  } catch (e) {
    const p = problem(e);
    io.stderr.write(`${formatProblem(p)}\n`);
    return p.exitCode;
  }
}
