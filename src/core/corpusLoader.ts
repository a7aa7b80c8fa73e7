import type { DocId } from "./types.js";

export interface CorpusLoadOptions {
  /** File extensions to include, with the leading dot (e.g. ".txt"). */
  extensions?: readonly string[];
}

/**
 * Reads a corpus directory into file name -> text.
 *
 * Contract notes:
 * - rejects with NotFoundError when the directory does not exist
 * - entries are inserted in a reproducible order
 */
export interface CorpusLoader {
  load(directory: string, options?: CorpusLoadOptions): Promise<Map<DocId, string>>;
}
