import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

import type { CorpusLoader, CorpusLoadOptions } from "../corpusLoader.js";
import { NotFoundError } from "../errors.js";
import type { DocId } from "../types.js";

export const DEFAULT_EXTENSIONS: readonly string[] = [".txt"];

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (e) {
    if (isMissing(e)) return false;
    throw e;
  }
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

/**
 * Reads the regular files of one directory (not recursive) whose extension is
 * in the allow-list. Files are read concurrently; the returned map is built
 * afterwards in file-name order.
 */
export class FsCorpusLoader implements CorpusLoader {
  async load(directory: string, options?: CorpusLoadOptions): Promise<Map<DocId, string>> {
    if (!(await isDirectory(directory))) throw new NotFoundError(directory);

    const allowed = new Set((options?.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase()));
    const entries = await readdir(directory, { withFileTypes: true });

    const names = entries
      .filter((e) => e.isFile() && allowed.has(path.extname(e.name).toLowerCase()))
      .map((e) => e.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const texts = await Promise.all(names.map((name) => readFile(path.join(directory, name), "utf8")));

    const corpus = new Map<DocId, string>();
    names.forEach((name, i) => corpus.set(name, texts[i] ?? ""));
    return corpus;
  }
}
