import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../../errors.js";
import { NaturalSentenceSegmenter } from "../naturalSentenceSegmenter.js";
import { DEFAULT_STOP_WORDS, loadStopWords, NaturalTokenizer } from "../naturalTokenizer.js";

describe("NaturalTokenizer", () => {
  it("lowercases and drops punctuation and stop-words", () => {
    const tok = new NaturalTokenizer(new Set(["the", "a"]));
    expect(tok.tokenize("The cat sat on a mat!")).toEqual(["cat", "sat", "on", "mat"]);
  });

  it("keeps repeated terms in reading order", () => {
    const tok = new NaturalTokenizer(new Set());
    expect(tok.tokenize("Cat, dog; cat.")).toEqual(["cat", "dog", "cat"]);
  });

  it("uses the English stop-word list by default", () => {
    expect(DEFAULT_STOP_WORDS.has("the")).toBe(true);
    expect(new NaturalTokenizer().tokenize("The cat sat.")).toEqual(["cat", "sat"]);
  });

  it("keeps accented words and inner apostrophes whole", () => {
    const tok = new NaturalTokenizer(new Set(["the"]));
    expect(tok.tokenize("The café serves naïve crème brûlée. Don't!")).toEqual([
      "café",
      "serves",
      "naïve",
      "crème",
      "brûlée",
      "don't",
    ]);
  });

  it("drops runs of punctuation and symbols between words", () => {
    const tok = new NaturalTokenizer(new Set());
    expect(tok.tokenize("cats -- dogs (birds) $5 & «mice»")).toEqual(["cats", "dogs", "birds", "5", "mice"]);
  });

  it("returns nothing for text without words", () => {
    expect(new NaturalTokenizer().tokenize("  ... !? ")).toEqual([]);
  });
});

describe("NaturalSentenceSegmenter", () => {
  const seg = new NaturalSentenceSegmenter();

  it("splits a passage into trimmed sentences", () => {
    expect(seg.segment("Cats purr. Dogs bark.")).toEqual(["Cats purr.", "Dogs bark."]);
  });

  it("returns a single sentence unchanged", () => {
    expect(seg.segment("The cat sat.")).toEqual(["The cat sat."]);
  });

  it("returns nothing for a blank passage", () => {
    expect(seg.segment("   ")).toEqual([]);
    expect(seg.segment("")).toEqual([]);
  });
});

describe("loadStopWords", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "qa-stop-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON array, normalizing case and whitespace", async () => {
    const file = path.join(dir, "stop.json");
    await writeFile(file, JSON.stringify(["Foo", " bar "]));
    expect([...loadStopWords(file)]).toEqual(["foo", "bar"]);
  });

  it("reads one word per line, skipping blanks", async () => {
    const file = path.join(dir, "stop.txt");
    await writeFile(file, "foo\r\nBar\n\n");
    expect([...loadStopWords(file)]).toEqual(["foo", "bar"]);
  });

  it("rejects JSON that is not an array of strings", async () => {
    const file = path.join(dir, "bad.json");
    await writeFile(file, "[1, 2]");
    expect(() => loadStopWords(file)).toThrow(ConfigError);
  });

  it("rejects malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "[oops");
    expect(() => loadStopWords(file)).toThrow(ConfigError);
  });

  it("rejects a missing file", () => {
    expect(() => loadStopWords(path.join(dir, "nope.txt"))).toThrow(ConfigError);
  });
});
