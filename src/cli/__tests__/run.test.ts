import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PassThrough, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../run.js";

function sink() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(String(chunk));
      cb();
    },
  });
  return { stream, text: () => chunks.join("") };
}

async function run(args: string[], input: string, env: NodeJS.ProcessEnv = {}) {
  const stdin = new PassThrough();
  stdin.end(input);
  const stdout = sink();
  const stderr = sink();
  const code = await runCli(args, { stdin, stdout: stdout.stream, stderr: stderr.stream }, { env, color: false });
  return { code, out: stdout.text(), err: stderr.text() };
}

describe("runCli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "qa-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage and exits 2 without exactly one argument", async () => {
    expect(await run([], "cat\n")).toEqual({ code: 2, out: "", err: "Usage: tfidf-qa <corpus-directory>\n" });
    expect((await run([dir, "extra"], "cat\n")).code).toBe(2);
  });

  it("reports a missing directory and exits 1", async () => {
    const missing = path.join(dir, "missing");
    expect(await run([missing], "cat\n")).toEqual({
      code: 1,
      out: "",
      err: `Not found: The directory '${missing}' does not exist.\n`,
    });
  });

  it("prints the top sentence for a query read from stdin", async () => {
    await writeFile(path.join(dir, "a.txt"), "The cat sat.");
    expect(await run([dir], "cat\n")).toEqual({ code: 0, out: "The cat sat.\n", err: "" });
  });

  it("prints as many sentences as configured, best first", async () => {
    await writeFile(path.join(dir, "cats.txt"), "The cat sat on the mat.\nA cat chased a mouse.\nThe mouse hid.");
    await writeFile(path.join(dir, "fish.txt"), "Fish swim.");

    const res = await run([dir], "mouse chased\n", { QA_SENTENCE_MATCHES: "2" });
    expect(res).toEqual({ code: 0, out: "A cat chased a mouse.\nThe mouse hid.\n", err: "" });
  });

  it("accepts a last line without a newline", async () => {
    await writeFile(path.join(dir, "a.txt"), "The cat sat.");
    expect((await run([dir], "cat")).out).toBe("The cat sat.\n");
  });

  it("answers an empty query with the first sentence of the first file", async () => {
    await writeFile(path.join(dir, "a.txt"), "The cat sat.");
    expect(await run([dir], "")).toEqual({ code: 0, out: "The cat sat.\n", err: "" });
  });

  it("warns about a corpus without text files", async () => {
    await writeFile(path.join(dir, "notes.md"), "The cat sat.");
    expect(await run([dir], "cat\n")).toEqual({ code: 0, out: "", err: `[warn] no .txt files in '${dir}'\n` });
  });

  it("logs the query terms at debug level", async () => {
    await writeFile(path.join(dir, "a.txt"), "The cat sat.");
    const res = await run([dir], "cat\n", { QA_LOG_LEVEL: "debug" });
    expect(res.out).toBe("The cat sat.\n");
    expect(res.err.split("\n")).toContain('[debug] query {"terms":["cat"]}');
  });

  it("uses a replacement stop-word list", async () => {
    await writeFile(path.join(dir, "a.txt"), "The cat sat.");
    const stop = path.join(dir, "stop.json");
    await writeFile(stop, JSON.stringify(["sat"]));

    // "the" is searchable once the default list is replaced
    expect((await run([dir], "the\n", { QA_STOPWORDS_PATH: stop })).out).toBe("The cat sat.\n");
  });

  it("rejects an invalid environment", async () => {
    const res = await run([dir], "cat\n", { QA_FILE_MATCHES: "many" });
    expect(res.code).toBe(1);
    expect(res.err.split("\n")[0]).toBe("Invalid configuration: Invalid environment configuration: QA_FILE_MATCHES");
  });
});
