#!/usr/bin/env node
import dotenv from "dotenv";

// natural's storage adapters bring their own dotenv, which announces itself on stdout unless quieted;
// the flag must be set before natural loads, hence the dynamic import below
process.env.DOTENV_CONFIG_QUIET ??= "true";
dotenv.config();

const { runCli } = await import("./cli/run.js");

process.exitCode = await runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
});
