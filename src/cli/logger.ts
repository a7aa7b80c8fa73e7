import chalk, { Chalk, type ChalkInstance } from "chalk";

import type { LogLevel } from "../config/index.js";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: LogLevel;
  stream?: NodeJS.WritableStream;
  /** false strips colour; otherwise chalk's terminal detection decides */
  color?: boolean;
}

type Emitting = Exclude<LogLevel, "silent">;

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function tag(paint: ChalkInstance, level: Emitting): string {
  switch (level) {
    case "debug":
      return paint.gray("debug");
    case "info":
      return paint.cyan("info");
    case "warn":
      return paint.yellow("warn");
    case "error":
      return paint.red("error");
  }
}

/**
 * Levelled logger for diagnostics. Writes to stderr so stdout carries answers only.
 * Lines look like `[warn] message {"key":"value"}`.
 */
export function createLogger(opts: LoggerOptions): Logger {
  const stream = opts.stream ?? process.stderr;
  const paint = new Chalk({ level: opts.color === false ? 0 : chalk.level });
  const threshold = SEVERITY[opts.level];

  const emit = (level: Emitting, message: string, meta?: Record<string, unknown>): void => {
    if (SEVERITY[level] < threshold) return;
    const suffix = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    stream.write(`[${tag(paint, level)}] ${message}${suffix}\n`);
  };

  return {
    debug: (m, meta) => emit("debug", m, meta),
    info: (m, meta) => emit("info", m, meta),
    warn: (m, meta) => emit("warn", m, meta),
    error: (m, meta) => emit("error", m, meta),
  };
}
