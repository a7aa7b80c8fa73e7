import { z } from "zod";

import { ConfigError } from "../core/errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Schema for environment variables; everything has a default except the stop-word override.
const EnvSchema = z.object({
  QA_FILE_MATCHES: z.coerce.number().int().nonnegative().default(1),
  QA_SENTENCE_MATCHES: z.coerce.number().int().nonnegative().default(1),
  QA_EXTENSIONS: z
    .string()
    .default(".txt")
    .transform((v) =>
      v
        .split(",")
        .map((ext) => ext.trim().toLowerCase())
        .filter(Boolean)
        .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`)),
    )
    .pipe(z.array(z.string()).min(1, "must name at least one extension")),
  QA_STOPWORDS_PATH: z.string().min(1).optional(),
  QA_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export interface AppConfig {
  /** Files whose sentences are considered. Env: QA_FILE_MATCHES. */
  readonly fileMatches: number;
  /** Sentences printed. Env: QA_SENTENCE_MATCHES. */
  readonly sentenceMatches: number;
  /** Corpus file extensions, lowercased, with leading dot. Env: QA_EXTENSIONS. */
  readonly extensions: readonly string[];
  /** Replacement stop-word list, if any. Env: QA_STOPWORDS_PATH. */
  readonly stopWordsPath?: string;
  readonly logLevel: LogLevel;
}

/**
 * Validates the environment and builds the application config.
 * Throws ConfigError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields: Record<string, string[]> = {};
    for (const [key, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages?.length) fields[key] = messages;
    }
    throw new ConfigError(`Invalid environment configuration: ${Object.keys(fields).join(", ")}`, fields);
  }

  const e = parsed.data;
  return Object.freeze({
    fileMatches: e.QA_FILE_MATCHES,
    sentenceMatches: e.QA_SENTENCE_MATCHES,
    extensions: Object.freeze(e.QA_EXTENSIONS),
    stopWordsPath: e.QA_STOPWORDS_PATH,
    logLevel: e.QA_LOG_LEVEL,
  });
}
