export type ErrorCode = "USAGE" | "NOT_FOUND" | "DOMAIN" | "INVALID_CONFIG";

/** Base class for every error this project raises on purpose. */
export class QaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Wrong command-line invocation. */
export class UsageError extends QaError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

/** Corpus directory missing or not a directory. */
export class NotFoundError extends QaError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", `The directory '${path}' does not exist.`, options);
    this.path = path;
  }
}

/**
 * Degenerate numeric input reached a scoring function (no documents, an empty
 * sentence). Upstream contract violation; not meant to be recovered from.
 */
export class DomainError extends QaError {
  constructor(message: string) {
    super("DOMAIN", message);
  }
}

export class ConfigError extends QaError {
  readonly fields: Record<string, string[]>;

  constructor(message: string, fields: Record<string, string[]> = {}) {
    super("INVALID_CONFIG", message);
    this.fields = fields;
  }
}

export function isQaError(e: unknown): e is QaError {
  return e instanceof QaError;
}
