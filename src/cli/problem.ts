import { ConfigError, isQaError, type ErrorCode } from "../core/errors.js";

export interface Problem {
  code: ErrorCode | "INTERNAL";
  title: string;
  detail: string;
  exitCode: number;
  /** per-field messages, for configuration errors */
  errors?: Record<string, string[]>;
}

export function problem(e: unknown): Problem {
  if (!isQaError(e)) {
    const detail = e instanceof Error ? e.message : String(e);
    return { code: "INTERNAL", title: codeToTitle("INTERNAL"), detail, exitCode: 1 };
  }

  return {
    code: e.code,
    title: codeToTitle(e.code),
    detail: e.message,
    exitCode: e.code === "USAGE" ? 2 : 1,
    errors: e instanceof ConfigError ? e.fields : undefined,
  };
}

/** One line per problem, plus one indented line per field message. */
export function formatProblem(p: Problem): string {
  const lines = [p.code === "USAGE" ? p.detail : `${p.title}: ${p.detail}`];
  for (const [field, messages] of Object.entries(p.errors ?? {})) {
    for (const m of messages) lines.push(`  ${field}: ${m}`);
  }
  return lines.join("\n");
}

function codeToTitle(code: Problem["code"]): string {
  switch (code) {
    case "USAGE":
      return "Usage error";
    case "NOT_FOUND":
      return "Not found";
    case "DOMAIN":
      return "Invalid input";
    case "INVALID_CONFIG":
      return "Invalid configuration";
    default:
      return "Internal error";
  }
}
