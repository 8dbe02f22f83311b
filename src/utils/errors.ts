import chalk from "chalk";
import { ApiError, DecodeError, InvalidIdError, NetworkError } from "../api/errors.ts";
import { cliExit } from "./exit.ts";

export const EXIT_USAGE = 2;
export const EXIT_AUTH = 3;
export const EXIT_NETWORK = 4;
export const EXIT_NOT_FOUND = 5;

export enum ErrorCode {
  AUTH_FAILED = "AUTH_FAILED",
  RATE_LIMITED = "RATE_LIMITED",
  NOT_FOUND = "NOT_FOUND",
  VALIDATION = "VALIDATION",
  NETWORK = "NETWORK",
  DECODE = "DECODE",
  UNKNOWN = "UNKNOWN",
}

let DEBUG = false;

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function debug(...args: unknown[]): void {
  if (DEBUG) console.error("[debug]", ...args);
}

export class CliError extends Error {
  code: number;
  errorCode: ErrorCode;
  suggestion?: string;

  constructor(message: string, opts: { code: number; errorCode?: ErrorCode; suggestion?: string }) {
    super(message);
    this.name = "CliError";
    this.code = opts.code;
    this.errorCode = opts.errorCode ?? ErrorCode.UNKNOWN;
    this.suggestion = opts.suggestion;
  }
}

function wrapHttpError(err: ApiError): CliError {
  if (err.isUnauthorized()) {
    return new CliError(`Authentication failed: ${err.detail}`, {
      code: EXIT_AUTH,
      errorCode: ErrorCode.AUTH_FAILED,
      suggestion: "Run `labelctl auth` to set a valid personal access token with the `api` scope.",
    });
  }

  if (err.isRateLimited()) {
    return new CliError("Rate limit exceeded. Please wait a moment and try again.", {
      code: EXIT_NETWORK,
      errorCode: ErrorCode.RATE_LIMITED,
      suggestion: err.response.headers.get("Retry-After")
        ? `The server asks to retry after ${err.response.headers.get("Retry-After")} seconds.`
        : "Wait a moment and try again.",
    });
  }

  if (err.isNotFound()) {
    return new CliError(`Not found: ${err.detail}`, {
      code: EXIT_NOT_FOUND,
      errorCode: ErrorCode.NOT_FOUND,
      suggestion: "Check the project and label identifiers. Paths like `group/project` are case-sensitive.",
    });
  }

  if (err.isServerError()) {
    return new CliError(`The API is experiencing issues (${err.status}). Try again later.`, {
      code: EXIT_NETWORK,
      errorCode: ErrorCode.NETWORK,
    });
  }

  if (err.status === 400 || err.status === 409 || err.status === 422) {
    return new CliError(`Request rejected: ${err.detail}`, {
      code: 1,
      errorCode: ErrorCode.VALIDATION,
    });
  }

  return new CliError(err.message, { code: 1, errorCode: ErrorCode.UNKNOWN });
}

export function wrapApiError(err: unknown): CliError {
  if (err instanceof CliError) return err;

  debug("wrapApiError called with:", err instanceof Error ? `${err.name}: ${err.message}` : String(err));

  if (err instanceof InvalidIdError) {
    return new CliError(err.message, {
      code: EXIT_USAGE,
      errorCode: ErrorCode.VALIDATION,
      suggestion: "Pass a numeric ID or a path such as `group/project`.",
    });
  }

  if (err instanceof ApiError) {
    return wrapHttpError(err);
  }

  if (err instanceof NetworkError) {
    return new CliError(err.message, {
      code: EXIT_NETWORK,
      errorCode: ErrorCode.NETWORK,
      suggestion: "Check your internet connection and the configured `api.base_url`.",
    });
  }

  if (err instanceof DecodeError) {
    return new CliError(`Could not read the server response: ${err.message}`, {
      code: 1,
      errorCode: ErrorCode.DECODE,
      suggestion: "Check that `api.base_url` points at the REST API root, e.g. https://gitlab.example.com/api/v4.",
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new CliError(message, { code: 1, errorCode: ErrorCode.UNKNOWN });
}

export function formatCliError(err: CliError): string {
  let out = chalk.red(`Error: ${err.message}`);
  if (DEBUG) {
    out += `\n${chalk.dim(`[${err.errorCode}] exit code: ${err.code}`)}`;
    if (err.stack) {
      out += `\n${chalk.dim(err.stack)}`;
    }
  }
  if (err.suggestion) {
    out += `\n${chalk.yellow("Hint:")} ${err.suggestion}`;
  }
  return out;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  let prev = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const curr = [i];
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min((prev[j] ?? 0) + 1, (curr[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost);
    }
    prev = curr;
  }

  return prev[n] ?? 0;
}

export function didYouMean(input: string, candidates: string[]): string | null {
  let bestMatch: string | null = null;
  let bestDist = Infinity;

  for (const c of candidates) {
    const dist = levenshtein(input.toLowerCase(), c.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      bestMatch = c;
    }
  }

  return bestMatch;
}

export function handleError(err: unknown): never {
  const cliErr = wrapApiError(err);
  debug("handleError:", cliErr.errorCode, cliErr.message);
  console.error(formatCliError(cliErr));
  return cliExit(cliErr.code);
}
