import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "fs";
import { dirname, join } from "path";
import { CONFIG_DIR } from "../config/index.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, ...details: unknown[]): void;
  info(msg: string, ...details: unknown[]): void;
  warn(msg: string, ...details: unknown[]): void;
  /** `cause` goes on its own indented line: the stack for an Error, the text for anything else. */
  error(msg: string, cause?: unknown): void;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const LOG_FILE = join(CONFIG_DIR, "logs", "labelctl.log");
const MAX_LOG_BYTES = 1024 * 1024;

/** Index in LEVELS of the lowest level written; null until the log is opened. */
let threshold: number | null = null;

export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase();
  return LEVELS.find((level) => level === lower) ?? "info";
}

function openLog(): number {
  if (threshold !== null) return threshold;
  threshold = LEVELS.indexOf(parseLogLevel(process.env.LABELCTL_LOG_LEVEL));
  try {
    mkdirSync(dirname(LOG_FILE), { recursive: true });
    if (existsSync(LOG_FILE) && statSync(LOG_FILE).size > MAX_LOG_BYTES) {
      renameSync(LOG_FILE, `${LOG_FILE}.1`);
    }
  } catch {
    // Appends below then fail one by one and are dropped.
  }
  return threshold;
}

/**
 * Create the log directory, move a log over 1 MB to `labelctl.log.1` and
 * read the level from `LABELCTL_LOG_LEVEL`. Loggers call this on first write.
 */
export function initLogger(): void {
  openLog();
}

/** Override the level read from the environment, e.g. for `--debug`. */
export function setLogLevel(level: LogLevel): void {
  openLog();
  threshold = LEVELS.indexOf(level);
}

function render(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function append(lines: string[]): void {
  try {
    appendFileSync(LOG_FILE, lines.map((line) => `${line}\n`).join(""), "utf-8");
  } catch {
    // A lost log line never fails the command.
  }
}

/** A logger whose lines carry `[category]` after the level. */
export function getLogger(category?: string): Logger {
  const tag = category ? ` [${category}]` : "";

  const write = (level: LogLevel, msg: string, below: string[]): void => {
    if (LEVELS.indexOf(level) < openLog()) return;
    append([`[${new Date().toISOString()}] [${level.toUpperCase()}]${tag} ${msg}`, ...below]);
  };

  const inline = (level: LogLevel, msg: string, details: unknown[]): void =>
    write(level, [msg, ...details.map(render)].join(" "), []);

  return {
    debug: (msg, ...details) => inline("debug", msg, details),
    info: (msg, ...details) => inline("info", msg, details),
    warn: (msg, ...details) => inline("warn", msg, details),
    error: (msg, cause) => write("error", msg, cause === undefined ? [] : [`  ${render(cause)}`]),
  };
}
