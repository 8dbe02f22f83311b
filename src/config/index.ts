import { homedir } from "os";
import { join } from "path";
import { mkdirSync, readFileSync, writeFileSync, existsSync } from "fs";
import TOML from "@iarna/toml";
import { CliError, ErrorCode, EXIT_AUTH, EXIT_USAGE } from "../utils/errors.ts";

export const CONFIG_DIR =
  process.env.LABELCTL_CONFIG_DIR || join(homedir(), ".config", "labelctl");
const CONFIG_PATH = join(CONFIG_DIR, "config.toml");

export const DEFAULT_BASE_URL = "https://gitlab.com/api/v4";

type Defaults = {
  project?: string;
};

export type ApiConfig = {
  base_url: string;
  timeout: number; // request timeout in seconds
};

export type Config = {
  auth?: { token?: string };
  api?: Partial<ApiConfig>;
  defaults?: Defaults;
};

const KNOWN_TOP_LEVEL_KEYS = new Set(["auth", "api", "defaults"]);

export const DEFAULT_CONFIG: Config = {
  auth: {},
  api: {
    base_url: DEFAULT_BASE_URL,
    timeout: 30,
  },
  defaults: {},
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHttpUrl(value: unknown): boolean {
  return typeof value === "string" && /^https?:\/\//.test(value);
}

/**
 * Deep-merges two objects. User values override defaults.
 * Arrays are replaced, not merged. null/undefined user values don't override defaults.
 */
export function deepMerge<T extends Record<string, unknown>>(defaults: T, userConfig: Record<string, unknown>): T {
  const result: Record<string, unknown> = { ...defaults };

  for (const key of Object.keys(userConfig)) {
    const userVal = userConfig[key];
    const defaultVal = result[key];

    if (userVal === null || userVal === undefined) {
      continue;
    }

    if (isPlainObject(userVal) && isPlainObject(defaultVal)) {
      result[key] = deepMerge(defaultVal, userVal);
      continue;
    }

    result[key] = userVal;
  }

  return result as T;
}

function mergeWithDefaults(user: Record<string, unknown>): Config {
  return deepMerge(DEFAULT_CONFIG, user);
}

/**
 * Validates a raw parsed config object and returns a typed Config.
 * Collects all validation errors and throws a single CliError with all problems.
 * Warns on stderr for unknown top-level keys but does not fail.
 */
export function validateConfig(raw: unknown): Config {
  const errors: string[] = [];

  if (raw === null || raw === undefined) {
    return mergeWithDefaults({});
  }

  if (!isPlainObject(raw)) {
    throw new CliError("Config error: configuration must be an object", {
      code: EXIT_USAGE,
    });
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      console.error(`Config warning: unknown top-level key "${key}" will be ignored`);
    }
  }

  if (raw.auth !== undefined) {
    if (!isPlainObject(raw.auth)) {
      errors.push("Config error: auth must be an object");
    } else if (raw.auth.token !== undefined && typeof raw.auth.token !== "string") {
      errors.push(`Config error: auth.token must be a string, got ${JSON.stringify(raw.auth.token)}`);
    }
  }

  if (raw.api !== undefined) {
    if (!isPlainObject(raw.api)) {
      errors.push("Config error: api must be an object");
    } else {
      const api = raw.api;
      if (api.base_url !== undefined) {
        if (!isHttpUrl(api.base_url)) {
          errors.push(`Config error: api.base_url must be an http(s) URL, got ${JSON.stringify(api.base_url)}`);
        }
      }
      if (api.timeout !== undefined) {
        if (typeof api.timeout !== "number" || !Number.isInteger(api.timeout) || api.timeout <= 0) {
          errors.push(`Config error: api.timeout must be a positive integer, got ${JSON.stringify(api.timeout)}`);
        }
      }
    }
  }

  if (raw.defaults !== undefined) {
    if (!isPlainObject(raw.defaults)) {
      errors.push("Config error: defaults must be an object");
    } else if (raw.defaults.project !== undefined && typeof raw.defaults.project !== "string") {
      errors.push(`Config error: defaults.project must be a string, got ${JSON.stringify(raw.defaults.project)}`);
    }
  }

  if (errors.length > 0) {
    throw new CliError(errors.join("\n"), { code: EXIT_USAGE });
  }

  const known: Record<string, unknown> = {};
  for (const key of KNOWN_TOP_LEVEL_KEYS) {
    if (key in raw) known[key] = raw[key];
  }
  return mergeWithDefaults(known);
}

function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

export function getConfig(): Config {
  ensureConfigDir();
  if (!existsSync(CONFIG_PATH)) return mergeWithDefaults({});
  const raw = readFileSync(CONFIG_PATH, "utf-8");
  return validateConfig(TOML.parse(raw));
}

export function saveConfig(config: Config): void {
  ensureConfigDir();
  const raw = TOML.stringify(config as unknown as TOML.JsonMap);
  writeFileSync(CONFIG_PATH, raw, "utf-8");
}

/** `LABELCTL_TOKEN`, else `auth.token` from `config` (read from disk when not given). */
export function getToken(config?: Config): string | null {
  if (process.env.LABELCTL_TOKEN) return process.env.LABELCTL_TOKEN;
  return (config ?? getConfig()).auth?.token ?? null;
}

export function setToken(token: string): void {
  const config = getConfig();
  config.auth = { ...config.auth, token };
  saveConfig(config);
}

export function requireToken(): string {
  const token = getToken();
  if (!token) {
    throw new CliError("Not authenticated. Run `labelctl auth` first.", {
      code: EXIT_AUTH,
      errorCode: ErrorCode.AUTH_FAILED,
      suggestion: "Set LABELCTL_TOKEN or run `labelctl auth` to store a personal access token.",
    });
  }
  return token;
}

// API config

export function getApiConfig(config: Config = getConfig()): ApiConfig {
  const api = config.api ?? {};
  const envBaseUrl = process.env.LABELCTL_BASE_URL;
  if (envBaseUrl && !isHttpUrl(envBaseUrl)) {
    throw new CliError(`LABELCTL_BASE_URL must be an http(s) URL, got ${JSON.stringify(envBaseUrl)}`, {
      code: EXIT_USAGE,
      errorCode: ErrorCode.VALIDATION,
      suggestion: "Use the full API root, e.g. https://gitlab.example.com/api/v4.",
    });
  }
  return {
    base_url: envBaseUrl || api.base_url || DEFAULT_BASE_URL,
    timeout: api.timeout ?? 30,
  };
}

// Defaults

export function getDefaultProject(): string | undefined {
  return getConfig().defaults?.project;
}
