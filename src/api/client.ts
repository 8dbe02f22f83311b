import { getApiConfig, getConfig, getToken, type Config } from "../config/index.ts";
import { getLogger } from "../utils/logger.ts";
import { ApiError, DecodeError, NetworkError } from "./errors.ts";
import type { ApiResult, HttpMethod, Pagination, QueryValue, ResponseMeta } from "./types.ts";

/** Statuses the API uses for success. 304 comes back from idempotent actions that changed nothing. */
const SUCCESS_STATUSES = new Set([200, 201, 202, 204, 304]);

const log = getLogger("api");

/** Remove keys with undefined values from an object before sending to the API. */
export function stripUndefined(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/** Check if an error is a network/connectivity error. */
function isNetworkError(err: unknown): boolean {
  if (err instanceof TypeError) return true;
  if (err instanceof Error && err.message.includes("fetch failed")) return true;
  return false;
}

/** Check if an error is a timeout abort. */
function isTimeoutError(err: unknown): boolean {
  if (err instanceof Error && err.name === "AbortError") return true;
  return false;
}

function headerInt(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

export function parsePagination(headers: Headers): Pagination {
  return {
    totalItems: headerInt(headers, "X-Total"),
    totalPages: headerInt(headers, "X-Total-Pages"),
    itemsPerPage: headerInt(headers, "X-Per-Page"),
    currentPage: headerInt(headers, "X-Page"),
    nextPage: headerInt(headers, "X-Next-Page"),
    previousPage: headerInt(headers, "X-Prev-Page"),
  };
}

/**
 * Flatten the `message` of an error body into one line.
 * `{"name": ["has already been taken"]}` becomes `{name: [has already been taken]}`.
 */
export function flattenErrorDetail(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (typeof raw === "number" || typeof raw === "boolean") return String(raw);
  if (Array.isArray(raw)) return `[${raw.map(flattenErrorDetail).join(", ")}]`;
  if (typeof raw === "object" && raw !== null) {
    return Object.entries(raw)
      .map(([key, value]) => `{${key}: ${flattenErrorDetail(value)}}`)
      .sort()
      .join(", ");
  }
  return String(raw);
}

function errorDetail(bodyText: string, statusText: string): string {
  if (!bodyText) return statusText;
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return bodyText;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return bodyText;
  if ("error" in parsed && typeof parsed.error === "string") {
    const description = "error_description" in parsed && typeof parsed.error_description === "string"
      ? parsed.error_description
      : undefined;
    return description ? `${parsed.error}: ${description}` : parsed.error;
  }
  if ("message" in parsed && parsed.message !== undefined) return flattenErrorDetail(parsed.message);
  return bodyText;
}

/** Turns parsed JSON into a typed value, throwing when the shape is wrong. */
export type Decoder<T> = (raw: unknown) => T;

export interface RawResult {
  response: ResponseMeta;
  body: string;
}

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: object;
}

export interface ApiClientOptions {
  /** Base URL of the API including the version prefix (default: config `api.base_url`) */
  baseUrl?: string;
  /** Personal access token (default: `LABELCTL_TOKEN` or config `auth.token`) */
  token?: string;
  /** Request timeout in milliseconds (default: config `api.timeout`) */
  timeout?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

interface Settings {
  baseUrl: string;
  timeoutMs: number;
  token: string | null;
}

export class ApiClient {
  private readonly options: ApiClientOptions;

  constructor(options: ApiClientOptions = {}) {
    this.options = options;
  }

  /** Constructor options, with the config file read at most once for whatever they leave out. */
  private settings(): Settings {
    let config: Config | undefined;
    const loaded = (): Config => (config ??= getConfig());
    const { baseUrl, timeout, token } = this.options;
    return {
      baseUrl: (baseUrl ?? getApiConfig(loaded()).base_url).replace(/\/+$/, ""),
      timeoutMs: timeout ?? getApiConfig(loaded()).timeout * 1000,
      token: token ?? getToken(loaded()),
    };
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    return this.urlFor(this.settings().baseUrl, path, query);
  }

  private urlFor(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
    let url = `${baseUrl}${path}`;
    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) params.append(key, String(value));
      }
      const qs = params.toString();
      if (qs) url += `?${qs}`;
    }
    return url;
  }

  /**
   * Issue one request and return the raw body with response metadata.
   * Throws {@link NetworkError} when no response arrives and {@link ApiError}
   * on a non-success status.
   */
  async send(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<RawResult> {
    const { baseUrl, timeoutMs, token } = this.settings();
    const url = this.urlFor(baseUrl, path, opts.query);
    const headers: Record<string, string> = { Accept: "application/json" };
    if (token) headers["PRIVATE-TOKEN"] = token;
    let body: string | undefined;
    if (opts.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(stripUndefined(opts.body));
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const fetchImpl = this.options.fetch ?? fetch;

    log.debug(`${method} ${url}`);

    let res: Response;
    let text: string;
    try {
      res = await fetchImpl(url, { method, headers, body, signal: controller.signal });
      text = await res.text();
    } catch (err) {
      if (isTimeoutError(err)) {
        log.warn(`${method} ${url} timed out after ${timeoutMs}ms`);
        throw new NetworkError({
          method,
          url,
          message: `Request timed out after ${timeoutMs / 1000}s`,
          cause: err,
        });
      }
      if (isNetworkError(err)) {
        log.warn(`${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`);
        throw new NetworkError({
          method,
          url,
          message: `Network error: unable to reach ${url}. Check your connection.`,
          cause: err,
        });
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }

    const response: ResponseMeta = {
      status: res.status,
      statusText: res.statusText,
      url: res.url || url,
      headers: res.headers,
      pagination: parsePagination(res.headers),
    };

    log.debug(`${method} ${url} -> ${res.status}`);

    if (!SUCCESS_STATUSES.has(res.status)) {
      const detail = errorDetail(text, res.statusText);
      log.error(`${method} ${url} -> ${res.status}`, detail);
      throw new ApiError({ method, detail, body: text, response });
    }

    return { response, body: text };
  }

  /** Decode a raw body, wrapping JSON and shape failures in {@link DecodeError}. */
  decode<T>(raw: RawResult, decoder: Decoder<T>): T {
    const fail = (message: string, cause?: unknown): never => {
      log.error(`${raw.response.url} (status ${raw.response.status}): ${message}`, raw.body);
      throw new DecodeError({ message, body: raw.body, response: raw.response, cause });
    };

    if (!raw.body) return fail(`Empty response body (status ${raw.response.status})`);
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.body);
    } catch (err) {
      return fail(`Invalid JSON in response: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    try {
      return decoder(parsed);
    } catch (err) {
      return fail(`Unexpected response shape: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  async request<T>(
    method: HttpMethod,
    path: string,
    decoder: Decoder<T>,
    opts?: RequestOptions,
  ): Promise<ApiResult<T>> {
    const raw = await this.send(method, path, opts);
    return { data: this.decode(raw, decoder), response: raw.response };
  }

  get<T>(path: string, decoder: Decoder<T>, query?: Record<string, QueryValue>): Promise<ApiResult<T>> {
    return this.request("GET", path, decoder, { query });
  }

  post<T>(path: string, decoder: Decoder<T>, body?: object): Promise<ApiResult<T>> {
    return this.request("POST", path, decoder, { body });
  }

  put<T>(path: string, decoder: Decoder<T>, body?: object): Promise<ApiResult<T>> {
    return this.request("PUT", path, decoder, { body });
  }

  async del(path: string, body?: object): Promise<ResponseMeta> {
    const { response } = await this.send("DELETE", path, { body });
    return response;
  }
}

export const api = new ApiClient();
