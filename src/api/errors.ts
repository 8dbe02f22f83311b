import type { ResponseMeta } from "./types.ts";

/** Thrown before any request when a resource identifier has the wrong shape. */
export class InvalidIdError extends Error {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`invalid ID type ${describeValue(value)}, the ID must be an int or a string`);
    this.name = "InvalidIdError";
    this.value = value;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value === undefined) return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/** The request never produced a response: connection failure, DNS, or timeout. */
export class NetworkError extends Error {
  readonly method: string;
  readonly url: string;

  constructor(opts: { method: string; url: string; message: string; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = "NetworkError";
    this.method = opts.method;
    this.url = opts.url;
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
  readonly url: string;
  readonly method: string;
  /** Server-supplied detail, flattened to one line. */
  readonly detail: string;
  readonly response: ResponseMeta;

  constructor(opts: { method: string; detail: string; body: string; response: ResponseMeta }) {
    super(`${opts.method} ${opts.response.url}: ${opts.response.status} ${opts.detail}`);
    this.name = "ApiError";
    this.status = opts.response.status;
    this.statusText = opts.response.statusText;
    this.body = opts.body;
    this.url = opts.response.url;
    this.method = opts.method;
    this.detail = opts.detail;
    this.response = opts.response;
  }

  isNotFound(): boolean {
    return this.status === 404;
  }

  isUnauthorized(): boolean {
    return this.status === 401 || this.status === 403;
  }

  isRateLimited(): boolean {
    return this.status === 429;
  }

  isServerError(): boolean {
    return this.status >= 500;
  }
}

/** The server answered with a success status but the body did not decode. */
export class DecodeError extends Error {
  readonly body: string;
  readonly response: ResponseMeta;

  constructor(opts: { message: string; body: string; response: ResponseMeta; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = "DecodeError";
    this.body = opts.body;
    this.response = opts.response;
  }
}
