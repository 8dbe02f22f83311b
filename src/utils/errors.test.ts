import { describe, test, expect } from "vitest";
import { ApiError, DecodeError, InvalidIdError, NetworkError } from "../api/errors.ts";
import type { ResponseMeta } from "../api/types.ts";
import {
  CliError,
  ErrorCode,
  EXIT_AUTH,
  EXIT_NETWORK,
  EXIT_NOT_FOUND,
  EXIT_USAGE,
  didYouMean,
  wrapApiError,
} from "./errors.ts";

function meta(status: number, headers: Record<string, string> = {}): ResponseMeta {
  return {
    status,
    statusText: "",
    url: "https://gitlab.example.com/api/v4/projects/1/labels",
    headers: new Headers(headers),
    pagination: {},
  };
}

function apiError(status: number, detail: string, headers?: Record<string, string>): ApiError {
  return new ApiError({ method: "GET", detail, body: "", response: meta(status, headers) });
}

describe("wrapApiError", () => {
  test("passes CliError through", () => {
    const err = new CliError("already wrapped", { code: 7 });
    expect(wrapApiError(err)).toBe(err);
  });

  test("maps an invalid identifier to a usage error", () => {
    const wrapped = wrapApiError(new InvalidIdError(1.5));
    expect(wrapped.code).toBe(EXIT_USAGE);
    expect(wrapped.errorCode).toBe(ErrorCode.VALIDATION);
    expect(wrapped.message).toBe("invalid ID type 1.5, the ID must be an int or a string");
  });

  test.each([
    [401, EXIT_AUTH, ErrorCode.AUTH_FAILED],
    [403, EXIT_AUTH, ErrorCode.AUTH_FAILED],
    [404, EXIT_NOT_FOUND, ErrorCode.NOT_FOUND],
    [429, EXIT_NETWORK, ErrorCode.RATE_LIMITED],
    [502, EXIT_NETWORK, ErrorCode.NETWORK],
    [422, 1, ErrorCode.VALIDATION],
    [418, 1, ErrorCode.UNKNOWN],
  ])("maps HTTP %i", (status, code, errorCode) => {
    const wrapped = wrapApiError(apiError(status, "detail"));
    expect(wrapped.code).toBe(code);
    expect(wrapped.errorCode).toBe(errorCode);
  });

  test("keeps the server detail for not-found errors", () => {
    expect(wrapApiError(apiError(404, "404 Label Not Found")).message).toBe("Not found: 404 Label Not Found");
  });

  test("reads Retry-After into the hint", () => {
    const wrapped = wrapApiError(apiError(429, "Too Many Requests", { "Retry-After": "30" }));
    expect(wrapped.suggestion).toBe("The server asks to retry after 30 seconds.");
  });

  test("maps transport and decode failures", () => {
    const network = wrapApiError(new NetworkError({ method: "GET", url: "https://x", message: "Request timed out after 30s" }));
    expect(network.code).toBe(EXIT_NETWORK);
    expect(network.message).toBe("Request timed out after 30s");

    const decode = wrapApiError(new DecodeError({ message: "Empty response body (status 200)", body: "", response: meta(200) }));
    expect(decode.errorCode).toBe(ErrorCode.DECODE);
    expect(decode.message).toBe("Could not read the server response: Empty response body (status 200)");
  });

  test("wraps anything else as unknown", () => {
    const wrapped = wrapApiError("plain string");
    expect(wrapped.code).toBe(1);
    expect(wrapped.message).toBe("plain string");
  });
});

describe("didYouMean", () => {
  test("suggests the closest command", () => {
    expect(didYouMean("lable", ["label", "auth", "config"])).toBe("label");
  });

  test("returns null when nothing is close", () => {
    expect(didYouMean("deploy", ["label", "auth"])).toBeNull();
  });
});
