import { describe, test, expect, vi } from "vitest";
import { readFileSync } from "fs";
import { LOG_FILE } from "../utils/logger.ts";
import { ApiClient, flattenErrorDetail, parsePagination, stripUndefined } from "./client.ts";
import { ApiError, DecodeError, NetworkError } from "./errors.ts";
import { startStubServer } from "./testing.ts";

const BASE_URL = "https://gitlab.example.com/api/v4";

function fakeFetch(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

describe("stripUndefined", () => {
  test("drops only undefined values", () => {
    expect(stripUndefined({ a: undefined, b: null, c: 0, d: false, e: "" })).toEqual({
      b: null,
      c: 0,
      d: false,
      e: "",
    });
  });
});

describe("flattenErrorDetail", () => {
  test("keeps plain strings", () => {
    expect(flattenErrorDetail("403 Forbidden")).toBe("403 Forbidden");
  });

  test("flattens nested field errors sorted by field", () => {
    expect(flattenErrorDetail({ title: ["is missing"], base: ["x", "y"] })).toBe("{base: [x, y]}, {title: [is missing]}");
  });
});

describe("parsePagination", () => {
  test("reads the pagination headers", () => {
    const headers = new Headers({ "X-Total": "42", "X-Page": "2", "X-Prev-Page": "1", "X-Next-Page": "3" });
    expect(parsePagination(headers)).toEqual({
      totalItems: 42,
      currentPage: 2,
      previousPage: 1,
      nextPage: 3,
    });
  });

  test("ignores headers that are not numbers", () => {
    expect(parsePagination(new Headers({ "X-Total": "many" })).totalItems).toBeUndefined();
  });
});

describe("ApiClient", () => {
  test("builds URLs without undefined query values", () => {
    const client = new ApiClient({ baseUrl: `${BASE_URL}/`, token: "test-secret" });
    expect(client.buildUrl("/projects/1/labels", { page: 2, search: undefined, with_counts: true })).toBe(
      `${BASE_URL}/projects/1/labels?page=2&with_counts=true`,
    );
    expect(client.buildUrl("/projects/1/labels", {})).toBe(`${BASE_URL}/projects/1/labels`);
  });

  test("sends the token and a JSON body through the injected fetch", async () => {
    const fetch = fakeFetch(() => new Response(`{"id":1}`, { status: 201 }));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    const { data, response } = await client.post("/projects/1/labels", (raw) => raw, { name: "a", color: undefined });

    expect(data).toEqual({ id: 1 });
    expect(response.status).toBe(201);
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0]!;
    expect(url).toBe(`${BASE_URL}/projects/1/labels`);
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(`{"name":"a"}`);
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "PRIVATE-TOKEN": "test-secret",
      "Content-Type": "application/json",
    });
  });

  test("omits the token header when no token is known", async () => {
    const fetch = fakeFetch(() => new Response("[]", { status: 200 }));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "", fetch });

    await client.get("/projects/1/labels", (raw) => raw);

    expect(fetch.mock.calls[0]![1]?.headers).toEqual({ Accept: "application/json" });
  });

  test("uses the error field of OAuth-style error bodies", async () => {
    const fetch = fakeFetch(() => new Response(
      `{"error":"invalid_token","error_description":"Token was revoked."}`,
      { status: 401, statusText: "Unauthorized" },
    ));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    const err = await client.get("/projects/1/labels", (raw) => raw).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    if (!(err instanceof ApiError)) return;
    expect(err.detail).toBe("invalid_token: Token was revoked.");
    expect(err.isUnauthorized()).toBe(true);
    expect(err.body).toBe(`{"error":"invalid_token","error_description":"Token was revoked."}`);
  });

  test("falls back to the status text for an empty error body", async () => {
    const fetch = fakeFetch(() => new Response(null, { status: 503, statusText: "Service Unavailable" }));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    await expect(client.del("/projects/1/labels/1")).rejects.toMatchObject({
      status: 503,
      detail: "Service Unavailable",
    });
  });

  test("treats an empty success body as a decode error", async () => {
    const fetch = fakeFetch(() => new Response(null, { status: 204 }));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    const err = await client.get("/projects/1/labels/1", (raw) => raw).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DecodeError);
    if (!(err instanceof DecodeError)) return;
    expect(err.message).toBe("Empty response body (status 204)");
  });

  test("wraps a refused connection in NetworkError", async () => {
    const stub = await startStubServer();
    const client = stub.newClient();
    await stub.close();

    const err = await client.send("GET", "/projects/1/labels").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    if (!(err instanceof NetworkError)) return;
    expect(err.method).toBe("GET");
    expect(err.url).toBe(`${stub.baseUrl}/projects/1/labels`);
    expect(err.message).toBe(`Network error: unable to reach ${stub.baseUrl}/projects/1/labels. Check your connection.`);
  });

  test("reports a base URL without a scheme as NetworkError", async () => {
    const client = new ApiClient({ baseUrl: "gitlab.example.com/api/v4", token: "test-secret" });

    const err = await client.send("GET", "/projects/1/labels").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    if (!(err instanceof NetworkError)) return;
    expect(err.url).toBe("gitlab.example.com/api/v4/projects/1/labels");
    expect(err.message).toBe(
      "Network error: unable to reach gitlab.example.com/api/v4/projects/1/labels. Check your connection.",
    );
  });

  test("logs failed statuses with the server's detail", async () => {
    const project = `log-${Date.now()}`;
    const fetch = fakeFetch(() => new Response(`{"message":"404 Project Not Found"}`, { status: 404 }));
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    await expect(client.get(`/projects/${project}/labels`, (raw) => raw)).rejects.toBeInstanceOf(ApiError);

    const lines = readFileSync(LOG_FILE, "utf-8").split("\n");
    const i = lines.findIndex((line) => line.includes(`/projects/${project}/labels`));
    expect(lines[i]).toMatch(new RegExp(`\\[ERROR\\] \\[api\\] GET ${BASE_URL}/projects/${project}/labels -> 404$`));
    expect(lines[i + 1]).toBe("  404 Project Not Found");
  });

  test("gives up after the timeout", async () => {
    const stub = await startStubServer();
    stub.on("GET", "/projects/1/labels", { delayMs: 2000, body: [] });
    const client = stub.newClient({ timeout: 50 });

    try {
      await expect(client.send("GET", "/projects/1/labels")).rejects.toThrow("Request timed out after 0.05s");
    } finally {
      await stub.close();
    }
  });

  test("rethrows errors that are not transport failures", async () => {
    const boom = new RangeError("boom");
    const fetch = vi.fn(async () => {
      throw boom;
    });
    const client = new ApiClient({ baseUrl: BASE_URL, token: "test-secret", fetch });

    await expect(client.send("GET", "/user")).rejects.toBe(boom);
  });
});
