/**
 * In-process HTTP stub for tests: a `node:http` server on 127.0.0.1 with an
 * ephemeral port, plus an ApiClient pointed at it.
 *
 *   const stub = await startStubServer();
 *   stub.on("GET", "/projects/1/labels/5", { body: { id: 5, name: "bug", color: "#ff0000" } });
 *   const labels = createLabelsModule(stub.client);
 *   ...
 *   await stub.close();
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from "node:http";
import { ApiClient, type ApiClientOptions } from "./client.ts";
import type { HttpMethod } from "./types.ts";

export const STUB_API_PREFIX = "/api/v4";
export const STUB_TOKEN = "test-token";

export interface RecordedRequest {
  method: string;
  /** Raw path without the API prefix, still percent-encoded. */
  path: string;
  query: URLSearchParams;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface StubResponse {
  status?: number;
  headers?: Record<string, string>;
  /** Objects and arrays are sent as JSON; strings are sent verbatim. */
  body?: string | object;
  /** Hold the response back this long. */
  delayMs?: number;
}

export type StubHandler = (req: RecordedRequest) => StubResponse;

export interface StubServer {
  /** Base URL including the API prefix. */
  baseUrl: string;
  /** Every request received, in arrival order. */
  requests: RecordedRequest[];
  client: ApiClient;
  on(method: HttpMethod, path: string, response: StubResponse | StubHandler): void;
  newClient(options?: ApiClientOptions): ApiClient;
  close(): Promise<void>;
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function writeResponse(res: ServerResponse, stub: StubResponse): void {
  const headers: Record<string, string> = { ...stub.headers };
  let payload: string | undefined;
  if (typeof stub.body === "string") {
    payload = stub.body;
  } else if (stub.body !== undefined) {
    payload = JSON.stringify(stub.body);
    headers["Content-Type"] ??= "application/json";
  }
  res.writeHead(stub.status ?? 200, headers);
  res.end(payload);
}

export async function startStubServer(): Promise<StubServer> {
  const routes = new Map<string, StubResponse | StubHandler>();
  const requests: RecordedRequest[] = [];
  const timers = new Set<NodeJS.Timeout>();

  const server = createServer((req, res) => {
    readBody(req).then((body) => {
      const url = new URL(req.url ?? "/", "http://127.0.0.1");
      const path = url.pathname.startsWith(STUB_API_PREFIX)
        ? url.pathname.slice(STUB_API_PREFIX.length)
        : url.pathname;
      const recorded: RecordedRequest = {
        method: req.method ?? "GET",
        path,
        query: url.searchParams,
        headers: req.headers,
        body,
      };
      requests.push(recorded);

      const route = routes.get(`${recorded.method} ${path}`);
      const stub: StubResponse = route === undefined
        ? { status: 404, body: { message: "404 Not Found" } }
        : typeof route === "function" ? route(recorded) : route;

      if (stub.delayMs) {
        const timer = setTimeout(() => {
          timers.delete(timer);
          writeResponse(res, stub);
        }, stub.delayMs);
        timers.add(timer);
      } else {
        writeResponse(res, stub);
      }
    }, (err: unknown) => {
      res.writeHead(500);
      res.end(String(err));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("stub server is not listening on a TCP port");
  }
  const baseUrl = `http://127.0.0.1:${address.port}${STUB_API_PREFIX}`;

  const newClient = (options: ApiClientOptions = {}): ApiClient =>
    new ApiClient({ baseUrl, token: STUB_TOKEN, timeout: 5000, ...options });

  return {
    baseUrl,
    requests,
    client: newClient(),
    on(method, path, response) {
      routes.set(`${method} ${path}`, response);
    },
    newClient,
    close() {
      for (const timer of timers) clearTimeout(timer);
      timers.clear();
      server.closeAllConnections();
      return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
