import { api, type ApiClient } from "./client.ts";
import { pathSegment, type IdLike } from "./id.ts";
import type {
  ApiResult,
  CreateLabelOptions,
  DeleteLabelOptions,
  Label,
  ListLabelsOptions,
  QueryValue,
  ResponseMeta,
  UpdateLabelOptions,
} from "./types.ts";

// ── Decoding ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredInteger(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new TypeError(`label.${key} must be an integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function requiredString(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  if (typeof value !== "string") {
    throw new TypeError(`label.${key} must be a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

/** Missing and null both read as "not set". */
function optional<T>(
  raw: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!guard(value)) {
    throw new TypeError(`label.${key} must be ${expected}, got ${JSON.stringify(value)}`);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isInteger = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

export function decodeLabel(raw: unknown): Label {
  if (!isRecord(raw)) {
    throw new TypeError(`expected a label object, got ${JSON.stringify(raw)}`);
  }

  const label: Label = {
    id: requiredInteger(raw, "id"),
    name: requiredString(raw, "name"),
    color: requiredString(raw, "color"),
    open_issues_count: optional(raw, "open_issues_count", isInteger, "an integer") ?? 0,
    closed_issues_count: optional(raw, "closed_issues_count", isInteger, "an integer") ?? 0,
    open_merge_requests_count: optional(raw, "open_merge_requests_count", isInteger, "an integer") ?? 0,
    subscribed: optional(raw, "subscribed", isBoolean, "a boolean") ?? false,
  };

  const textColor = optional(raw, "text_color", isString, "a string");
  if (textColor !== undefined) label.text_color = textColor;
  const description = optional(raw, "description", isString, "a string");
  if (description !== undefined) label.description = description;
  const priority = optional(raw, "priority", isInteger, "an integer");
  if (priority !== undefined) label.priority = priority;
  const isProjectLabel = optional(raw, "is_project_label", isBoolean, "a boolean");
  if (isProjectLabel !== undefined) label.is_project_label = isProjectLabel;

  return label;
}

export function decodeLabels(raw: unknown): Label[] {
  if (!Array.isArray(raw)) {
    throw new TypeError(`expected an array of labels, got ${JSON.stringify(raw)}`);
  }
  return raw.map(decodeLabel);
}

// ── Requests ──

function toQuery(opts: object | undefined): Record<string, QueryValue> {
  const query: Record<string, QueryValue> = {};
  if (!opts) return query;
  for (const [key, value] of Object.entries(opts)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      query[key] = value;
    }
  }
  return query;
}

function labelsPath(pid: IdLike): string {
  return `/projects/${pathSegment(pid)}/labels`;
}

function labelPath(pid: IdLike, labelId: IdLike): string {
  return `${labelsPath(pid)}/${pathSegment(labelId)}`;
}

export interface LabelsModule {
  /** `GET /projects/:id/labels`. Page options pass through as query parameters. */
  list(pid: IdLike, opts?: ListLabelsOptions): Promise<ApiResult<Label[]>>;
  get(pid: IdLike, labelId: IdLike): Promise<ApiResult<Label>>;
  create(pid: IdLike, opts: CreateLabelOptions): Promise<ApiResult<Label>>;
  update(pid: IdLike, labelId: IdLike, opts: UpdateLabelOptions): Promise<ApiResult<Label>>;
  delete(pid: IdLike, labelId: IdLike, opts?: DeleteLabelOptions): Promise<ResponseMeta>;
  /** Resolves with `data: null` when the server answers 304 (already subscribed). */
  subscribe(pid: IdLike, labelId: IdLike): Promise<ApiResult<Label | null>>;
  unsubscribe(pid: IdLike, labelId: IdLike): Promise<ResponseMeta>;
  /** Turn a project label into a group label. */
  promote(pid: IdLike, labelId: IdLike): Promise<ResponseMeta>;
}

export function createLabelsModule(client: ApiClient = api): LabelsModule {
  return {
    async list(pid, opts) {
      return client.get(labelsPath(pid), decodeLabels, toQuery(opts));
    },
    async get(pid, labelId) {
      return client.get(labelPath(pid, labelId), decodeLabel);
    },
    async create(pid, opts) {
      return client.post(labelsPath(pid), decodeLabel, opts);
    },
    async update(pid, labelId, opts) {
      return client.put(labelPath(pid, labelId), decodeLabel, opts);
    },
    async delete(pid, labelId, opts) {
      return client.del(labelPath(pid, labelId), opts);
    },
    async subscribe(pid, labelId) {
      const raw = await client.send("POST", `${labelPath(pid, labelId)}/subscribe`);
      if (raw.response.status === 304) return { data: null, response: raw.response };
      return { data: client.decode(raw, decodeLabel), response: raw.response };
    },
    async unsubscribe(pid, labelId) {
      const { response } = await client.send("POST", `${labelPath(pid, labelId)}/unsubscribe`);
      return response;
    },
    async promote(pid, labelId) {
      const { response } = await client.send("PUT", `${labelPath(pid, labelId)}/promote`);
      return response;
    },
  };
}

export const labels = createLabelsModule();
