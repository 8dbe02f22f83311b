// Barrel export for the API layer.

// Client
export { ApiClient, api, stripUndefined, parsePagination, flattenErrorDetail } from "./client.ts";
export type { ApiClientOptions, Decoder, RawResult, RequestOptions } from "./client.ts";

// Errors
export { ApiError, DecodeError, InvalidIdError, NetworkError } from "./errors.ts";

// Identifiers
export { parseId, pathSegment } from "./id.ts";
export type { Identifier, IdLike } from "./id.ts";

// Labels
export { createLabelsModule, decodeLabel, decodeLabels, labels } from "./labels.ts";
export type { LabelsModule } from "./labels.ts";

// Types
export type {
  Label,
  CreateLabelOptions,
  UpdateLabelOptions,
  DeleteLabelOptions,
  ListOptions,
  ListLabelsOptions,
  HttpMethod,
  QueryValue,
  Pagination,
  ResponseMeta,
  ApiResult,
} from "./types.ts";
