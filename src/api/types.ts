// ── Labels ──

export interface Label {
  id: number;
  name: string;
  color: string;
  text_color?: string;
  description?: string;
  open_issues_count: number;
  closed_issues_count: number;
  open_merge_requests_count: number;
  subscribed: boolean;
  priority?: number;
  is_project_label?: boolean;
}

// Options: an `undefined` field is left out of the request, anything else
// (including 0, false, "" and null) is sent as given.

export interface CreateLabelOptions {
  name: string;
  /** `#RRGGBB`, `#RGB`, or a CSS color name. */
  color: string;
  description?: string;
  priority?: number;
}

export interface UpdateLabelOptions {
  new_name?: string;
  color?: string;
  /** `null` clears the description. */
  description?: string | null;
  /** `null` removes the label's priority. */
  priority?: number | null;
}

export interface DeleteLabelOptions {
  name?: string;
}

export interface ListOptions {
  page?: number;
  per_page?: number;
}

export interface ListLabelsOptions extends ListOptions {
  with_counts?: boolean;
  include_ancestor_groups?: boolean;
  search?: string;
}

// ── Transport ──

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface Pagination {
  totalItems?: number;
  totalPages?: number;
  itemsPerPage?: number;
  currentPage?: number;
  nextPage?: number;
  previousPage?: number;
}

export interface ResponseMeta {
  status: number;
  statusText: string;
  url: string;
  headers: Headers;
  pagination: Pagination;
}

export interface ApiResult<T> {
  data: T;
  response: ResponseMeta;
}
