import { InvalidIdError } from "./errors.ts";

/**
 * A resource address: either a numeric ID or a textual path/name such as
 * `group/project` or `kind/bug`.
 */
export type Identifier =
  | { kind: "id"; value: number }
  | { kind: "path"; value: string };

/** Anything the API functions accept where a resource is addressed. */
export type IdLike = number | string | Identifier;

function isIdentifier(input: unknown): input is Identifier {
  if (typeof input !== "object" || input === null) return false;
  if (!("kind" in input) || !("value" in input)) return false;
  return (input.kind === "id" && typeof input.value === "number") ||
    (input.kind === "path" && typeof input.value === "string");
}

/**
 * Validate and tag an identifier. Integers become `id`, non-empty strings
 * become `path`; anything else throws {@link InvalidIdError}.
 */
export function parseId(input: unknown): Identifier {
  if (isIdentifier(input)) return parseId(input.value);
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input)) throw new InvalidIdError(input);
    return { kind: "id", value: input };
  }
  if (typeof input === "string") {
    if (input.length === 0) throw new InvalidIdError(input);
    return { kind: "path", value: input };
  }
  throw new InvalidIdError(input);
}

/**
 * Render an identifier as a single, escaped URL path segment. Dots are
 * escaped too, so `v1.json` is not read as a `.json` format suffix.
 */
export function pathSegment(input: unknown): string {
  const id = parseId(input);
  switch (id.kind) {
    case "id": return String(id.value);
    case "path": return encodeURIComponent(id.value).replace(/\./g, "%2E");
  }
}
