import { parseId, type Identifier } from "../api/id.ts";
import { getDefaultProject } from "../config/index.ts";
import { CliError, ErrorCode, EXIT_USAGE } from "./errors.ts";

const NAME_PREFIX = "name:";

/**
 * Read a command-line argument as an identifier. All-digit arguments are
 * numeric IDs; anything else is a path or name. `name:2024` forces a name.
 */
export function parseIdArg(raw: string): Identifier {
  const trimmed = raw.trim();
  if (trimmed.startsWith(NAME_PREFIX)) return parseId(trimmed.slice(NAME_PREFIX.length));
  if (/^\d+$/.test(trimmed)) return parseId(Number(trimmed));
  return parseId(trimmed);
}

/** The `--project` value, falling back to `defaults.project` from the config file. */
export function resolveProjectArg(project: string | undefined): Identifier {
  const value = project ?? getDefaultProject();
  if (!value) {
    throw new CliError("No project given.", {
      code: EXIT_USAGE,
      errorCode: ErrorCode.VALIDATION,
      suggestion: "Pass --project <id-or-path> or set defaults.project in the config file.",
    });
  }
  return parseIdArg(value);
}
