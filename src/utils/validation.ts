/**
 * Input validation for CLI commands.
 * Each validator returns an error message string, or null if the input is valid.
 */

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
const COLOR_WORD = /^[a-zA-Z]+$/;

/** Label names: non-empty, at most 255 chars, no commas (they separate labels in issue filters). */
export function validateLabelName(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return "Label name cannot be empty.";
  }
  if (trimmed.length > 255) {
    return `Label name is too long (${trimmed.length} chars). Maximum is 255 characters.`;
  }
  if (trimmed.includes(",")) {
    return `Label name cannot contain a comma: "${trimmed}".`;
  }
  return null;
}

/** `#RGB`, `#RRGGBB`, or a CSS color word such as `red`. */
export function validateColor(value: string): string | null {
  if (HEX_COLOR.test(value) || COLOR_WORD.test(value)) return null;
  return `Invalid color: "${value}". Use a hex code like #FF0000 or a CSS color name.`;
}

/** Priority: a non-negative integer, lower is more important. */
export function validatePriority(value: number): string | null {
  if (!Number.isInteger(value) || value < 0) {
    return `Invalid priority: ${value}. Must be a non-negative integer.`;
  }
  return null;
}

/** Positive integer for page/per-page options. */
export function validatePositiveInt(value: number, flag: string): string | null {
  if (!Number.isInteger(value) || value <= 0) {
    return `Invalid ${flag}: ${value}. Must be a positive integer.`;
  }
  return null;
}
