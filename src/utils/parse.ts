/**
 * String parsing helpers for environment values.
 */

const TRUE_VALUES = new Set(["y", "yes", "t", "true", "on", "1"]);
const FALSE_VALUES = new Set(["n", "no", "f", "false", "off", "0"]);

/**
 * Convert a string representation of truth to a boolean.
 *
 * True values are y, yes, t, true, on and 1; false values are
 * n, no, f, false, off and 0. Case-insensitive.
 *
 * @throws Error on any other value
 */
export function parseBoolean(value: string): boolean {
  const lower = value.trim().toLowerCase();
  if (TRUE_VALUES.has(lower)) {
    return true;
  }
  if (FALSE_VALUES.has(lower)) {
    return false;
  }
  throw new Error(`invalid truth value "${lower}"`);
}

/**
 * Split a `NAME=VALUE` assignment. Only the first `=` separates; the value may
 * contain further `=` characters and may be empty.
 *
 * @returns Name and value, or null when there is no `=` or no name
 */
export function parseAssignment(
  assignment: string,
): { name: string; value: string } | null {
  const index = assignment.indexOf("=");
  if (index <= 0) {
    return null;
  }
  return {
    name: assignment.slice(0, index).trim(),
    value: assignment.slice(index + 1),
  };
}
