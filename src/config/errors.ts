/**
 * Configuration error types.
 */

import type { ZodError } from "zod";

/**
 * Configuration load error.
 */
export class ConfigLoadError extends Error {
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "ConfigLoadError";
    this.cause = cause;
  }
}

/**
 * Configuration validation error. A malformed source is still a load
 * failure, so this extends ConfigLoadError.
 */
export class ConfigValidationError extends ConfigLoadError {
  constructor(
    message: string,
    public readonly zodError: ZodError,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Build a ConfigValidationError listing every issue by field path.
 *
 * @param heading - First line of the message
 * @param zodError - Failed parse result
 */
export function toValidationError(
  heading: string,
  zodError: ZodError,
): ConfigValidationError {
  const issues = zodError.issues
    .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
  return new ConfigValidationError(`${heading}:\n${issues}`, zodError);
}
