/**
 * Errors raised for caller misuse.
 *
 * Degenerate geometry never throws; only malformed configuration does.
 */

import type { ZodError } from "zod";

/**
 * Custom error for validation failures.
 * Includes field name and value for debugging.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(`${field}: ${message}`);
    this.name = "ValidationError";
  }
}

/**
 * Convert the first issue of a zod failure into a ValidationError.
 * `root` names the value that was parsed and prefixes the issue path.
 */
export function fromZodError(
  error: ZodError,
  root: string,
  value: unknown,
): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError("invalid value", root, value);
  }
  const field = [root, ...issue.path.map(String)].join(".");
  return new ValidationError(issue.message, field, value);
}
