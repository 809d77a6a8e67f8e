/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { SiftError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is an InternalError (bug/unexpected condition) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a SiftError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: SiftError,
  code: C,
): error is SiftError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for values that carry no `isExpected` flag.
 */
export function isExpectedError(error: unknown): boolean {
  if (error !== null && typeof error === "object" && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
