/**
 * @sift/errors
 *
 * Shared error taxonomy for the sift search toolkit.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isSiftError, SiftError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError } from "./bases/internal-error.js";
export { ValidationError } from "./bases/validation-error.js";

export type {
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  RateLimitCodes,
  SiftErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isExpectedError, isInternalError, isValidationError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { ConfigInvalidError, type SchemaIssue, toValidationIssues } from "./config.js";
export {
  OrchestrationError,
  PlanCycleError,
  type PlanValidationCode,
  PlanValidationError,
  UnknownToolError,
} from "./orchestration.js";
export {
  PageFetchError,
  SearchAllProvidersFailedError,
  SearchInvalidQueryError,
  SearchProviderError,
  SearchRateLimitedError,
  WebSearchError,
} from "./web-search.js";
