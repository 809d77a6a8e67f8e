/**
 * Error Catalog - Single Source of Truth
 *
 * Each error code maps to an HTTP status code and one of the behavioral
 * base error types. Codes follow DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE).
 * Domains: internal, validation, config, orchestration, search
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "RateLimitError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION / CONFIG ERRORS - Bad input or configuration
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid configuration",
    description: "The supplied configuration failed schema validation",
  },

  // ============================================================================
  // ORCHESTRATION ERRORS - Multi-hop plan construction and execution
  // ============================================================================
  PLAN_EMPTY: {
    domain: "orchestration",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Empty plan",
    description: "A plan requires at least one hop",
  },
  PLAN_DUPLICATE_HOP: {
    domain: "orchestration",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Duplicate hop name",
    description: "Hop names must be unique within a plan",
  },
  PLAN_UNKNOWN_DEPENDENCY: {
    domain: "orchestration",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Unknown hop dependency",
    description: "A hop depends on a name that is not declared in the plan",
  },
  PLAN_CYCLE_DETECTED: {
    domain: "orchestration",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Cycle detected",
    description: "The hop dependency graph has no topological order",
  },
  HOP_UNKNOWN_TOOL: {
    domain: "orchestration",
    httpStatus: 404,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Unknown tool",
    description: "A hop references a tool that is not registered",
  },

  // ============================================================================
  // SEARCH ERRORS - Search providers and query handling
  // ============================================================================
  SEARCH_PROVIDER_ERROR: {
    domain: "search",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Search provider error",
    description: "A search provider returned an error or unparseable response",
  },
  SEARCH_RATE_LIMITED: {
    domain: "search",
    httpStatus: 429,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Search provider rate limited",
    description: "The search provider rejected the request due to rate limiting",
  },
  SEARCH_ALL_PROVIDERS_FAILED: {
    domain: "search",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "All search providers failed",
    description: "Every configured search provider failed for the request",
  },
  SEARCH_INVALID_QUERY: {
    domain: "search",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid search query",
    description: "The search query is empty or malformed",
  },
  PAGE_FETCH_FAILED: {
    domain: "search",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Page fetch failed",
    description: "A result page could not be fetched or parsed",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
