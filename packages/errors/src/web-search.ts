/**
 * Web search errors: search providers, query handling and page fetching
 *
 * Abstract base: WebSearchError
 * Concrete:
 *   - SearchProviderError           (SEARCH_PROVIDER_ERROR)
 *   - SearchRateLimitedError        (SEARCH_RATE_LIMITED)
 *   - SearchAllProvidersFailedError (SEARCH_ALL_PROVIDERS_FAILED)
 *   - SearchInvalidQueryError       (SEARCH_INVALID_QUERY)
 *   - PageFetchError                (PAGE_FETCH_FAILED)
 */

import { SiftError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class WebSearchError extends SiftError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class SearchProviderError extends WebSearchError {
  readonly _tag = "ExternalError" as const;
  readonly code = "SEARCH_PROVIDER_ERROR" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly providerId: string;
  /** Failure description without the provider prefix */
  readonly reason: string;

  constructor(providerId: string, message: string, cause?: Error) {
    super(
      `Search provider "${providerId}" error: ${message}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.SEARCH_PROVIDER_ERROR;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.providerId = providerId;
    this.reason = message;
  }
}

export class SearchRateLimitedError extends WebSearchError {
  readonly _tag = "RateLimitError" as const;
  readonly code = "SEARCH_RATE_LIMITED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly providerId: string;

  constructor(providerId: string) {
    super(`Search provider "${providerId}" rate limited`);
    const entry = ERROR_CATALOG.SEARCH_RATE_LIMITED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.providerId = providerId;
  }
}

export class SearchAllProvidersFailedError extends WebSearchError {
  readonly _tag = "ExternalError" as const;
  readonly code = "SEARCH_ALL_PROVIDERS_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly failedProviders: readonly string[];

  constructor(failedProviders: readonly string[], lastError?: Error) {
    super(
      `All search providers failed: [${failedProviders.join(", ")}]${lastError ? `. Last error: ${lastError.message}` : ""}`,
      undefined,
      undefined,
      lastError ? { cause: lastError } : undefined,
    );
    const entry = ERROR_CATALOG.SEARCH_ALL_PROVIDERS_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.failedProviders = failedProviders;
  }
}

export class SearchInvalidQueryError extends WebSearchError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SEARCH_INVALID_QUERY" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly query: string;

  constructor(query: string, reason?: string) {
    super(
      `Invalid search query: ${query ? `"${query}"` : "empty query"}${reason ? ` (${reason})` : ""}`,
    );
    const entry = ERROR_CATALOG.SEARCH_INVALID_QUERY;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.query = query;
  }
}

export class PageFetchError extends WebSearchError {
  readonly _tag = "ExternalError" as const;
  readonly code = "PAGE_FETCH_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly url: string;

  constructor(url: string, message: string, cause?: Error) {
    super(`Failed to fetch "${url}": ${message}`, undefined, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.PAGE_FETCH_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.url = url;
  }
}
