import { SiftError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import type { SiftErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends SiftError {
  readonly _tag = "ValidationError" as const;
  readonly code: ValidationCodes;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(
    options: SiftErrorOptions<ValidationCodes> & { issues?: readonly ValidationIssue[] },
  );
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions:
      | string
      | (SiftErrorOptions<ValidationCodes> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "VALIDATION_FAILED" as const,
            message: messageOrOptions,
            issues,
            metadata,
            traceId,
            cause: undefined,
          }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = opts.issues ?? [];
  }
}
