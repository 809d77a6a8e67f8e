import { SiftError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import type { InternalCodes, SiftErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or unexpected conditions.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError extends SiftError {
  readonly _tag = "InternalError" as const;
  readonly code: InternalCodes;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(options: SiftErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | SiftErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: SiftErrorOptions<InternalCodes> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
