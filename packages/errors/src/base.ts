import type { BaseErrorType, ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * Serialized shape produced by `SiftError.toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
}

/**
 * Root of the error hierarchy. Every concrete error carries a catalog code,
 * and the catalog entry determines status, domain and whether the failure
 * is an expected (client-side) condition.
 */
export abstract class SiftError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
    };
  }
}

/**
 * Check whether a value is any SiftError.
 */
export function isSiftError(error: unknown): error is SiftError {
  return error instanceof SiftError;
}

/**
 * Check whether a value is an Error instance.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
