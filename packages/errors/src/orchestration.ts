/**
 * Orchestration errors: multi-hop plan construction and execution
 *
 * Abstract base: OrchestrationError
 * Concrete:
 *   - PlanValidationError (PLAN_EMPTY | PLAN_DUPLICATE_HOP | PLAN_UNKNOWN_DEPENDENCY)
 *   - PlanCycleError      (PLAN_CYCLE_DETECTED)
 *   - UnknownToolError    (HOP_UNKNOWN_TOOL)
 */

import { SiftError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class OrchestrationError extends SiftError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export type PlanValidationCode = "PLAN_EMPTY" | "PLAN_DUPLICATE_HOP" | "PLAN_UNKNOWN_DEPENDENCY";

export class PlanValidationError extends OrchestrationError {
  readonly _tag = "ValidationError" as const;
  readonly code: PlanValidationCode;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Hop names implicated in the failure (duplicates or unknown dependencies) */
  readonly hopNames: readonly string[];

  constructor(code: PlanValidationCode, message: string, hopNames: readonly string[] = []) {
    super(message);
    const entry = ERROR_CATALOG[code];
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.hopNames = hopNames;
  }
}

export class PlanCycleError extends OrchestrationError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PLAN_CYCLE_DETECTED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Hops that could not be scheduled */
  readonly unresolved: readonly string[];

  constructor(unresolved: readonly string[]) {
    super(`Cycle detected in hop dependencies: [${unresolved.join(", ")}]`);
    const entry = ERROR_CATALOG.PLAN_CYCLE_DETECTED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.unresolved = unresolved;
  }
}

export class UnknownToolError extends OrchestrationError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "HOP_UNKNOWN_TOOL" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly toolName: string;
  readonly hopName: string;

  constructor(toolName: string, hopName: string) {
    super(`Tool "${toolName}" is not registered (requested by hop "${hopName}")`);
    const entry = ERROR_CATALOG.HOP_UNKNOWN_TOOL;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.toolName = toolName;
    this.hopName = hopName;
  }
}
