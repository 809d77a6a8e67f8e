/**
 * Configuration errors: schema validation failures at factory boundaries.
 */

import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Structural shape of a schema-library issue (zod's `ZodIssue` satisfies it).
 */
export interface SchemaIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
  readonly code: string;
}

/**
 * Flatten schema issues into field-level validation issues.
 */
export function toValidationIssues(issues: readonly SchemaIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

export class ConfigInvalidError extends ValidationError {
  /** Name of the component whose configuration was rejected */
  readonly component: string;

  constructor(component: string, issues: readonly ValidationIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    super({
      code: "CONFIG_INVALID",
      message: `Invalid ${component} configuration${summary ? `: ${summary}` : ""}`,
      issues,
      metadata: { component },
    });
    this.component = component;
  }

  static fromSchemaIssues(component: string, issues: readonly SchemaIssue[]): ConfigInvalidError {
    return new ConfigInvalidError(component, toValidationIssues(issues));
  }
}
