// /src/lib/psh/errors.ts
import { z } from "zod";
import type { ConfigErrorCode, ValidationErrorCode, ValidationIssue } from "@/contracts/errors";

/**
 * Input could not be calculated. Carries every offending field, not just the first.
 * `code` is the code of the first issue, for callers that only show one banner.
 */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const first = issues[0];
    if (!first) {
      throw new Error("ValidationError requires at least one issue");
    }
    super(issues.length === 1 ? first.message : `${first.message} (and ${issues.length - 1} more)`);
    this.name = "ValidationError";
    this.code = first.code;
    this.issues = issues;
  }
}

/** The rate table is incomplete or holds an unusable value. Needs table repair. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

export type ClientError = {
  error: "VALIDATION_FAILED" | "RATE_TABLE_INVALID" | "INVALID_REQUEST" | "CALCULATION_FAILED";
  message: string;
  code?: string;
  issues?: Array<{ path: string; code?: string; message: string }>;
};

export function toClientError(err: unknown): ClientError {
  if (err instanceof ValidationError) {
    return {
      error: "VALIDATION_FAILED",
      message: "One or more fields need attention.",
      code: err.code,
      issues: err.issues.map((i) => ({ path: i.field, code: i.code, message: i.message })),
    };
  }

  if (err instanceof ConfigError) {
    return {
      error: "RATE_TABLE_INVALID",
      message: `Rate table setup problem: ${err.message}`,
      code: err.code,
    };
  }

  if (err instanceof z.ZodError) {
    return {
      error: "INVALID_REQUEST",
      message: "Request did not match the expected format.",
      issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    };
  }

  if (err instanceof Error) {
    return { error: "CALCULATION_FAILED", message: err.message };
  }

  return { error: "CALCULATION_FAILED", message: "Unknown error" };
}
