import { RelayError } from "../base.js";
import type { RelayErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

export type ValidationErrorOptions = RelayErrorOptions<ValidationCodes> & {
  issues?: readonly ValidationIssue[] | undefined;
};

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends RelayError<ValidationCodes> {
  readonly _tag = "ValidationError" as const;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | ValidationErrorOptions,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ValidationErrorOptions =
      typeof messageOrOptions === "string"
        ? { code: "VALIDATION_FAILED", message: messageOrOptions, issues, metadata, traceId }
        : messageOrOptions;
    super(opts);
    this.issues = opts.issues ?? [];
  }
}
