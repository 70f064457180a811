import { RelayError } from "../base.js";
import type { InternalCodes, RelayErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or unexpected internal states. HTTP 500.
 * The `.code` field discriminates the specific error.
 */
export class InternalError extends RelayError<InternalCodes> {
  readonly _tag = "InternalError" as const;

  constructor(options: RelayErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | RelayErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}
