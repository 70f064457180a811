import { RelayError } from "../base.js";
import type { ExternalCodes, RelayErrorOptions } from "../types.js";

/**
 * Errors caused by runtime failures in external dependencies. HTTP 502/503.
 * The `.code` field discriminates the specific error.
 */
export class ExternalError extends RelayError<ExternalCodes> {
  readonly _tag = "ExternalError" as const;

  constructor(options: RelayErrorOptions<ExternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | RelayErrorOptions<ExternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_UNAVAILABLE", message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}
