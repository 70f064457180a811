import { RelayError } from "../base.js";
import type { TimeoutCodes, RelayErrorOptions } from "../types.js";

/**
 * Errors caused by an operation exceeding its deadline. HTTP 504.
 * The `.code` field discriminates the specific error.
 */
export class TimeoutError extends RelayError<TimeoutCodes> {
  readonly _tag = "TimeoutError" as const;

  constructor(options: RelayErrorOptions<TimeoutCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | RelayErrorOptions<TimeoutCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_TIMEOUT", message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}
