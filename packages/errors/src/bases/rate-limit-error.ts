import { RelayError } from "../base.js";
import type { RateLimitCodes, RelayErrorOptions } from "../types.js";

export type RateLimitErrorOptions = RelayErrorOptions<RateLimitCodes> & {
  retryAfterMs?: number | undefined;
};

/**
 * Errors caused by a dependency throttling the caller. HTTP 429.
 */
export class RateLimitError extends RelayError<RateLimitCodes> {
  readonly _tag = "RateLimitError" as const;

  /** Server-suggested wait before retrying, when known */
  readonly retryAfterMs: number | undefined;

  constructor(options: RateLimitErrorOptions);
  constructor(message: string, retryAfterMs?: number, metadata?: Record<string, string>);
  constructor(
    messageOrOptions: string | RateLimitErrorOptions,
    retryAfterMs?: number,
    metadata?: Record<string, string>,
  ) {
    const opts: RateLimitErrorOptions =
      typeof messageOrOptions === "string"
        ? { code: "PROVIDER_RATE_LIMITED", message: messageOrOptions, retryAfterMs, metadata }
        : messageOrOptions;
    super(opts);
    this.retryAfterMs = opts.retryAfterMs;
  }
}
