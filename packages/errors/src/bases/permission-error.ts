import { RelayError } from "../base.js";
import type { PermissionCodes, RelayErrorOptions } from "../types.js";

/**
 * Errors caused by rejected credentials. HTTP 401/403.
 * The `.code` field discriminates the specific error.
 */
export class PermissionError extends RelayError<PermissionCodes> {
  readonly _tag = "PermissionError" as const;

  constructor(options: RelayErrorOptions<PermissionCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | RelayErrorOptions<PermissionCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super(
      typeof messageOrOptions === "string"
        ? { code: "PROVIDER_AUTH_FAILED", message: messageOrOptions, metadata, traceId }
        : messageOrOptions,
    );
  }
}
