/**
 * Provider errors — failures raised by a single completion backend.
 *
 * Concrete:
 *   - ProviderError         (any PROVIDER_* code)
 *   - ProviderTimeoutError  (PROVIDER_TIMEOUT)
 *
 * Provider adapters throw these so the dispatcher can classify a failure
 * by code instead of by message.
 */

import { RelayError } from "./base.js";
import { type BaseErrorType, type CodesForDomain, ERROR_CATALOG } from "./catalog.js";

export type ProviderCode = CodesForDomain<"provider">;

export class ProviderError extends RelayError<ProviderCode> {
  readonly _tag: BaseErrorType;
  readonly providerId: string;

  constructor(providerId: string, code: ProviderCode, message: string, cause?: Error) {
    super({ code, message: `Provider "${providerId}": ${message}`, cause });
    this._tag = ERROR_CATALOG[code].baseType;
    this.providerId = providerId;
  }
}

export class ProviderTimeoutError extends RelayError<"PROVIDER_TIMEOUT"> {
  readonly _tag = "TimeoutError" as const;
  readonly providerId: string;
  readonly timeoutMs: number;

  constructor(providerId: string, timeoutMs: number) {
    super({
      code: "PROVIDER_TIMEOUT",
      message: `Provider "${providerId}" request timeout after ${timeoutMs}ms`,
    });
    this.providerId = providerId;
    this.timeoutMs = timeoutMs;
  }
}
