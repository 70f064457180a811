/**
 * Dispatch errors — multi-provider failover outcomes
 *
 * Concrete:
 *   - AllProvidersUnavailableError (DISPATCH_ALL_PROVIDERS_UNAVAILABLE)
 *   - NoCandidatesAvailableError   (DISPATCH_NO_CANDIDATES)
 *   - DispatchAbortedError         (DISPATCH_ABORTED)
 */

import { RelayError } from "./base.js";
import { getErrorMessage } from "./utils.js";

type UnavailableCode = "DISPATCH_ALL_PROVIDERS_UNAVAILABLE" | "DISPATCH_NO_CANDIDATES";

/**
 * Raised when no candidate provider produced a response. `cause` holds the
 * last underlying provider error, when an attempt was made.
 */
export class AllProvidersUnavailableError extends RelayError<UnavailableCode> {
  readonly _tag = "ExternalError" as const;
  readonly attemptedProviders: readonly string[];

  constructor(attemptedProviders: readonly string[], lastError?: unknown) {
    super({
      code: "DISPATCH_ALL_PROVIDERS_UNAVAILABLE",
      message: `All providers failed. Last error: ${
        lastError === undefined ? "none" : getErrorMessage(lastError)
      }`,
      cause: lastError instanceof Error ? lastError : undefined,
    });
    this.attemptedProviders = attemptedProviders;
  }
}

/**
 * Raised when filtering removed every candidate before any attempt.
 * A subclass of {@link AllProvidersUnavailableError} so callers can handle
 * both outcomes with one check.
 */
export class NoCandidatesAvailableError extends AllProvidersUnavailableError {
  override readonly code = "DISPATCH_NO_CANDIDATES" as const;
  readonly consideredProviders: readonly string[];

  constructor(consideredProviders: readonly string[]) {
    super([]);
    this.message = `No available providers (considered: ${
      consideredProviders.length > 0 ? consideredProviders.join(", ") : "none"
    })`;
    this.consideredProviders = consideredProviders;
  }
}

export class DispatchAbortedError extends RelayError<"DISPATCH_ABORTED"> {
  readonly _tag = "ExternalError" as const;

  constructor(reason?: unknown) {
    super({
      code: "DISPATCH_ABORTED",
      message: `Dispatch aborted${reason === undefined ? "" : `: ${getErrorMessage(reason)}`}`,
      cause: reason instanceof Error ? reason : undefined,
    });
  }
}

/** Check if an error is an AllProvidersUnavailableError (including NoCandidatesAvailableError) */
export function isAllProvidersUnavailable(error: unknown): error is AllProvidersUnavailableError {
  return error instanceof AllProvidersUnavailableError;
}
