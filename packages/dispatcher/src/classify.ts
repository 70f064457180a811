/**
 * Failure classification for provider attempts.
 *
 * Maps whatever a provider call threw into one {@link FailureKind}. Errors
 * from @relaykit/errors are classified by code; anything else by an ordered
 * substring table over the lower-cased message.
 */

import {
  getErrorMessage,
  isPermissionError,
  isRateLimitError,
  isRelayError,
  isTimeoutError,
} from "@relaykit/errors";
import type { FailureKind } from "./types.js";

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/** First matching row wins, so order matters. */
export const FAILURE_PATTERNS: readonly (readonly [FailureKind, readonly string[]])[] = [
  ["rate_limit", ["rate limit", "too many requests"]],
  ["timeout", ["timeout"]],
  ["authentication", ["auth", "api key", "unauthorized"]],
  ["network_error", ["network", "connection"]],
  ["service_unavailable", ["service unavailable", "503"]],
  ["invalid_response", ["invalid response"]],
];

const CODE_KINDS: Readonly<Record<string, FailureKind>> = {
  PROVIDER_RATE_LIMITED: "rate_limit",
  PROVIDER_TIMEOUT: "timeout",
  PROVIDER_AUTH_FAILED: "authentication",
  PROVIDER_NETWORK_ERROR: "network_error",
  PROVIDER_UNAVAILABLE: "service_unavailable",
  PROVIDER_INVALID_RESPONSE: "invalid_response",
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify a failed attempt.
 *
 * 1. A `RelayError` with a specific provider code maps directly. The
 *    catch-all `PROVIDER_ERROR` is left to its message.
 * 2. Other `RelayError`s fall back to their base type when it is telling.
 * 3. Everything else is matched by message.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (isRelayError(error)) {
    const byCode = CODE_KINDS[error.code];
    if (byCode !== undefined) return byCode;
    if (isRateLimitError(error)) return "rate_limit";
    if (isTimeoutError(error)) return "timeout";
    if (isPermissionError(error)) return "authentication";
  }

  return classifyMessage(getErrorMessage(error));
}

/**
 * Classify a raw error message by the substring table.
 */
export function classifyMessage(message: string): FailureKind {
  const lowered = message.toLowerCase();
  for (const [kind, needles] of FAILURE_PATTERNS) {
    if (needles.some((needle) => lowered.includes(needle))) return kind;
  }
  return "api_error";
}
