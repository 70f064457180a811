/**
 * @relaykit/errors
 *
 * Shared error taxonomy for the relaykit dispatcher.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isRelayError, RelayError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  type CodesForDomain,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ExternalError,
  InternalError,
  PermissionError,
  RateLimitError,
  type RateLimitErrorOptions,
  TimeoutError,
  ValidationError,
  type ValidationErrorOptions,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ExternalCodes,
  InternalCodes,
  PermissionCodes,
  RateLimitCodes,
  RelayErrorOptions,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { type ProviderCode, ProviderError, ProviderTimeoutError } from "./provider.js";
export {
  AllProvidersUnavailableError,
  DispatchAbortedError,
  isAllProvidersUnavailable,
  NoCandidatesAvailableError,
} from "./dispatch.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@relaykit/errors";
export const PACKAGE_VERSION = "0.1.0";
