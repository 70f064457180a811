/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the relaykit workspace. Each code maps to an
 * HTTP status, a gRPC canonical code, and one of the base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, PROVIDER, DISPATCH
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "PermissionError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "The service is temporarily unavailable",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Request timeout",
    description: "The operation exceeded the deadline",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input or configuration
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // PROVIDER ERRORS - Failures raised by a single completion backend
  // ============================================================================
  PROVIDER_AUTH_FAILED: {
    domain: "provider",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED",
    baseType: "PermissionError",
    isExpected: true,
    title: "Provider authentication failed",
    description: "The API key or credentials for the provider are invalid",
  },
  PROVIDER_RATE_LIMITED: {
    domain: "provider",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED",
    baseType: "RateLimitError",
    isExpected: true,
    title: "Provider rate limited",
    description: "The provider rate-limited the request",
  },
  PROVIDER_TIMEOUT: {
    domain: "provider",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Provider timeout",
    description: "The provider did not respond within the request timeout",
  },
  PROVIDER_NETWORK_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Provider network error",
    description: "The connection to the provider failed",
  },
  PROVIDER_UNAVAILABLE: {
    domain: "provider",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Provider unavailable",
    description: "The provider reported that the service is unavailable",
  },
  PROVIDER_INVALID_RESPONSE: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "INTERNAL",
    baseType: "ExternalError",
    isExpected: false,
    title: "Invalid provider response",
    description: "The provider returned a response that could not be used",
  },
  PROVIDER_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "INTERNAL",
    baseType: "ExternalError",
    isExpected: false,
    title: "Provider error",
    description: "The provider returned an unexpected error",
  },

  // ============================================================================
  // DISPATCH ERRORS - Multi-provider failover
  // ============================================================================
  DISPATCH_ALL_PROVIDERS_UNAVAILABLE: {
    domain: "dispatch",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "All providers unavailable",
    description: "Every candidate provider was tried and failed",
  },
  DISPATCH_NO_CANDIDATES: {
    domain: "dispatch",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "No candidate providers available",
    description: "Filtering removed every candidate before any attempt was made",
  },
  DISPATCH_ABORTED: {
    domain: "dispatch",
    httpStatus: 499,
    grpcCode: "CANCELLED",
    baseType: "ExternalError",
    isExpected: true,
    title: "Dispatch aborted",
    description: "The caller cancelled the request",
  },
  DISPATCH_INVALID_CONFIG: {
    domain: "dispatch",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid dispatcher configuration",
    description: "The dispatcher configuration is invalid",
  },
  DISPATCH_INVALID_REQUEST: {
    domain: "dispatch",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid dispatch request",
    description: "The dispatch request parameters are out of range",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];

/**
 * Extract all ErrorCodes that belong to a specific domain
 */
export type CodesForDomain<D extends ErrorDomain> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["domain"] extends D ? K : never;
}[ErrorCode];
