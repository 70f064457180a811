export { ExternalError } from "./external-error.js";
export { InternalError } from "./internal-error.js";
export { PermissionError } from "./permission-error.js";
export { RateLimitError, type RateLimitErrorOptions } from "./rate-limit-error.js";
export { TimeoutError } from "./timeout-error.js";
export { ValidationError, type ValidationErrorOptions } from "./validation-error.js";
