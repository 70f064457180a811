import { ValidationError, type ValidationIssue } from "@relaykit/errors";
import { z } from "zod";
import type { DispatchRequest, ResolvedDispatcherConfig } from "./types.js";

const DispatcherConfigSchema = z
  .object({
    circuitBreakerThreshold: z.number().int().positive().default(5),
    circuitBreakerTimeoutMs: z.number().int().nonnegative().default(600_000),
    rateLimitBackoffMs: z.number().int().nonnegative().default(300_000),
    cacheTtlMs: z.number().int().nonnegative().default(300_000),
    cacheMaxEntries: z.number().int().positive().default(1000),
    cacheScope: z.enum(["global", "caller"]).default("global"),
    unhealthyConsecutiveFailures: z.number().int().positive().default(3),
    unhealthyWindowMs: z.number().int().nonnegative().default(300_000),
    recentSuccessWindowMs: z.number().int().nonnegative().default(300_000),
    defaultStrategy: z
      .enum(["priority", "round-robin", "least-cost", "fastest", "adaptive"])
      .default("priority"),
  })
  .strict();

/** Largest delay `setTimeout` honours; longer ones fire at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const DispatchRequestLimitsSchema = z.object({
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().finite().nonnegative().optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  retryCount: z.number().int().nonnegative().optional(),
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

function describeIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((i) => `${i.field}: ${i.message}`).join("; ");
}

/**
 * Check a request's numeric parameters before any provider is attempted.
 *
 * @throws ValidationError (DISPATCH_INVALID_REQUEST) listing every issue
 */
export function validateDispatchRequest(
  request: Pick<DispatchRequest, "maxTokens" | "temperature" | "timeoutMs" | "retryCount">,
): void {
  const result = DispatchRequestLimitsSchema.safeParse({
    maxTokens: request.maxTokens,
    temperature: request.temperature,
    timeoutMs: request.timeoutMs,
    retryCount: request.retryCount,
  });
  if (result.success) return;

  const issues = toIssues(result.error);
  throw new ValidationError({
    code: "DISPATCH_INVALID_REQUEST",
    message: `Invalid dispatch request: ${describeIssues(issues)}`,
    issues,
  });
}

/**
 * Validate a DispatcherConfig and fill in defaults.
 *
 * @throws ValidationError (DISPATCH_INVALID_CONFIG) listing every issue
 */
export function validateDispatcherConfig(config: unknown = {}): ResolvedDispatcherConfig {
  const result = DispatcherConfigSchema.safeParse(config);
  if (result.success) return result.data;

  const issues = toIssues(result.error);
  throw new ValidationError({
    code: "DISPATCH_INVALID_CONFIG",
    message: `Invalid dispatcher config: ${describeIssues(issues)}`,
    issues,
  });
}

const ENV_NUMBERS = {
  circuitBreakerThreshold: "RELAYKIT_CIRCUIT_BREAKER_THRESHOLD",
  circuitBreakerTimeoutMs: "RELAYKIT_CIRCUIT_BREAKER_TIMEOUT_MS",
  rateLimitBackoffMs: "RELAYKIT_RATE_LIMIT_BACKOFF_MS",
  cacheTtlMs: "RELAYKIT_CACHE_TTL_MS",
  cacheMaxEntries: "RELAYKIT_CACHE_MAX_ENTRIES",
} as const;

const ENV_STRINGS = {
  cacheScope: "RELAYKIT_CACHE_SCOPE",
  defaultStrategy: "RELAYKIT_DEFAULT_STRATEGY",
} as const;

/**
 * Build a validated config from `RELAYKIT_*` environment variables.
 * Unset or empty variables fall back to defaults.
 *
 * @throws ValidationError when a set variable is invalid
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ResolvedDispatcherConfig {
  const raw: Record<string, string | number> = {};

  for (const [key, name] of Object.entries(ENV_NUMBERS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") raw[key] = Number(value);
  }
  for (const [key, name] of Object.entries(ENV_STRINGS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") raw[key] = value.trim();
  }

  return validateDispatcherConfig(raw);
}
