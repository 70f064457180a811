import { isValidationError, ValidationError } from "@relaykit/errors";
import { describe, expect, it } from "vitest";
import { configFromEnv, validateDispatcherConfig } from "../config.js";
import { envCredentialValidator } from "../credentials.js";

describe("validateDispatcherConfig", () => {
  it("fills in defaults", () => {
    expect(validateDispatcherConfig({})).toEqual({
      circuitBreakerThreshold: 5,
      circuitBreakerTimeoutMs: 600_000,
      rateLimitBackoffMs: 300_000,
      cacheTtlMs: 300_000,
      cacheMaxEntries: 1000,
      cacheScope: "global",
      unhealthyConsecutiveFailures: 3,
      unhealthyWindowMs: 300_000,
      recentSuccessWindowMs: 300_000,
      defaultStrategy: "priority",
    });
  });

  it("treats undefined as an empty config", () => {
    expect(validateDispatcherConfig(undefined).circuitBreakerThreshold).toBe(5);
  });

  it("keeps explicit values", () => {
    const config = validateDispatcherConfig({ cacheTtlMs: 0, defaultStrategy: "adaptive" });
    expect(config.cacheTtlMs).toBe(0);
    expect(config.defaultStrategy).toBe("adaptive");
  });

  it("throws ValidationError listing each issue", () => {
    let caught: unknown;
    try {
      validateDispatcherConfig({ circuitBreakerThreshold: 0, cacheScope: "team" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!isValidationError(caught)) return;
    expect(caught.code).toBe("DISPATCH_INVALID_CONFIG");
    expect(caught.issues.map((i) => i.field)).toEqual(["circuitBreakerThreshold", "cacheScope"]);
  });

  it("rejects unknown keys", () => {
    expect(() => validateDispatcherConfig({ retries: 3 })).toThrow(ValidationError);
  });
});

describe("configFromEnv", () => {
  it("reads RELAYKIT_* variables", () => {
    const config = configFromEnv({
      RELAYKIT_CIRCUIT_BREAKER_THRESHOLD: "3",
      RELAYKIT_CACHE_TTL_MS: "0",
      RELAYKIT_CACHE_SCOPE: "caller",
      RELAYKIT_DEFAULT_STRATEGY: "least-cost",
    });

    expect(config).toMatchObject({
      circuitBreakerThreshold: 3,
      cacheTtlMs: 0,
      cacheScope: "caller",
      defaultStrategy: "least-cost",
      rateLimitBackoffMs: 300_000,
    });
  });

  it("ignores empty variables", () => {
    expect(configFromEnv({ RELAYKIT_CACHE_MAX_ENTRIES: " " }).cacheMaxEntries).toBe(1000);
  });

  it("rejects non-numeric values", () => {
    expect(() => configFromEnv({ RELAYKIT_RATE_LIMIT_BACKOFF_MS: "soon" })).toThrow(
      /rateLimitBackoffMs/,
    );
  });
});

describe("envCredentialValidator", () => {
  const validate = envCredentialValidator({ OPENAI_API_KEY: "test-secret", EMPTY_KEY: "" });

  it("accepts a set variable", () => {
    expect(validate({ provider: "openai", model: "gpt-4", credentialRef: "OPENAI_API_KEY" })).toBe(
      true,
    );
  });

  it("rejects missing or empty variables", () => {
    expect(validate({ provider: "gemini", model: "gemini-pro", credentialRef: "GEMINI_KEY" })).toBe(
      false,
    );
    expect(validate({ provider: "grok", model: "grok-1", credentialRef: "EMPTY_KEY" })).toBe(false);
  });

  it("accepts specs with no credential reference", () => {
    expect(validate({ provider: "local", model: "llama-3" })).toBe(true);
  });
});
