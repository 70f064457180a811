import { describe, expect, it } from "vitest";
import {
  AllProvidersUnavailableError,
  DispatchAbortedError,
  isAllProvidersUnavailable,
  NoCandidatesAvailableError,
  ProviderError,
  ProviderTimeoutError,
} from "../../index.js";

describe("ProviderError", () => {
  it("takes its tag and status from the catalog entry of its code", () => {
    const error = new ProviderError("openai", "PROVIDER_RATE_LIMITED", "slow down");

    expect(error.message).toBe('Provider "openai": slow down');
    expect(error._tag).toBe("RateLimitError");
    expect(error.httpStatus).toBe(429);
    expect(error.providerId).toBe("openai");
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    const error = new ProviderError("gemini", "PROVIDER_NETWORK_ERROR", "connect failed", cause);
    expect(error.cause).toBe(cause);
  });
});

describe("ProviderTimeoutError", () => {
  it("mentions the timeout in its message", () => {
    const error = new ProviderTimeoutError("anthropic", 30_000);

    expect(error.message).toBe('Provider "anthropic" request timeout after 30000ms');
    expect(error.code).toBe("PROVIDER_TIMEOUT");
    expect(error._tag).toBe("TimeoutError");
    expect(error.timeoutMs).toBe(30_000);
  });
});

describe("AllProvidersUnavailableError", () => {
  it("wraps the last error", () => {
    const last = new Error("Service unavailable");
    const error = new AllProvidersUnavailableError(["openai", "anthropic"], last);

    expect(error.code).toBe("DISPATCH_ALL_PROVIDERS_UNAVAILABLE");
    expect(error.message).toBe("All providers failed. Last error: Service unavailable");
    expect(error.cause).toBe(last);
    expect(error.attemptedProviders).toEqual(["openai", "anthropic"]);
  });

  it("handles a missing last error", () => {
    const error = new AllProvidersUnavailableError([]);
    expect(error.message).toBe("All providers failed. Last error: none");
    expect(error.cause).toBeUndefined();
  });
});

describe("NoCandidatesAvailableError", () => {
  it("is a kind of AllProvidersUnavailableError with its own code", () => {
    const error = new NoCandidatesAvailableError(["openai"]);

    expect(error).toBeInstanceOf(AllProvidersUnavailableError);
    expect(isAllProvidersUnavailable(error)).toBe(true);
    expect(error.code).toBe("DISPATCH_NO_CANDIDATES");
    expect(error.name).toBe("NoCandidatesAvailableError");
    expect(error.message).toBe("No available providers (considered: openai)");
  });

  it("reports an empty candidate list", () => {
    expect(new NoCandidatesAvailableError([]).message).toBe(
      "No available providers (considered: none)",
    );
  });
});

describe("DispatchAbortedError", () => {
  it("includes the abort reason", () => {
    const error = new DispatchAbortedError(new Error("user cancelled"));

    expect(error.code).toBe("DISPATCH_ABORTED");
    expect(error.message).toBe("Dispatch aborted: user cancelled");
    expect(error.isExpected).toBe(true);
    expect(isAllProvidersUnavailable(error)).toBe(false);
  });

  it("omits a missing reason", () => {
    expect(new DispatchAbortedError().message).toBe("Dispatch aborted");
  });
});
