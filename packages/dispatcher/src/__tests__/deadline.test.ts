import { DispatchAbortedError, ProviderTimeoutError } from "@relaykit/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withDeadline } from "../deadline.js";

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("withDeadline", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the call's value", async () => {
    await expect(
      withDeadline(async () => "ok", { providerId: "openai", timeoutMs: 1000 }),
    ).resolves.toBe("ok");
  });

  it("passes through the call's rejection", async () => {
    await expect(
      withDeadline(
        async () => {
          throw new Error("boom");
        },
        { providerId: "openai", timeoutMs: 1000 },
      ),
    ).rejects.toThrow("boom");
  });

  it("turns a synchronous throw into a rejection", async () => {
    await expect(
      withDeadline(
        () => {
          throw new Error("sync boom");
        },
        { providerId: "openai", timeoutMs: 1000 },
      ),
    ).rejects.toThrow("sync boom");
  });

  it("raises the onTimeout error at the deadline when given", async () => {
    const pending = withDeadline(never, {
      providerId: "openai",
      timeoutMs: 500,
      onTimeout: () => new Error("ledger too slow"),
    });
    const assertion = expect(pending).rejects.toThrow("ledger too slow");

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it("rejects with ProviderTimeoutError and aborts the call at the deadline", async () => {
    let callSignal: AbortSignal | undefined;
    const pending = withDeadline(
      (signal) => {
        callSignal = signal;
        return never(signal);
      },
      { providerId: "gemini", timeoutMs: 1000 },
    );
    const assertion = expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);

    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
    await expect(pending).rejects.toThrow('Provider "gemini" request timeout after 1000ms');
    expect(callSignal?.aborted).toBe(true);
  });

  it("rejects with DispatchAbortedError when the caller aborts", async () => {
    const controller = new AbortController();
    const pending = withDeadline(never, {
      providerId: "openai",
      timeoutMs: 1000,
      signal: controller.signal,
    });

    controller.abort("user cancelled");

    await expect(pending).rejects.toThrow("Dispatch aborted: user cancelled");
  });

  it("rejects immediately when already aborted", async () => {
    const fn = vi.fn(async () => "never called");
    const controller = new AbortController();
    controller.abort();

    await expect(
      withDeadline(fn, { providerId: "openai", timeoutMs: 1000, signal: controller.signal }),
    ).rejects.toBeInstanceOf(DispatchAbortedError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("clears the timer once settled", async () => {
    await withDeadline(async () => "ok", { providerId: "openai", timeoutMs: 1000 });

    expect(vi.getTimerCount()).toBe(0);
  });
});
