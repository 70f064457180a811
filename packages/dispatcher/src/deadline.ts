import { DispatchAbortedError, ProviderTimeoutError } from "@relaykit/errors";

export interface DeadlineOptions {
  readonly providerId: string;
  readonly timeoutMs: number;
  /** Caller's cancellation signal */
  readonly signal?: AbortSignal | undefined;
  /** Error raised when the deadline elapses; a ProviderTimeoutError by default */
  readonly onTimeout?: (() => Error) | undefined;
}

/**
 * Run one provider attempt bounded by a deadline and the caller's signal.
 *
 * `fn` receives a signal that is aborted when either fires, so a
 * well-behaved call stops its I/O. The returned promise settles as soon as
 * the deadline or abort fires, without waiting for `fn` to notice.
 *
 * @throws ProviderTimeoutError (or the `onTimeout` error) when the deadline elapses first
 * @throws DispatchAbortedError when the caller aborts first
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { providerId, timeoutMs, signal, onTimeout } = options;

  if (signal?.aborted) {
    return Promise.reject(new DispatchAbortedError(signal.reason));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      fail(new DispatchAbortedError(signal?.reason));
    };

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      return true;
    };

    const fail = (error: Error): void => {
      if (!finish()) return;
      controller.abort(error);
      reject(error);
    };

    timer = setTimeout(() => {
      fail(onTimeout ? onTimeout() : new ProviderTimeoutError(providerId, timeoutMs));
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    let attempt: Promise<T>;
    try {
      attempt = fn(controller.signal);
    } catch (error) {
      attempt = Promise.reject(error);
    }

    attempt.then(
      (value) => {
        if (finish()) resolve(value);
      },
      (error: unknown) => {
        if (finish()) reject(error);
      },
    );
  });
}
