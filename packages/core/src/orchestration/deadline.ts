import {
  RequestTimeoutError,
  VerificationCancelledError,
  toError,
} from '@newscheck/shared/src/utils/errors.js';

export interface CallOptions {
  readonly signal?: AbortSignal;
}

export interface DeadlineOptions extends CallOptions {
  readonly timeoutMs: number;
  readonly label: string;
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new VerificationCancelledError();
  }
}

/**
 * Runs `task` with its own abort signal that fires when the deadline passes or the caller's
 * signal aborts. The returned promise settles at that moment even if the task ignores its signal.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { timeoutMs, label, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new VerificationCancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      const error = new VerificationCancelledError();
      controller.abort(error);
      cleanup();
      reject(error);
    };

    const timer = setTimeout(() => {
      const error = new RequestTimeoutError(
        `${label} timed out after ${String(timeoutMs)}ms`,
        timeoutMs,
      );
      controller.abort(error);
      cleanup();
      reject(error);
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(toError(error));
        },
      );
  });
}
